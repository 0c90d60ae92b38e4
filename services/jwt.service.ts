import jwt from "jsonwebtoken";
import env from "../config/env";
import { Identity } from "../types";

export interface ITokenPayload {
  /** Vault identity the bearer acts as. */
  id: Identity;
}

function isTokenPayload(value: unknown): value is ITokenPayload {
  return typeof value === "object" && value !== null && "id" in value && typeof value.id === "string";
}

class JwtService {
  private secret: string;

  constructor(secret: string) {
    this.secret = secret;
  }

  generateToken(payload: ITokenPayload, expiresIn: jwt.SignOptions["expiresIn"] = "30d"): string {
    return jwt.sign(payload, this.secret, { expiresIn });
  }

  decodeTokenWithDetails(token: string): { payload: ITokenPayload | null; isExpired: boolean; error?: string } {
    try {
      const decoded = jwt.verify(token, this.secret);
      if (!isTokenPayload(decoded)) {
        return { payload: null, isExpired: false, error: "Token has no identity" };
      }
      return {
        payload: { id: decoded.id },
        isExpired: false,
      };
    } catch (error) {
      const isExpired = error instanceof jwt.TokenExpiredError;
      return {
        payload: null,
        isExpired,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

export const createJwtService = (secret: string) => new JwtService(secret);

export const jwtService = new JwtService(env.JWT_SECRET);
