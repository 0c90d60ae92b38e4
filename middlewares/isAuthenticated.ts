import { Response, NextFunction, Request, RequestHandler } from "express";
import { jwtService } from "../services/jwt.service";
import { logger } from "../utils/logger";

interface TokenDecoder {
  decodeTokenWithDetails(token: string): { payload: { id: string } | null; isExpired: boolean; error?: string };
}

/**
 * Resolves the bearer token to a caller identity on req.caller.
 */
export const createAuthenticator =
  (tokens: TokenDecoder = jwtService): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    const [scheme, token] = (req.headers.authorization ?? "").split(" ");

    if (scheme !== "Bearer" || !token) {
      res.status(401).json({ success: false, message: "Authorization token missing", code: "TOKEN_MISSING" });
      return;
    }

    const tokenResult = tokens.decodeTokenWithDetails(token);
    if (!tokenResult.payload) {
      if (tokenResult.isExpired) {
        logger.warn(`Expired token attempt: ${tokenResult.error}`);
        res.status(401).json({ success: false, message: "Token expired", code: "TOKEN_EXPIRED" });
      } else {
        logger.warn(`Invalid token attempt: ${tokenResult.error}`);
        res.status(401).json({ success: false, message: "Invalid token", code: "INVALID_TOKEN" });
      }
      return;
    }

    req.caller = tokenResult.payload.id;
    next();
  };

export const isAuthenticated = createAuthenticator();
