import { Response, NextFunction, Request, RequestHandler } from "express";
import { logger } from "../utils/logger";

interface AuthorizationCheck {
  isAuthorized(caller: string): boolean;
}

/**
 * Rejects callers the vault does not authorize for configuration changes.
 * Use AFTER isAuthenticated.
 */
export const createAdminGuard =
  (vault: AuthorizationCheck): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    if (!req.caller) {
      res.status(401).json({ success: false, message: "Not authenticated", code: "UNAUTHENTICATED" });
      return;
    }

    if (!vault.isAuthorized(req.caller)) {
      logger.warn(`Admin access denied for ${req.caller}`);
      res.status(403).json({ success: false, message: "Admin access required", code: "Unauthorized" });
      return;
    }

    next();
  };
