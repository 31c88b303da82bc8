import { Request, Response, NextFunction, RequestHandler } from "express";
import { auditSecurity, AuditActionType } from "../utils/auditLogger";
import crypto from "crypto";

/** Constant-time comparison that also hides the length of the secret. */
function keysMatch(provided: string, expected: string): boolean {
  const a = crypto.createHash("sha256").update(provided).digest();
  const b = crypto.createHash("sha256").update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

/**
 * Requires `Authorization: Bearer <ADMIN_API_KEY>` on admin endpoints.
 */
export function requireAdminAuth(adminApiKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      console.warn(
        `🚨 [AUTH] Unauthorized admin access attempt from IP: ${
          req.ip || req.socket.remoteAddress
        } - Missing/invalid authorization header`
      );
      res.status(401).json({
        success: false,
        error:
          "Authorization required. Include header: Authorization: Bearer <api-key>",
      });
      return;
    }

    const providedKey = authHeader.substring(7);

    if (!providedKey || !keysMatch(providedKey, adminApiKey)) {
      auditSecurity(AuditActionType.AUTH_FAILURE, req, {
        reason: "invalid_api_key",
        provided_key_length: providedKey.length,
        endpoint: `${req.method} ${req.path}`,
      });

      res.status(403).json({
        success: false,
        error: "Invalid API key",
      });
      return;
    }

    console.log(
      `🔐 [ADMIN AUTH] Admin authenticated for ${req.method} ${req.path}`
    );
    next();
  };
}
