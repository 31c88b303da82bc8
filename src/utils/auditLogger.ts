import { Request } from "express";
import crypto from "crypto";

// ===== AUDIT LOG LEVELS =====
export enum AuditLogLevel {
  ACTION = "ACTION", // Action initiated
  SUCCESS = "SUCCESS",
  FAILURE = "FAILURE",
  SECURITY = "SECURITY",
}

// ===== AUDIT LOG TYPES =====
export enum AuditActionType {
  // Round lifecycle
  CREATE_ROUND = "CREATE_ROUND",
  ENTER_ROUND = "ENTER_ROUND",
  CLOSE_ROUND = "CLOSE_ROUND",
  FULFILL_RANDOMNESS = "FULFILL_RANDOMNESS",
  FINALIZE_ROUND = "FINALIZE_ROUND",
  RECOVER_ROUND = "RECOVER_ROUND",

  // Payouts
  CLAIM_PRIZE = "CLAIM_PRIZE",
  CLAIM_REFUND = "CLAIM_REFUND",
  CLAIM_REWARD = "CLAIM_REWARD",

  // Authentication
  AUTH_FAILURE = "AUTH_FAILURE",
}

export type AuditDetails = Record<string, unknown>;
export type AuditImpact = "low" | "medium" | "high" | "critical";

export interface AuditLogEntry {
  timestamp: string;
  level: AuditLogLevel;
  action: AuditActionType;
  ip: string;
  userAgent?: string;
  endpoint: string;
  details: AuditDetails;
  success: boolean;
  error?: string;
  duration?: number;
}

/** bigint fields are logged as decimal strings. */
function printable(details: AuditDetails): AuditDetails {
  const out: AuditDetails = {};
  for (const [key, value] of Object.entries(details)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}

// ===== AUDIT LOGGER CLASS =====
export class AuditLogger {
  private static instance: AuditLogger;

  static getInstance(): AuditLogger {
    if (!AuditLogger.instance) {
      AuditLogger.instance = new AuditLogger();
    }
    return AuditLogger.instance;
  }

  /**
   * Sanitize PII by hashing with a salt
   */
  private sanitizePII(data: string): string {
    const salt = process.env.LOG_SALT || "audit-log-salt-change-in-production";
    return crypto
      .createHash("sha256")
      .update(data + salt)
      .digest("hex")
      .substring(0, 12);
  }

  private extractRequestInfo(req: Request) {
    const rawIP = req.ip || req.socket.remoteAddress || "unknown";
    const rawUserAgent = req.headers["user-agent"] || "unknown";

    return {
      ip: this.sanitizePII(rawIP),
      userAgent: this.sanitizePII(rawUserAgent),
      endpoint: `${req.method} ${req.path}`,
      timestamp: new Date().toISOString(),
    };
  }

  logAction(
    action: AuditActionType,
    req: Request,
    details: AuditDetails = {}
  ): void {
    const logEntry: AuditLogEntry = {
      ...this.extractRequestInfo(req),
      level: AuditLogLevel.ACTION,
      action,
      details: printable(details),
      success: true,
    };

    console.log(`🔐 [API ${action}] Action initiated`, logEntry);
  }

  logSuccess(
    action: AuditActionType,
    req: Request,
    details: AuditDetails = {},
    startTime?: number
  ): void {
    const logEntry: AuditLogEntry = {
      ...this.extractRequestInfo(req),
      level: AuditLogLevel.SUCCESS,
      action,
      details: printable(details),
      success: true,
      duration: startTime ? Date.now() - startTime : undefined,
    };

    console.log(`✅ [API ${action}] Operation successful`, logEntry);
  }

  logFailure(
    action: AuditActionType,
    req: Request,
    error: string,
    details: AuditDetails = {},
    startTime?: number
  ): void {
    const logEntry: AuditLogEntry = {
      ...this.extractRequestInfo(req),
      level: AuditLogLevel.FAILURE,
      action,
      details: printable(details),
      success: false,
      error,
      duration: startTime ? Date.now() - startTime : undefined,
    };

    console.error(`❌ [API ${action}] Operation failed`, logEntry);
  }

  logSecurity(
    action: AuditActionType,
    req: Request,
    details: AuditDetails = {}
  ): void {
    const logEntry: AuditLogEntry = {
      ...this.extractRequestInfo(req),
      level: AuditLogLevel.SECURITY,
      action,
      details: printable(details),
      success: false,
    };

    console.warn(`🚨 [SECURITY ${action}] Security event detected`, logEntry);
  }

  /**
   * Log state changes made outside a request (keeper ticks, oracle callbacks)
   */
  logDataOperation(
    action: AuditActionType,
    details: AuditDetails,
    impact: AuditImpact = "medium"
  ): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level: AuditLogLevel.ACTION,
      action,
      details: { ...printable(details), impact },
      success: true,
      ip: "system",
      endpoint: "background-operation",
    };

    const emoji = {
      low: "📝",
      medium: "📊",
      high: "🚨",
      critical: "🚨🚨🚨",
    }[impact];

    console.log(
      `${emoji} [DATA ${action}] ${impact.toUpperCase()} impact operation`,
      logEntry
    );
  }

  startTimer(): number {
    return Date.now();
  }
}

// ===== CONVENIENCE FUNCTIONS =====
export const auditLogger = AuditLogger.getInstance();

export const auditAction = (
  action: AuditActionType,
  req: Request,
  details?: AuditDetails
) => auditLogger.logAction(action, req, details);

export const auditSuccess = (
  action: AuditActionType,
  req: Request,
  details?: AuditDetails,
  startTime?: number
) => auditLogger.logSuccess(action, req, details, startTime);

export const auditFailure = (
  action: AuditActionType,
  req: Request,
  error: string,
  details?: AuditDetails,
  startTime?: number
) => auditLogger.logFailure(action, req, error, details, startTime);

export const auditSecurity = (
  action: AuditActionType,
  req: Request,
  details?: AuditDetails
) => auditLogger.logSecurity(action, req, details);

export const auditDataOperation = (
  action: AuditActionType,
  details: AuditDetails,
  impact?: AuditImpact
) => auditLogger.logDataOperation(action, details, impact);

/**
 * Full error details for the server log, and a message safe to return to
 * clients (generic in production).
 */
export const sanitizeErrorResponse = (
  error: unknown,
  fallbackMessage: string = "Internal server error"
): { message: string; logDetails: Record<string, unknown> } => {
  const isProduction = process.env.NODE_ENV === "production";
  const err = error instanceof Error ? error : undefined;

  const logDetails = {
    message: err?.message ?? String(error),
    stack: err?.stack,
    name: err?.name,
    timestamp: new Date().toISOString(),
  };

  return {
    message: isProduction ? fallbackMessage : err?.message || fallbackMessage,
    logDetails,
  };
};

export const createErrorResponse = (
  error: unknown,
  fallbackMessage: string = "Internal server error"
) => {
  const { message } = sanitizeErrorResponse(error, fallbackMessage);
  return {
    success: false,
    error: message,
  };
};
