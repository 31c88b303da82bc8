import rateLimit, { ipKeyGenerator } from "express-rate-limit";
import { Request, Response } from "express";
import * as crypto from "crypto";

/**
 * Client fingerprint from request characteristics, so a client that rotates
 * IPs still shares a bucket.
 */
export const generateClientFingerprint = (req: Request): string => {
  const components = [
    req.headers["user-agent"] || "",
    req.headers["accept-language"] || "",
    req.headers["accept-encoding"] || "",
    req.headers["accept"] || "",
  ];

  return crypto
    .createHash("sha256")
    .update(components.join("|"))
    .digest("hex")
    .substring(0, 16);
};

/** IP (IPv6 collapsed to its /56 subnet) plus fingerprint. */
export const createCompositeKey = (req: Request): string => {
  const ip = req.ip || req.socket.remoteAddress || "unknown";
  return `${ipKeyGenerator(ip)}:${generateClientFingerprint(req)}`;
};

export const detectSuspiciousActivity = (req: Request): boolean => {
  const userAgent = req.headers["user-agent"] || "";
  const forwardedFor = req.headers["x-forwarded-for"];

  return (
    userAgent.length < 10 ||
    /bot|crawler|spider|scraper/i.test(userAgent) ||
    (typeof forwardedFor === "string" && forwardedFor.includes(","))
  );
};

const limitedResponse =
  (context: string) => (req: Request, res: Response) => {
    const isSuspicious = detectSuspiciousActivity(req);

    console.warn(`🚨 [RATE LIMIT] ${context} rate limit exceeded`, {
      timestamp: new Date().toISOString(),
      fingerprint: generateClientFingerprint(req),
      endpoint: `${req.method} ${req.path}`,
      suspiciousActivity: isSuspicious,
    });

    res.status(429).json({
      success: false,
      error: `Too many requests. Rate limit exceeded for ${context.toLowerCase()}.`,
      retryAfter: res.getHeader("Retry-After"),
    });
  };

/** Tighter limit for clients that look automated. */
const limitFor = (normal: number, suspicious: number) => (req: Request) =>
  detectSuspiciousActivity(req) ? suspicious : normal;

/**
 * General API rate limiting
 */
export const generalRateLimit = rateLimit({
  windowMs: 15 * 60 * 1000,
  limit: limitFor(1000, 100),
  keyGenerator: createCompositeKey,
  handler: limitedResponse("General API"),
  standardHeaders: true,
  legacyHeaders: false,
  skip: (req) => req.path === "/health" || req.path === "/health/db",
});

/**
 * Read endpoints (round views, ticket lookups)
 */
export const publicDataRateLimit = rateLimit({
  windowMs: 60 * 1000,
  limit: limitFor(100, 20),
  keyGenerator: createCompositeKey,
  handler: limitedResponse("Public Data API"),
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * State-changing endpoints (entries, close, claims)
 */
export const raffleActionRateLimit = rateLimit({
  windowMs: 60 * 1000,
  limit: limitFor(30, 5),
  keyGenerator: createCompositeKey,
  handler: limitedResponse("Raffle Action"),
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * Admin endpoints
 */
export const adminRateLimit = rateLimit({
  windowMs: 15 * 60 * 1000,
  limit: 50,
  keyGenerator: createCompositeKey,
  handler: limitedResponse("Admin"),
  standardHeaders: true,
  legacyHeaders: false,
});

export const healthCheckRateLimit = rateLimit({
  windowMs: 60 * 1000,
  limit: 60,
  handler: limitedResponse("Health Check"),
  standardHeaders: true,
  legacyHeaders: false,
});
