import helmet from "helmet";
import cors, { CorsOptions } from "cors";
import { RequestHandler } from "express";

/**
 * Origins the browser frontend may call from. Localhost is always allowed.
 */
export const getAllowedOrigins = (frontendUrl?: string): string[] => {
  const origins = [
    "http://localhost:3000",
    "http://localhost:3001",
    "http://127.0.0.1:3000",
    "http://127.0.0.1:3001",
  ];
  if (frontendUrl) {
    origins.push(frontendUrl.replace(/\/$/, ""));
  }
  return origins;
};

/**
 * Helmet headers for a JSON API: strict in production, relaxed locally.
 */
export const getSecurityHeaders = (production: boolean): RequestHandler => {
  if (production) {
    console.log("🔒 [SECURITY] Using PRODUCTION security headers (strict)");
    return helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'none'"],
          frameAncestors: ["'none'"],
        },
      },
      frameguard: { action: "deny" },
      hsts: { maxAge: 31536000, includeSubDomains: true, preload: true },
      referrerPolicy: { policy: "strict-origin-when-cross-origin" },
      crossOriginEmbedderPolicy: false,
      crossOriginResourcePolicy: { policy: "cross-origin" },
    });
  }

  console.log("🔓 [SECURITY] Using DEVELOPMENT security headers (permissive)");
  return helmet({
    contentSecurityPolicy: false,
    frameguard: { action: "sameorigin" },
    hsts: false,
    crossOriginEmbedderPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
  });
};

/**
 * CORS with an origin allow-list. Requests without an Origin header
 * (server-to-server, curl) pass.
 */
export const secureCors = (frontendUrl?: string): RequestHandler => {
  const allowed = getAllowedOrigins(frontendUrl);
  console.log("🔒 [CORS] Allowed origins:", allowed);

  const options: CorsOptions = {
    origin: (origin, callback) => {
      if (!origin || allowed.includes(origin.replace(/\/$/, ""))) {
        callback(null, true);
        return;
      }
      console.warn(`🚨 [CORS] Origin blocked: ${origin}`);
      callback(null, false);
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "Accept"],
    exposedHeaders: [
      "RateLimit-Limit",
      "RateLimit-Remaining",
      "RateLimit-Reset",
      "Retry-After",
    ],
    maxAge: 86400,
  };
  return cors(options);
};
