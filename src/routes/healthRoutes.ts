import express from "express";
import { healthCheckRateLimit } from "../middleware/rateLimiting";
import { sanitizeErrorResponse } from "../utils/auditLogger";

/** Storage check; resolves when the backing store answers. */
export type StoragePing = () => Promise<void>;

export function createHealthRoutes(storage: { kind: string; ping: StoragePing }) {
  const router = express.Router();

  /**
   * GET /health
   * Liveness only; never touches the database
   */
  router.get("/", healthCheckRateLimit, (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  /**
   * GET /health/db
   */
  router.get("/db", healthCheckRateLimit, async (_req, res) => {
    const started = Date.now();
    try {
      await storage.ping();
      res.json({
        status: "ok",
        storage: storage.kind,
        latencyMs: Date.now() - started,
      });
    } catch (error) {
      const { message, logDetails } = sanitizeErrorResponse(
        error,
        "Database unreachable"
      );
      console.error("❌ [HEALTH] Storage check failed:", logDetails);
      res.status(503).json({
        status: "error",
        storage: storage.kind,
        error: message,
      });
    }
  });

  return router;
}
