import express from "express";
import { createRaffleController } from "./controllers/raffleController";
import { generalRateLimit } from "./middleware/rateLimiting";
import { getSecurityHeaders, secureCors } from "./middleware/securityHeaders";
import { createHealthRoutes, StoragePing } from "./routes/healthRoutes";
import { createRaffleRoutes } from "./routes/raffleRoutes";
import { RaffleService } from "./services/raffleService";

export interface AppDependencies {
  service: RaffleService;
  adminApiKey: string;
  storage: { kind: string; ping: StoragePing };
  production?: boolean;
  frontendUrl?: string;
}

/**
 * Builds the HTTP app. Starts nothing: listening and background services
 * are the caller's business.
 */
export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Amounts are bigint internally; JSON carries them as decimal strings
  app.set("json replacer", (_key: string, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value
  );
  app.set("trust proxy", 1);

  app.use(getSecurityHeaders(deps.production ?? false));
  app.use(secureCors(deps.frontendUrl));
  app.use(generalRateLimit);
  app.use(express.json({ limit: "100kb" }));

  app.use("/health", createHealthRoutes(deps.storage));
  app.use(
    "/api/raffle",
    createRaffleRoutes(createRaffleController(deps.service), deps.adminApiKey)
  );

  app.use((_req, res) =>
    res.status(404).json({ success: false, error: "Route not found" })
  );
  app.use(
    (
      err: Error & { status?: number; type?: string },
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      // body-parser rejects malformed JSON with a 400
      if (err.type === "entity.parse.failed") {
        res.status(400).json({ success: false, error: "Malformed JSON body" });
        return;
      }
      console.error("Unhandled error:", err);
      res.status(500).json({ success: false, error: "Internal server error" });
    }
  );

  return app;
}
