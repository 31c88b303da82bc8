import { createApp } from "./app";
import { createPool } from "./db/connection";
import { MemoryRoundRepository } from "./db/memoryRoundRepository";
import { PgRoundRepository } from "./db/pgRoundRepository";
import { RoundRepository } from "./db/roundRepository";
import { createChainClients } from "./raffleClient";
import { RaffleService } from "./services/raffleService";
import { startServices } from "./services/startServices";
import {
  InProcessLockProvider,
  LockProvider,
  PgAdvisoryLockProvider,
} from "./utils/distributedLock";
import { loadEnv, roundDefaultsFrom } from "./utils/loadEnv";
import { StoragePing } from "./routes/healthRoutes";

export async function main(): Promise<void> {
  const env = loadEnv();
  const chain = createChainClients({
    rpcUrl: env.RPC_URL,
    privateKey: env.PRIVATE_KEY,
    paymentTokenAddress: env.PAYMENT_TOKEN_ADDRESS,
    relayAddress: env.RANDOMNESS_RELAY_ADDRESS,
    minOracleBalance: env.MIN_ORACLE_BALANCE,
  });

  let repository: RoundRepository;
  let locks: LockProvider;
  let storage: { kind: string; ping: StoragePing };
  if (env.DATABASE_URL) {
    const pool = createPool(env.DATABASE_URL, env.NODE_ENV);
    const pgRepository = new PgRoundRepository(pool);
    await pgRepository.ensureSchema();
    repository = pgRepository;
    locks = new PgAdvisoryLockProvider(pool);
    storage = {
      kind: "postgres",
      ping: async () => {
        await pool.query("SELECT 1");
      },
    };
  } else {
    console.warn("⚠️ DATABASE_URL not set, rounds are kept in memory only");
    repository = new MemoryRoundRepository();
    locks = new InProcessLockProvider();
    storage = { kind: "memory", ping: async () => undefined };
  }

  const service = new RaffleService({
    repository,
    payments: chain.payments,
    oracle: chain.oracle,
    defaults: roundDefaultsFrom(env),
  });

  const app = createApp({
    service,
    adminApiKey: env.ADMIN_API_KEY,
    storage,
    production: env.NODE_ENV === "production",
    frontendUrl: env.FRONTEND_URL,
  });

  // Start listening before any background work
  const server = app.listen(env.PORT, () => {
    console.log(`🚀 Server running on port ${env.PORT}`);
    console.log(`📊 Environment: ${env.NODE_ENV}`);
  });

  const background = await startServices(service, chain.oracle, locks, {
    keeperEnabled: env.KEEPER_ENABLED,
    keeperAddress: env.KEEPER_ADDRESS,
    keeperIntervalMs: env.KEEPER_INTERVAL_MS,
  });

  const shutdown = (signal: string) => {
    console.log(`🛑 ${signal} received, shutting down`);
    background.stop();
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  process.on("unhandledRejection", (reason) => {
    console.error("❌ Unhandled Rejection:", reason);
    if (env.NODE_ENV !== "production") {
      process.exit(1);
    }
  });
}
