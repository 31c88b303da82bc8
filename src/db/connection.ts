import { Pool, PoolConfig } from "pg";
import dns from "node:dns";
import { URL } from "url";

// Prefer IPv4 on hosted Postgres providers
dns.setDefaultResultOrder("ipv4first");

/**
 * Build the shared pg Pool from a connection URL. SSL is only enabled in
 * production, where managed databases require it.
 */
export function createPool(databaseUrl: string, nodeEnv: string): Pool {
  const dbUrl = new URL(databaseUrl);

  const poolConfig: PoolConfig = {
    host: dbUrl.hostname,
    port: parseInt(dbUrl.port || "5432", 10),
    database: dbUrl.pathname.slice(1),
    user: decodeURIComponent(dbUrl.username),
    password: decodeURIComponent(dbUrl.password),
    ssl: nodeEnv === "production" ? { rejectUnauthorized: false } : false,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    statement_timeout: 30000,
    query_timeout: 30000,
  };

  // Safe config log (no secrets)
  console.log("Pool configuration:", {
    ...poolConfig,
    password: poolConfig.password ? "[HIDDEN]" : undefined,
  });

  const pool = new Pool(poolConfig);

  pool.on("error", (err: Error & { code?: string }) => {
    const isTimeoutError =
      err.code === "ETIMEDOUT" ||
      err.code === "ECONNREFUSED" ||
      err.message.includes("timeout");

    if (isTimeoutError) {
      console.warn(
        "⚠️ Database connection timeout on idle client; will retry on next use:",
        err.message
      );
    } else {
      console.error("❌ Unexpected error on idle client", err);
    }
  });

  return pool;
}
