import dotenv from "dotenv";
import path from "path";
import { z } from "zod";
import { RoundConfig } from "../types/raffle";

const address = z
  .string()
  .trim()
  .regex(/^0x[0-9a-fA-F]{40}$/, "must be a 0x-prefixed 20-byte address");

const optionalAddress = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  address.optional()
);

const uint = z.coerce.number().int().nonnegative();
const bps = z.coerce.number().int().min(0).max(10_000);
const baseUnits = z
  .string()
  .trim()
  .regex(/^\d+$/, "must be a whole number of token base units")
  .transform((v) => BigInt(v));

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((v) => v === "true" || v === "1");

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  ADMIN_API_KEY: z.string().min(8, "must be at least 8 characters"),
  LOG_SALT: z.string().optional(),
  FRONTEND_URL: z.string().optional(),

  DATABASE_URL: z.preprocess(
    (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
    z.string().url().optional()
  ),

  RPC_URL: z.string().url(),
  PRIVATE_KEY: z.string().regex(/^(0x)?[0-9a-fA-F]{64}$/, "must be a 32-byte hex key"),
  PAYMENT_TOKEN_ADDRESS: address,
  RANDOMNESS_RELAY_ADDRESS: address,
  MIN_ORACLE_BALANCE: baseUnits.default("0"),

  TICKET_PRICE: baseUnits,
  ROUND_CAPACITY: z.coerce.number().int().positive(),
  ROUND_DURATION_SEC: z.coerce.number().int().positive(),
  RANDOMNESS_TIMEOUT_SEC: z.coerce.number().int().positive().default(3600),
  FEE_BPS: bps.default(0),
  MAX_TICKETS_PER_PARTICIPANT: uint.default(0),
  RECOVERY_POLICY: z.enum(["reopen", "cancel"]).default("reopen"),
  CALLER_REWARD_BPS: bps.default(0),
  FEE_RECIPIENT: address,

  KEEPER_ENABLED: flag,
  KEEPER_ADDRESS: optionalAddress,
  KEEPER_INTERVAL_MS: z.coerce.number().int().min(1000).default(15000),
});

export type Env = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid environment:\n  - ${problems.join("\n  - ")}`);
    this.name = "ConfigError";
  }
}

/** Validates a raw environment; throws ConfigError listing every problem. */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`)
    );
  }
  return result.data;
}

/** Default configuration for rounds created without overrides. */
export function roundDefaultsFrom(env: Env): RoundConfig {
  return {
    ticketPrice: env.TICKET_PRICE,
    capacity: env.ROUND_CAPACITY,
    durationSec: env.ROUND_DURATION_SEC,
    timeoutSec: env.RANDOMNESS_TIMEOUT_SEC,
    feeBps: env.FEE_BPS,
    maxTicketsPerParticipant: env.MAX_TICKETS_PER_PARTICIPANT,
    recoveryPolicy: env.RECOVERY_POLICY,
    callerRewardBps: env.CALLER_REWARD_BPS,
    feeRecipient: env.FEE_RECIPIENT.toLowerCase(),
  };
}

/**
 * Loads the root .env (if present) into process.env and validates it.
 */
export function loadEnv(): Env {
  const envPath = path.resolve(__dirname, "../../.env");
  const result = dotenv.config({ path: envPath });

  if (result.error) {
    console.log(
      `⚠️ No .env file found at ${envPath}, using system environment variables`
    );
  } else {
    console.log(`✅ Environment loaded from: ${envPath}`);
  }

  const env = parseEnv(process.env);

  console.log(`[CONFIG] Environment: ${env.NODE_ENV}`);
  console.log(`[CONFIG] Admin API Key length: ${env.ADMIN_API_KEY.length}`);
  console.log(`[CONFIG] Storage: ${env.DATABASE_URL ? "postgres" : "memory"}`);
  console.log(`🌐 RPC URL: ${env.RPC_URL}`);
  console.log(`💳 Payment token: ${env.PAYMENT_TOKEN_ADDRESS}`);
  console.log(`🎲 Randomness relay: ${env.RANDOMNESS_RELAY_ADDRESS}`);

  return env;
}
