import { z } from "zod";
import { Request, Response, NextFunction } from "express";

// ===== ZOD VALIDATION SCHEMAS =====

// Ethereum address validation
export const ethereumAddressSchema = z
  .string()
  .trim()
  .regex(/^0x[a-fA-F0-9]{40}$/, "Invalid Ethereum address format")
  .transform((addr) => addr.toLowerCase());

// Positive integer carried in the URL
const positiveIdSchema = z
  .string()
  .regex(/^\d+$/, "Must be a positive integer")
  .refine((val) => {
    const num = Number(val);
    return num >= 1 && num <= Number.MAX_SAFE_INTEGER;
  }, "Must be within valid range");

const ticketIndexSchema = z
  .string()
  .regex(/^\d+$/, "Ticket index must be a non-negative integer")
  .refine(
    (val) => Number(val) <= Number.MAX_SAFE_INTEGER,
    "Ticket index must be within valid range"
  );

// Token amount in base units, as a decimal string
const baseUnitsSchema = z
  .string()
  .regex(/^\d+$/, "Amount must be a whole number of base units")
  .transform((val) => BigInt(val))
  .refine((val) => val > 0n, "Amount must be positive");

const bpsSchema = z
  .number()
  .int("Basis points must be an integer")
  .min(0)
  .max(10_000, "Basis points cannot exceed 10000");

// ===== REQUEST VALIDATION SCHEMAS =====

export const roundParamsSchema = z.object({
  id: positiveIdSchema,
});

export const ticketParamsSchema = z.object({
  id: positiveIdSchema,
  index: ticketIndexSchema,
});

export const participantParamsSchema = z.object({
  id: positiveIdSchema,
  address: z
    .string()
    .regex(/^0x[a-fA-F0-9]{40}$/, "Invalid Ethereum address format"),
});

// POST /rounds - every field overrides the configured default
export const createRoundSchema = z
  .object({
    ticketPrice: baseUnitsSchema,
    capacity: z.number().int().min(1, "Capacity must be at least 1"),
    durationSec: z.number().int().min(1, "Duration must be at least 1 second"),
    timeoutSec: z.number().int().min(1, "Timeout must be at least 1 second"),
    feeBps: bpsSchema,
    maxTicketsPerParticipant: z.number().int().min(0),
    recoveryPolicy: z.enum(["reopen", "cancel"]),
    callerRewardBps: bpsSchema,
    feeRecipient: ethereumAddressSchema,
  })
  .partial()
  .strict();

export type CreateRoundBody = z.infer<typeof createRoundSchema>;

// POST /rounds/:id/entries
export const enterRoundSchema = z.object({
  participant: ethereumAddressSchema,
  ticketCount: z
    .number()
    .int("Ticket count must be an integer")
    .min(1, "Ticket count must be at least 1"),
  nonce: z
    .number()
    .int("Nonce must be an integer")
    .min(0, "Nonce cannot be negative"),
  signature: z
    .string()
    .regex(/^0x[0-9a-fA-F]{130}$/, "Signature must be a 65-byte hex string"),
});

// POST /rounds/:id/{close,finalize,recover}
export const callerSchema = z.object({
  caller: ethereumAddressSchema,
});

// POST /rounds/:id/claims/*
export const claimSchema = z.object({
  participant: ethereumAddressSchema,
});

export const listRoundsQuerySchema = z.object({
  state: z
    .enum(["OPEN", "CLOSED", "CALCULATING", "FINISHED", "CANCELLED"])
    .optional(),
});

// ===== VALIDATION MIDDLEWARE FACTORY =====

type RequestPart = "body" | "query" | "params";

const LABELS: Record<RequestPart, string> = {
  body: "Input",
  query: "Query",
  params: "URL parameter",
};

function validate<T>(part: RequestPart, schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req[part]);

    if (!result.success) {
      const errors = result.error.issues.map((err) => ({
        field: err.path.join("."),
        message: err.message,
      }));

      // Log validation failure for security monitoring
      console.warn(`🚫 [VALIDATION ERROR] ${LABELS[part]} validation failed`, {
        timestamp: new Date().toISOString(),
        ip: req.ip || req.socket.remoteAddress,
        endpoint: `${req.method} ${req.path}`,
        errors,
      });

      return res.status(400).json({
        success: false,
        error: `${LABELS[part]} validation failed`,
        details: errors,
      });
    }

    // Only the body is replaced; params and query stay strings and are
    // converted by the controller.
    if (part === "body") {
      req.body = result.data;
    }
    return next();
  };
}

/**
 * Validates and replaces the request body with the parsed value
 */
export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return validate("body", schema);
}

export function validateQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return validate("query", schema);
}

export function validateParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return validate("params", schema);
}
