import express from "express";
import { RaffleController } from "../controllers/raffleController";
import { requireAdminAuth } from "../middleware/auth";
import {
  adminRateLimit,
  publicDataRateLimit,
  raffleActionRateLimit,
} from "../middleware/rateLimiting";
import {
  callerSchema,
  claimSchema,
  createRoundSchema,
  enterRoundSchema,
  listRoundsQuerySchema,
  participantParamsSchema,
  roundParamsSchema,
  ticketParamsSchema,
  validateBody,
  validateParams,
  validateQuery,
} from "../middleware/validation";

export function createRaffleRoutes(
  controller: RaffleController,
  adminApiKey: string
) {
  const router = express.Router();

  // Rounds
  router.post(
    "/rounds",
    adminRateLimit,
    requireAdminAuth(adminApiKey),
    validateBody(createRoundSchema),
    controller.createRound
  );
  router.get(
    "/rounds",
    publicDataRateLimit,
    validateQuery(listRoundsQuerySchema),
    controller.listRounds
  );
  router.get(
    "/rounds/:id",
    publicDataRateLimit,
    validateParams(roundParamsSchema),
    controller.getRound
  );
  router.get(
    "/rounds/:id/timeout",
    publicDataRateLimit,
    validateParams(roundParamsSchema),
    controller.getTimeoutStatus
  );
  router.get(
    "/rounds/:id/events",
    publicDataRateLimit,
    validateParams(roundParamsSchema),
    controller.getEvents
  );
  router.get(
    "/rounds/:id/tickets/:index",
    publicDataRateLimit,
    validateParams(ticketParamsSchema),
    controller.locateTicket
  );
  router.get(
    "/rounds/:id/participants/:address",
    publicDataRateLimit,
    validateParams(participantParamsSchema),
    controller.getParticipant
  );

  // Lifecycle (permissionless)
  router.post(
    "/rounds/:id/entries",
    raffleActionRateLimit,
    validateParams(roundParamsSchema),
    validateBody(enterRoundSchema),
    controller.enterRound
  );
  router.post(
    "/rounds/:id/close",
    raffleActionRateLimit,
    validateParams(roundParamsSchema),
    validateBody(callerSchema),
    controller.closeRound
  );
  router.post(
    "/rounds/:id/finalize",
    raffleActionRateLimit,
    validateParams(roundParamsSchema),
    validateBody(callerSchema),
    controller.finalizeRound
  );
  router.post(
    "/rounds/:id/recover",
    raffleActionRateLimit,
    validateParams(roundParamsSchema),
    validateBody(callerSchema),
    controller.recoverRound
  );

  // Claims
  router.post(
    "/rounds/:id/claims/prize",
    raffleActionRateLimit,
    validateParams(roundParamsSchema),
    validateBody(claimSchema),
    controller.claimPrize
  );
  router.post(
    "/rounds/:id/claims/refund",
    raffleActionRateLimit,
    validateParams(roundParamsSchema),
    validateBody(claimSchema),
    controller.claimRefund
  );
  router.post(
    "/rounds/:id/claims/reward",
    raffleActionRateLimit,
    validateParams(roundParamsSchema),
    validateBody(claimSchema),
    controller.claimReward
  );

  return router;
}
