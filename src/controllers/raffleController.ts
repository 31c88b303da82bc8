import { Request, Response } from "express";
import { CreateRoundBody } from "../middleware/validation";
import { RaffleService } from "../services/raffleService";
import { CallerRequest, ClaimRequest, EnterRoundRequest } from "../types";
import { ClaimReceipt, RoundState } from "../types/raffle";
import {
  auditAction,
  auditSuccess,
  auditFailure,
  auditSecurity,
  AuditActionType,
  auditLogger,
  sanitizeErrorResponse,
  createErrorResponse,
} from "../utils/auditLogger";
import { isSignedByParticipant } from "../utils/entryAuthorization";
import {
  RaffleError,
  describeError,
  httpStatusFor,
  isRaffleError,
} from "../utils/raffleErrors";

const ROUND_STATES: readonly string[] = Object.values(RoundState);

function isRoundState(value: unknown): value is RoundState {
  return typeof value === "string" && ROUND_STATES.includes(value);
}

/**
 * Precondition failures carry their code and a matching status; anything
 * else is logged in full and answered with a sanitised 500.
 */
function sendError(
  req: Request,
  res: Response,
  err: unknown,
  fallback: string,
  action?: AuditActionType,
  startTime?: number
): void {
  if (action) {
    auditFailure(action, req, describeError(err), { params: req.params }, startTime);
  }

  if (isRaffleError(err)) {
    res.status(httpStatusFor(err.code)).json({
      success: false,
      error: err.message,
      code: err.code,
    });
    return;
  }

  const { logDetails } = sanitizeErrorResponse(err, fallback);
  console.error(`${fallback}:`, logDetails);
  res.status(500).json(createErrorResponse(err, fallback));
}

export function createRaffleController(service: RaffleService) {
  async function claim(
    req: Request,
    res: Response,
    action: AuditActionType,
    run: (roundId: number, participant: string) => Promise<ClaimReceipt>
  ): Promise<void> {
    const startTime = auditLogger.startTimer();
    const roundId = Number(req.params.id);
    const { participant }: ClaimRequest = req.body;
    try {
      auditAction(action, req, { roundId, participant });
      const receipt = await run(roundId, participant);
      auditSuccess(action, req, { roundId, ...receipt }, startTime);
      res.json({ success: true, data: receipt });
    } catch (err) {
      sendError(req, res, err, "Failed to process claim", action, startTime);
    }
  }

  return {
    // Create a round; body fields override the configured defaults
    async createRound(req: Request, res: Response): Promise<void> {
      const startTime = auditLogger.startTimer();
      const overrides: CreateRoundBody = req.body;
      try {
        auditAction(AuditActionType.CREATE_ROUND, req, { ...overrides });
        const round = await service.createRound(overrides);
        auditSuccess(
          AuditActionType.CREATE_ROUND,
          req,
          { roundId: round.id, deadline: round.deadline },
          startTime
        );
        res.status(201).json({ success: true, data: round });
      } catch (err) {
        sendError(
          req,
          res,
          err,
          "Failed to create round",
          AuditActionType.CREATE_ROUND,
          startTime
        );
      }
    },

    async listRounds(req: Request, res: Response): Promise<void> {
      try {
        const { state } = req.query;
        const rounds = await service.listRounds(
          isRoundState(state) ? [state] : undefined
        );
        res.json({ success: true, data: rounds });
      } catch (err) {
        sendError(req, res, err, "Failed to fetch rounds");
      }
    },

    async getRound(req: Request, res: Response): Promise<void> {
      try {
        const round = await service.getRound(Number(req.params.id));
        res.json({ success: true, data: round });
      } catch (err) {
        sendError(req, res, err, "Failed to fetch round");
      }
    },

    async getTimeoutStatus(req: Request, res: Response): Promise<void> {
      try {
        const status = await service.timeoutStatus(Number(req.params.id));
        res.json({ success: true, data: status });
      } catch (err) {
        sendError(req, res, err, "Failed to fetch timeout status");
      }
    },

    async getEvents(req: Request, res: Response): Promise<void> {
      try {
        const events = await service.events(Number(req.params.id));
        res.json({ success: true, data: events });
      } catch (err) {
        sendError(req, res, err, "Failed to fetch round events");
      }
    },

    // Owner of one ticket index
    async locateTicket(req: Request, res: Response): Promise<void> {
      try {
        const ticketIndex = Number(req.params.index);
        const owner = await service.locate(Number(req.params.id), ticketIndex);
        res.json({ success: true, data: { ticketIndex, owner } });
      } catch (err) {
        sendError(req, res, err, "Failed to locate ticket");
      }
    },

    async getParticipant(req: Request, res: Response): Promise<void> {
      try {
        const view = await service.participant(
          Number(req.params.id),
          req.params.address
        );
        res.json({ success: true, data: view });
      } catch (err) {
        sendError(req, res, err, "Failed to fetch participant");
      }
    },

    async enterRound(req: Request, res: Response): Promise<void> {
      const startTime = auditLogger.startTimer();
      const roundId = Number(req.params.id);
      const { participant, ticketCount, nonce, signature }: EnterRoundRequest =
        req.body;
      try {
        auditAction(AuditActionType.ENTER_ROUND, req, {
          roundId,
          participant,
          ticketCount,
          nonce,
        });
        if (
          !isSignedByParticipant({ roundId, participant, ticketCount, nonce }, signature)
        ) {
          auditSecurity(AuditActionType.ENTER_ROUND, req, {
            roundId,
            participant,
            reason: "entry signature does not match participant",
          });
          throw new RaffleError(
            "INVALID_SIGNATURE",
            "Entry is not signed by the participant"
          );
        }
        const result = await service.enter(roundId, participant, ticketCount, {
          nonce,
        });
        auditSuccess(
          AuditActionType.ENTER_ROUND,
          req,
          {
            roundId,
            participant: result.participant,
            rangeStart: result.rangeStart,
            rangeEnd: result.rangeEnd,
            amountPaid: result.amountPaid,
          },
          startTime
        );
        res.status(201).json({ success: true, data: result });
      } catch (err) {
        sendError(
          req,
          res,
          err,
          "Failed to enter round",
          AuditActionType.ENTER_ROUND,
          startTime
        );
      }
    },

    async closeRound(req: Request, res: Response): Promise<void> {
      const startTime = auditLogger.startTimer();
      const roundId = Number(req.params.id);
      const { caller }: CallerRequest = req.body;
      try {
        auditAction(AuditActionType.CLOSE_ROUND, req, { roundId, caller });
        const outcome = await service.close(roundId, caller);
        auditSuccess(
          AuditActionType.CLOSE_ROUND,
          req,
          { roundId, ...outcome },
          startTime
        );
        res.json({ success: true, data: outcome });
      } catch (err) {
        sendError(
          req,
          res,
          err,
          "Failed to close round",
          AuditActionType.CLOSE_ROUND,
          startTime
        );
      }
    },

    async finalizeRound(req: Request, res: Response): Promise<void> {
      const startTime = auditLogger.startTimer();
      const roundId = Number(req.params.id);
      const { caller }: CallerRequest = req.body;
      try {
        auditAction(AuditActionType.FINALIZE_ROUND, req, { roundId, caller });
        const result = await service.finalize(roundId, caller);
        auditSuccess(
          AuditActionType.FINALIZE_ROUND,
          req,
          { roundId, ...result },
          startTime
        );
        res.json({ success: true, data: result });
      } catch (err) {
        sendError(
          req,
          res,
          err,
          "Failed to finalize round",
          AuditActionType.FINALIZE_ROUND,
          startTime
        );
      }
    },

    async recoverRound(req: Request, res: Response): Promise<void> {
      const startTime = auditLogger.startTimer();
      const roundId = Number(req.params.id);
      const { caller }: CallerRequest = req.body;
      try {
        auditAction(AuditActionType.RECOVER_ROUND, req, { roundId, caller });
        const outcome = await service.recover(roundId, caller);
        auditSuccess(
          AuditActionType.RECOVER_ROUND,
          req,
          { roundId, ...outcome },
          startTime
        );
        res.json({ success: true, data: outcome });
      } catch (err) {
        sendError(
          req,
          res,
          err,
          "Failed to recover round",
          AuditActionType.RECOVER_ROUND,
          startTime
        );
      }
    },

    async claimPrize(req: Request, res: Response): Promise<void> {
      await claim(req, res, AuditActionType.CLAIM_PRIZE, (id, who) =>
        service.claimPrize(id, who)
      );
    },

    async claimRefund(req: Request, res: Response): Promise<void> {
      await claim(req, res, AuditActionType.CLAIM_REFUND, (id, who) =>
        service.claimRefund(id, who)
      );
    },

    async claimReward(req: Request, res: Response): Promise<void> {
      await claim(req, res, AuditActionType.CLAIM_REWARD, (id, who) =>
        service.claimReward(id, who)
      );
    },
  };
}

export type RaffleController = ReturnType<typeof createRaffleController>;
