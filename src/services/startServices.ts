import { LIVE_STATES } from "../db/roundRepository";
import { LockProvider } from "../utils/distributedLock";
import { describeError } from "../utils/raffleErrors";
import { FulfillmentListener } from "./fulfillmentListener";
import { RaffleKeeper } from "./raffleKeeper";
import { RaffleService } from "./raffleService";
import { RandomnessOracle } from "../types/raffle";

export interface BackgroundSettings {
  keeperEnabled: boolean;
  keeperAddress?: string;
  keeperIntervalMs: number;
}

export interface BackgroundServices {
  keeper: RaffleKeeper | null;
  listener: FulfillmentListener;
  stop(): void;
}

/**
 * Make sure there is a round to enter after a fresh deployment. Idempotent:
 * does nothing while any round is still live.
 */
export async function initializeRaffleRound(service: RaffleService): Promise<void> {
  try {
    console.log(`🎯 [INIT] Checking for a live raffle round...`);
    const live = await service.listRounds(LIVE_STATES);
    if (live.length > 0) {
      console.log(
        `✅ [INIT] Live round(s) found: ${live.map((r) => `#${r.id} ${r.state}`).join(", ")}`
      );
      return;
    }

    console.log(`🚀 [INIT] No live round, creating initial round...`);
    const round = await service.createRound();
    console.log(
      `✅ [INIT] Created round #${round.id} (deadline ${round.deadline}, capacity ${round.capacity})`
    );
  } catch (error) {
    console.error(`❌ [INIT] Failed to initialize raffle round:`, describeError(error));
    console.error(`⚠️ [INIT] Manual round creation may be required via API`);
  }
}

/**
 * Starts the fulfillment listener and, when enabled, the keeper. Called once
 * after the HTTP server is listening.
 */
export async function startServices(
  service: RaffleService,
  oracle: RandomnessOracle,
  locks: LockProvider,
  settings: BackgroundSettings
): Promise<BackgroundServices> {
  console.log(`\n🔄 Initializing background services...`);

  await initializeRaffleRound(service);

  const listener = new FulfillmentListener(oracle, service);
  listener.start();

  let keeper: RaffleKeeper | null = null;
  if (settings.keeperEnabled && settings.keeperAddress) {
    keeper = new RaffleKeeper(service, locks, {
      keeperAddress: settings.keeperAddress,
      intervalMs: settings.keeperIntervalMs,
    });
    keeper.start();
    console.log(`  ✅ keeper scheduled (interval: ${settings.keeperIntervalMs}ms)`);
  } else if (settings.keeperEnabled) {
    console.warn(`  ⏭ keeper disabled: KEEPER_ADDRESS is not set`);
  } else {
    console.log(`  ⏭ keeper disabled (KEEPER_ENABLED=false)`);
  }

  console.log(`\n🎉 Background services initialized`);
  return {
    keeper,
    listener,
    stop() {
      keeper?.stop();
      listener.stop();
    },
  };
}
