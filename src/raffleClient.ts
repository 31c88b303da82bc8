import { ethers } from "ethers";
import erc20Abi from "./constants/ERC20ABI.json";
import relayAbi from "./constants/RandomnessRelayABI.json";
import {
  FulfillmentHandler,
  PaymentToken,
  RandomnessOracle,
  RandomnessRequest,
} from "./types/raffle";
import { RaffleError, describeError } from "./utils/raffleErrors";

/** Relay reverts that mean the randomness subscription cannot pay. */
const FUNDING_ERRORS = new Set(["InsufficientSubscriptionBalance"]);

/** Decodes a contract revert into its custom error, when the ABI knows it. */
export function parseCustomError(
  contract: ethers.BaseContract,
  err: unknown
): { name: string; args: unknown[] } | null {
  if (!ethers.isCallException(err) || !err.data) return null;
  try {
    const parsed = contract.interface.parseError(err.data);
    return parsed ? { name: parsed.name, args: [...parsed.args] } : null;
  } catch (parseErr) {
    console.warn("⚠️ Could not decode revert data:", describeError(parseErr));
    return null;
  }
}

function revertMessage(
  contract: ethers.BaseContract,
  method: string,
  err: unknown
): string {
  const parsed = parseCustomError(contract, err);
  if (parsed) {
    return `${method} reverted with custom error ${parsed.name} ${JSON.stringify(
      parsed.args,
      (_k, v: unknown) => (typeof v === "bigint" ? v.toString() : v)
    )}`;
  }
  return `${method} failed: ${describeError(err)}`;
}

async function send(
  contract: ethers.Contract,
  method: string,
  args: unknown[],
  confirmations: number
): Promise<ethers.TransactionReceipt> {
  const fn = contract.getFunction(method);
  // dry-run first so reverts surface with their custom error, without gas spent
  await fn.staticCall(...args);
  const tx: ethers.ContractTransactionResponse = await fn.send(...args);
  const receipt = await tx.wait(confirmations);
  if (!receipt || receipt.status !== 1) {
    throw new Error(`${method} transaction ${tx.hash} did not succeed`);
  }
  return receipt;
}

/**
 * ERC-20 payment token. Entry payments are pulled from the participant into
 * the treasury (the signer's address), which needs a prior approval; payouts
 * are plain transfers out of the treasury.
 */
export class EthersPaymentToken implements PaymentToken {
  constructor(
    private readonly token: ethers.Contract,
    private readonly treasury: string,
    private readonly confirmations = 1
  ) {}

  async transferFrom(from: string, amount: bigint): Promise<void> {
    try {
      const receipt = await send(
        this.token,
        "transferFrom",
        [from, this.treasury, amount],
        this.confirmations
      );
      console.log(`💳 Collected ${amount} from ${from}. Tx: ${receipt.hash}`);
    } catch (err) {
      throw new Error(revertMessage(this.token, "transferFrom", err));
    }
  }

  async transfer(to: string, amount: bigint): Promise<void> {
    try {
      const receipt = await send(
        this.token,
        "transfer",
        [to, amount],
        this.confirmations
      );
      console.log(`💸 Paid ${amount} to ${to}. Tx: ${receipt.hash}`);
    } catch (err) {
      throw new Error(revertMessage(this.token, "transfer", err));
    }
  }
}

/**
 * On-chain randomness relay. A request is a transaction whose receipt carries
 * the request id; the relay later emits RandomnessDelivered for that id.
 */
export class EthersRandomnessOracle implements RandomnessOracle {
  constructor(
    private readonly relay: ethers.Contract,
    private readonly minBalance: bigint = 0n,
    private readonly confirmations = 1
  ) {}

  async requestRandomWords({ roundId, numWords }: RandomnessRequest): Promise<string> {
    const balance: bigint = await this.relay.getFunction("subscriptionBalance")();
    if (balance <= this.minBalance) {
      throw new RaffleError(
        "INSUFFICIENT_ORACLE_FUNDING",
        `Randomness subscription balance ${balance} is at or below ${this.minBalance}`
      );
    }

    let receipt: ethers.TransactionReceipt;
    try {
      receipt = await send(
        this.relay,
        "requestRandomness",
        [roundId, numWords],
        this.confirmations
      );
    } catch (err) {
      const parsed = parseCustomError(this.relay, err);
      if (parsed && FUNDING_ERRORS.has(parsed.name)) {
        throw new RaffleError(
          "INSUFFICIENT_ORACLE_FUNDING",
          revertMessage(this.relay, "requestRandomness", err)
        );
      }
      throw new Error(revertMessage(this.relay, "requestRandomness", err));
    }

    for (const log of receipt.logs) {
      const parsed = this.relay.interface.parseLog(log);
      if (parsed?.name === "RandomnessRequested") {
        const requestId = ethers.toBigInt(parsed.args.getValue("requestId"));
        console.log(
          `📦 Randomness requested for round ${roundId}: id ${requestId} (tx ${receipt.hash})`
        );
        return requestId.toString();
      }
    }
    throw new Error(
      `RandomnessRequested event missing from receipt ${receipt.hash}`
    );
  }

  onFulfillment(handler: FulfillmentHandler): () => void {
    const listener = (requestId: bigint, randomWords: ethers.Result) => {
      handler(
        requestId.toString(),
        randomWords.toArray().map((w) => ethers.toBigInt(w))
      );
    };

    this.relay.on("RandomnessDelivered", listener).catch((err: unknown) => {
      console.error(
        "❌ Failed to subscribe to RandomnessDelivered:",
        describeError(err)
      );
    });

    return () => {
      this.relay.off("RandomnessDelivered", listener).catch((err: unknown) => {
        console.error(
          "❌ Failed to unsubscribe from RandomnessDelivered:",
          describeError(err)
        );
      });
    };
  }
}

export interface ChainClients {
  provider: ethers.JsonRpcProvider;
  signer: ethers.Wallet;
  payments: EthersPaymentToken;
  oracle: EthersRandomnessOracle;
}

export interface ChainSettings {
  rpcUrl: string;
  privateKey: string;
  paymentTokenAddress: string;
  relayAddress: string;
  minOracleBalance: bigint;
}

export function createChainClients(settings: ChainSettings): ChainClients {
  for (const [name, value] of [
    ["payment token", settings.paymentTokenAddress],
    ["randomness relay", settings.relayAddress],
  ]) {
    if (!ethers.isAddress(value)) {
      throw new Error(`Invalid ${name} address: ${value}`);
    }
  }

  const provider = new ethers.JsonRpcProvider(settings.rpcUrl);
  const signer = new ethers.Wallet(settings.privateKey, provider);
  const token = new ethers.Contract(settings.paymentTokenAddress, erc20Abi, signer);
  const relay = new ethers.Contract(settings.relayAddress, relayAbi, signer);

  console.log(`🔑 Treasury / signer: ${signer.address}`);
  return {
    provider,
    signer,
    payments: new EthersPaymentToken(token, signer.address),
    oracle: new EthersRandomnessOracle(relay, settings.minOracleBalance),
  };
}
