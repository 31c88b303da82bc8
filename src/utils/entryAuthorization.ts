import { verifyMessage } from "ethers";

export interface EntryAuthorization {
  roundId: number;
  participant: string;
  ticketCount: number;
  /** Tickets the participant holds in the round before this entry. */
  nonce: number;
}

/** Text a participant signs with personal_sign to buy tickets. */
export function entryAuthorizationMessage(entry: EntryAuthorization): string {
  return [
    `Enter raffle round ${entry.roundId}`,
    `Participant: ${entry.participant.toLowerCase()}`,
    `Tickets: ${entry.ticketCount}`,
    `Nonce: ${entry.nonce}`,
  ].join("\n");
}

export function isSignedByParticipant(
  entry: EntryAuthorization,
  signature: string
): boolean {
  try {
    const signer = verifyMessage(entryAuthorizationMessage(entry), signature);
    return signer.toLowerCase() === entry.participant.toLowerCase();
  } catch {
    // malformed signatures recover no address
    return false;
  }
}
