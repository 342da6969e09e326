import type { RoundKey, RoundPayload } from "@triarb/common";

export type RoundOutcome =
  | { status: "committed"; payload: RoundPayload }
  | { status: "no_majority" };

/**
 * The substrate that turns per-agent payloads into one agreed value per round.
 */
export interface ConsensusClient {
  submitPayload(key: RoundKey, payload: RoundPayload): Promise<void>;
  awaitRoundEnd(key: RoundKey): Promise<RoundOutcome>;
}
