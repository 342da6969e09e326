import { TriarbError, roundKeyString } from "@triarb/common";
import type { RoundKey, RoundPayload } from "@triarb/common";

import { tallyRound } from "./tally.js";
import type { ConsensusClient, RoundOutcome } from "./types.js";

type RoundState = {
  period: number;
  submissions: Map<string, RoundPayload>;
  outcome: RoundOutcome | null;
  waiters: ((outcome: RoundOutcome) => void)[];
};

/**
 * In-process substrate shared by every agent of one process. A round ends as
 * soon as a quorum agrees, or once every participant has spoken without one.
 */
export class LocalConsensus implements ConsensusClient {
  private readonly rounds = new Map<string, RoundState>();

  constructor(private readonly participants: readonly string[]) {
    if (participants.length === 0) {
      throw new TriarbError("CONSENSUS_FAILED", "consensus needs at least one participant");
    }
  }

  private state(key: RoundKey): RoundState {
    const id = roundKeyString(key);
    let state = this.rounds.get(id);
    if (state === undefined) {
      state = { period: key.period, submissions: new Map(), outcome: null, waiters: [] };
      this.rounds.set(id, state);
      for (const [other, s] of this.rounds) {
        if (s.period < key.period - 1 && s.outcome !== null) this.rounds.delete(other);
      }
    }
    return state;
  }

  submitPayload(key: RoundKey, payload: RoundPayload): Promise<void> {
    if (payload.round !== key.round) {
      return Promise.reject(
        new TriarbError("CONSENSUS_FAILED", `payload for ${payload.round} sent to ${key.round}`),
      );
    }
    if (!this.participants.includes(payload.sender)) {
      return Promise.reject(
        new TriarbError("CONSENSUS_FAILED", `unknown participant: ${payload.sender}`),
      );
    }

    const state = this.state(key);
    // First submission per sender wins; later ones are ignored.
    if (!state.submissions.has(payload.sender)) {
      state.submissions.set(payload.sender, payload);
    }
    if (state.outcome === null) {
      const outcome = tallyRound(this.participants, state.submissions);
      if (outcome !== null) {
        state.outcome = outcome;
        for (const resolve of state.waiters.splice(0)) resolve(outcome);
      }
    }
    return Promise.resolve();
  }

  awaitRoundEnd(key: RoundKey): Promise<RoundOutcome> {
    const state = this.state(key);
    if (state.outcome !== null) return Promise.resolve(state.outcome);
    return new Promise((resolve) => {
      state.waiters.push(resolve);
    });
  }
}
