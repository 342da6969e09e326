import { setTimeout as delay } from "node:timers/promises";

import { TriarbError, decodePayload, encodePayload } from "@triarb/common";
import type { RoundKey, RoundPayload } from "@triarb/common";
import type { createClient } from "redis";

import type { Logger } from "../log.js";
import { tallyRound } from "./tally.js";
import type { ConsensusClient, RoundOutcome } from "./types.js";

export type RedisClient = ReturnType<typeof createClient>;

export type RoundStore = {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
};

const SUBMISSION_TTL_SECONDS = 3_600;

/**
 * Keys are scoped by `run_id` so that votes left by an earlier run, which
 * also started at period 0, never count towards the current one.
 */
export function submissionKey(run_id: string, key: RoundKey, sender: string): string {
  return `round:${run_id}:${String(key.period)}:${key.round}:${sender.toLowerCase()}`;
}

export function redisRoundStore(redis: RedisClient): RoundStore {
  return {
    async get(key) {
      try {
        return await redis.get(key);
      } catch (err: unknown) {
        throw new TriarbError("REDIS_READ_FAILED", "failed to read round submission", {
          cause: err,
        });
      }
    },
    async set(key, value, ttlSeconds) {
      try {
        await redis.set(key, value, { EX: ttlSeconds });
      } catch (err: unknown) {
        throw new TriarbError("REDIS_WRITE_FAILED", "failed to write round submission", {
          cause: err,
        });
      }
    },
  };
}

export type RedisConsensusOptions = {
  run_id: string;
  participants: readonly string[];
  poll_interval_ms: number;
  timeout_ms: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
};

/**
 * Agents publish their payloads under per-sender keys and poll until a quorum
 * of identical content appears. A round that times out has no majority.
 */
export class RedisConsensus implements ConsensusClient {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly store: RoundStore,
    private readonly opts: RedisConsensusOptions,
  ) {
    if (opts.participants.length === 0) {
      throw new TriarbError("CONSENSUS_FAILED", "consensus needs at least one participant");
    }
    if (opts.run_id.length === 0) {
      throw new TriarbError("CONSENSUS_FAILED", "redis consensus needs a run id");
    }
    this.sleep = opts.sleep ?? ((ms) => delay(ms));
    this.now = opts.now ?? (() => Date.now());
  }

  async submitPayload(key: RoundKey, payload: RoundPayload): Promise<void> {
    if (payload.round !== key.round) {
      throw new TriarbError("CONSENSUS_FAILED", `payload for ${payload.round} sent to ${key.round}`);
    }
    await this.store.set(
      submissionKey(this.opts.run_id, key, payload.sender),
      encodePayload(payload),
      SUBMISSION_TTL_SECONDS,
    );
  }

  private async readSubmissions(key: RoundKey): Promise<Map<string, RoundPayload>> {
    const submissions = new Map<string, RoundPayload>();
    for (const sender of this.opts.participants) {
      const raw = await this.store.get(submissionKey(this.opts.run_id, key, sender));
      if (raw == null) continue;
      let payload: RoundPayload;
      try {
        payload = decodePayload(raw);
      } catch (err: unknown) {
        if (!(err instanceof TriarbError)) throw err;
        // An unreadable entry counts as no vote from that sender.
        this.opts.logger?.log("warn", "skipping invalid submission", {
          period: key.period,
          round: key.round,
          sender,
          code: err.code,
          error: err.message,
        });
        continue;
      }
      // A payload signed for another sender or round does not count as a vote.
      if (payload.sender.toLowerCase() !== sender.toLowerCase() || payload.round !== key.round) {
        continue;
      }
      submissions.set(sender, payload);
    }
    return submissions;
  }

  async awaitRoundEnd(key: RoundKey): Promise<RoundOutcome> {
    const deadline = this.now() + this.opts.timeout_ms;
    for (;;) {
      const outcome = tallyRound(this.opts.participants, await this.readSubmissions(key));
      if (outcome !== null) return outcome;
      if (this.now() >= deadline) return { status: "no_majority" };
      await this.sleep(this.opts.poll_interval_ms);
    }
  }
}
