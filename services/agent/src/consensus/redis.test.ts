import { TriarbError, encodePayload } from "@triarb/common";
import type { DecisionPayload, RoundKey } from "@triarb/common";
import { describe, expect, it } from "vitest";

import { AGENTS, captureLogger } from "../__fixtures__/agent.js";
import { RedisConsensus, submissionKey } from "./redis.js";
import type { RoundStore } from "./redis.js";

const key: RoundKey = { period: 3, round: "decision_making" };
const RUN = "run-b";

function decision(sender: string, event: "DONE" | "TRANSACT"): DecisionPayload {
  return { version: 1, round: "decision_making", sender, event };
}

class MapStore implements RoundStore {
  readonly data = new Map<string, string>();
  readonly ttls = new Map<string, number>();

  get(key: string): Promise<string | null> {
    return Promise.resolve(this.data.get(key) ?? null);
  }

  set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.data.set(key, value);
    this.ttls.set(key, ttlSeconds);
    return Promise.resolve();
  }
}

function fakeClock(): { now: () => number; sleep: (ms: number) => Promise<void>; slept: number[] } {
  let t = 0;
  const slept: number[] = [];
  return {
    now: () => t,
    sleep: (ms) => {
      slept.push(ms);
      t += ms;
      return Promise.resolve();
    },
    slept,
  };
}

describe("submissionKey", () => {
  it("scopes a submission by run, period, round and sender", () => {
    expect(submissionKey(RUN, key, "0xABC")).toBe("round:run-b:3:decision_making:0xabc");
  });
});

describe("RedisConsensus", () => {
  it("stores the encoded payload under the sender's key", async () => {
    const store = new MapStore();
    const consensus = new RedisConsensus(store, {
      run_id: RUN,
      participants: AGENTS,
      poll_interval_ms: 10,
      timeout_ms: 100,
    });

    await consensus.submitPayload(key, decision(AGENTS[0], "DONE"));

    const stored = submissionKey(RUN, key, AGENTS[0]);
    expect(store.data.get(stored)).toBe(encodePayload(decision(AGENTS[0], "DONE")));
    expect(store.ttls.get(stored)).toBe(3_600);
  });

  it("commits once a quorum of identical payloads is visible", async () => {
    const store = new MapStore();
    const clock = fakeClock();
    const consensus = new RedisConsensus(store, {
      run_id: RUN,
      participants: AGENTS,
      poll_interval_ms: 10,
      timeout_ms: 100,
      ...clock,
    });
    for (const agent of AGENTS.slice(0, 3)) {
      await consensus.submitPayload(key, decision(agent, "TRANSACT"));
    }

    expect(await consensus.awaitRoundEnd(key)).toEqual({
      status: "committed",
      payload: decision(AGENTS[0], "TRANSACT"),
    });
    expect(clock.slept).toEqual([]);
  });

  it("times out without a majority", async () => {
    const store = new MapStore();
    const clock = fakeClock();
    const consensus = new RedisConsensus(store, {
      run_id: RUN,
      participants: AGENTS,
      poll_interval_ms: 10,
      timeout_ms: 30,
      ...clock,
    });
    await consensus.submitPayload(key, decision(AGENTS[0], "TRANSACT"));

    expect(await consensus.awaitRoundEnd(key)).toEqual({ status: "no_majority" });
    expect(clock.slept).toEqual([10, 10, 10]);
  });

  it("ignores a payload stored under another sender's key", async () => {
    const store = new MapStore();
    const consensus = new RedisConsensus(store, {
      run_id: RUN,
      participants: [AGENTS[0]],
      poll_interval_ms: 10,
      timeout_ms: 0,
      ...fakeClock(),
    });
    await store.set(submissionKey(RUN, key, AGENTS[0]), encodePayload(decision(AGENTS[1], "DONE")), 60);

    expect(await consensus.awaitRoundEnd(key)).toEqual({ status: "no_majority" });
  });

  it("skips an unreadable entry and still commits", async () => {
    const store = new MapStore();
    const logger = captureLogger();
    const consensus = new RedisConsensus(store, {
      run_id: RUN,
      participants: AGENTS,
      poll_interval_ms: 10,
      timeout_ms: 100,
      logger,
      ...fakeClock(),
    });
    await store.set(submissionKey(RUN, key, AGENTS[0]), "garbage", 60);
    for (const agent of AGENTS.slice(1)) {
      await consensus.submitPayload(key, decision(agent, "DONE"));
    }

    expect(await consensus.awaitRoundEnd(key)).toEqual({
      status: "committed",
      payload: decision(AGENTS[1], "DONE"),
    });
    expect(logger.entries[0]?.message).toBe("skipping invalid submission");
    expect(logger.entries[0]?.meta?.code).toBe("PAYLOAD_INVALID");
  });

  it("does not count votes left by an earlier run", async () => {
    const store = new MapStore();
    const options = { participants: AGENTS, poll_interval_ms: 10, timeout_ms: 0 };
    const earlier = new RedisConsensus(store, { run_id: "run-a", ...options, ...fakeClock() });
    for (const agent of AGENTS.slice(0, 3)) {
      await earlier.submitPayload(key, decision(agent, "TRANSACT"));
    }

    const current = new RedisConsensus(store, { run_id: RUN, ...options, ...fakeClock() });
    await current.submitPayload(key, decision(AGENTS[0], "DONE"));

    expect(await current.awaitRoundEnd(key)).toEqual({ status: "no_majority" });
  });

  it("requires a run id", () => {
    expect(
      () =>
        new RedisConsensus(new MapStore(), {
          run_id: "",
          participants: AGENTS,
          poll_interval_ms: 10,
          timeout_ms: 100,
        }),
    ).toThrow(TriarbError);
  });
});
