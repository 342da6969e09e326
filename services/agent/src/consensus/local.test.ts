import { TriarbError } from "@triarb/common";
import type { DecisionPayload, RoundKey } from "@triarb/common";
import { describe, expect, it } from "vitest";

import { AGENTS } from "../__fixtures__/agent.js";
import { LocalConsensus } from "./local.js";

const key: RoundKey = { period: 0, round: "decision_making" };

function decision(sender: string, event: "DONE" | "TRANSACT"): DecisionPayload {
  return { version: 1, round: "decision_making", sender, event };
}

describe("LocalConsensus", () => {
  it("commits once a quorum agrees", async () => {
    const consensus = new LocalConsensus(AGENTS);
    const ended = consensus.awaitRoundEnd(key);

    await consensus.submitPayload(key, decision(AGENTS[0], "TRANSACT"));
    await consensus.submitPayload(key, decision(AGENTS[1], "TRANSACT"));
    await consensus.submitPayload(key, decision(AGENTS[2], "TRANSACT"));

    expect(await ended).toEqual({ status: "committed", payload: decision(AGENTS[0], "TRANSACT") });
  });

  it("reports no majority once a quorum is out of reach", async () => {
    const consensus = new LocalConsensus(AGENTS);

    await consensus.submitPayload(key, decision(AGENTS[0], "TRANSACT"));
    await consensus.submitPayload(key, decision(AGENTS[1], "TRANSACT"));
    await consensus.submitPayload(key, decision(AGENTS[2], "DONE"));
    await consensus.submitPayload(key, decision(AGENTS[3], "DONE"));

    expect(await consensus.awaitRoundEnd(key)).toEqual({ status: "no_majority" });
  });

  it("counts only the first submission of each sender", async () => {
    const consensus = new LocalConsensus(AGENTS);

    await consensus.submitPayload(key, decision(AGENTS[0], "DONE"));
    await consensus.submitPayload(key, decision(AGENTS[0], "TRANSACT"));
    await consensus.submitPayload(key, decision(AGENTS[1], "TRANSACT"));
    await consensus.submitPayload(key, decision(AGENTS[2], "TRANSACT"));
    await consensus.submitPayload(key, decision(AGENTS[3], "TRANSACT"));

    expect(await consensus.awaitRoundEnd(key)).toEqual({
      status: "committed",
      payload: decision(AGENTS[1], "TRANSACT"),
    });
  });

  it("commits a single agent's own payload", async () => {
    const consensus = new LocalConsensus([AGENTS[0]]);

    await consensus.submitPayload(key, decision(AGENTS[0], "DONE"));

    expect(await consensus.awaitRoundEnd(key)).toEqual({
      status: "committed",
      payload: decision(AGENTS[0], "DONE"),
    });
  });

  it("keeps rounds of different periods apart", async () => {
    const consensus = new LocalConsensus([AGENTS[0]]);
    const next: RoundKey = { period: 1, round: "decision_making" };

    await consensus.submitPayload(key, decision(AGENTS[0], "DONE"));
    await consensus.submitPayload(next, decision(AGENTS[0], "TRANSACT"));

    expect(await consensus.awaitRoundEnd(next)).toEqual({
      status: "committed",
      payload: decision(AGENTS[0], "TRANSACT"),
    });
  });

  it("rejects an unknown sender", async () => {
    const consensus = new LocalConsensus([AGENTS[0]]);

    await expect(consensus.submitPayload(key, decision(AGENTS[1], "DONE"))).rejects.toBeInstanceOf(
      TriarbError,
    );
  });

  it("rejects a payload for another round", async () => {
    const consensus = new LocalConsensus([AGENTS[0]]);

    await expect(
      consensus.submitPayload({ period: 0, round: "settlement" }, decision(AGENTS[0], "DONE")),
    ).rejects.toMatchObject({ code: "CONSENSUS_FAILED" });
  });
});
