import { ROUND_NAMES, TriarbError, initialSynchronizedData } from "@triarb/common";
import { describe, expect, it } from "vitest";

import { applyPayload, nextRound, roundEvent } from "./rounds.js";

const sync = initialSynchronizedData({
  safe_contract_address: "0xsafe",
  participants: ["a"],
});

describe("nextRound", () => {
  it.each([
    ["quote_check", "DONE", "decision_making"],
    ["quote_check", "NO_MAJORITY", "quote_check"],
    ["decision_making", "DONE", "reset"],
    ["decision_making", "TRANSACT", "tx_preparation"],
    ["decision_making", "NO_MAJORITY", "decision_making"],
    ["tx_preparation", "DONE", "settlement"],
    ["tx_preparation", "ERROR", "reset"],
    ["tx_preparation", "NO_MAJORITY", "tx_preparation"],
    ["settlement", "DONE", "reset"],
    ["settlement", "ERROR", "reset"],
    ["settlement", "NO_MAJORITY", "settlement"],
  ] as const)("%s on %s goes to %s", (round, event, next) => {
    expect(nextRound(round, event)).toBe(next);
  });

  it("retries every round without a majority", () => {
    for (const round of ROUND_NAMES) {
      expect(nextRound(round, "NO_MAJORITY")).toBe(round);
    }
  });

  it("rejects an event a round never ends with", () => {
    try {
      nextRound("quote_check", "TRANSACT");
      throw new Error("expected nextRound to throw");
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(TriarbError);
      expect((err as TriarbError).code).toBe("ROUND_STATE_INVALID");
    }
  });
});

describe("roundEvent", () => {
  it("maps a missing tx hash to ERROR", () => {
    expect(
      roundEvent({
        version: 1,
        round: "tx_preparation",
        sender: "a",
        tx_submitter: "tx_preparation",
        tx_hash: null,
      }),
    ).toBe("ERROR");
    expect(
      roundEvent({
        version: 1,
        round: "tx_preparation",
        sender: "a",
        tx_submitter: "tx_preparation",
        tx_hash: "ab",
      }),
    ).toBe("DONE");
  });

  it("maps a missing final hash to ERROR", () => {
    expect(roundEvent({ version: 1, round: "settlement", sender: "a", final_tx_hash: null })).toBe(
      "ERROR",
    );
  });

  it("passes the decision through", () => {
    expect(roundEvent({ version: 1, round: "decision_making", sender: "a", event: "TRANSACT" })).toBe(
      "TRANSACT",
    );
  });
});

describe("applyPayload", () => {
  it("writes only the quote fields", () => {
    const next = applyPayload(sync, {
      version: 1,
      round: "quote_check",
      sender: "a",
      prices: [1, 2, 3],
      amounts: [1n, 2n, 3n, 4n],
    });
    expect(next).toEqual({ ...sync, prices: [1, 2, 3], amounts: [1n, 2n, 3n, 4n] });
  });

  it("records the decision event", () => {
    const next = applyPayload(sync, {
      version: 1,
      round: "decision_making",
      sender: "a",
      event: "DONE",
    });
    expect(next.event).toBe("DONE");
    expect(next.amounts).toEqual([]);
  });

  it("records the tx hash and submitter", () => {
    const next = applyPayload(sync, {
      version: 1,
      round: "tx_preparation",
      sender: "a",
      tx_submitter: "tx_preparation",
      tx_hash: "ab",
    });
    expect(next.tx_hash).toBe("ab");
    expect(next.tx_submitter).toBe("tx_preparation");
    expect(next.final_tx_hash).toBeNull();
  });
});
