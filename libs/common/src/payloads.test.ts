import { describe, expect, it } from "vitest";

import { TriarbError } from "./errors.js";
import { decodePayload, encodePayload, payloadContent } from "./payloads.js";
import type { QuoteCheckPayload } from "./payloads.js";

const quote: QuoteCheckPayload = {
  version: 1,
  sender: "agent-a",
  round: "quote_check",
  prices: [0.0005, 1200, 1.75],
  amounts: [100_000_000n, 50_000n, 60_000_000n, 105_000_000n],
};

describe("encodePayload", () => {
  it("writes fields in a fixed order with bigints as strings", () => {
    expect(encodePayload(quote)).toBe(
      '{"version":1,"round":"quote_check","sender":"agent-a","prices":[0.0005,1200,1.75],"amounts":["100000000","50000","60000000","105000000"]}',
    );
  });

  it("leaves the sender out of the agreed content", () => {
    const other = { ...quote, sender: "agent-b" };
    expect(payloadContent(other)).toBe(payloadContent(quote));
    expect(encodePayload(other)).not.toBe(encodePayload(quote));
  });
});

describe("decodePayload", () => {
  it("restores a quote payload", () => {
    const decoded = decodePayload(encodePayload(quote));
    expect(decoded).toEqual(quote);
  });

  it("accepts a null tx hash", () => {
    const decoded = decodePayload(
      '{"version":1,"round":"tx_preparation","sender":"a","tx_submitter":"tx_preparation","tx_hash":null}',
    );
    expect(decoded).toEqual({
      version: 1,
      round: "tx_preparation",
      sender: "a",
      tx_submitter: "tx_preparation",
      tx_hash: null,
    });
  });

  it.each([
    ['{"version":2,"round":"settlement","sender":"a","final_tx_hash":null}'],
    ['{"version":1,"round":"decision_making","sender":"a","event":"MAYBE"}'],
    ['{"version":1,"round":"decision_making","sender":"a","event":"ERROR"}'],
    ['{"version":1,"round":"decision_making","sender":"a","event":"NO_MAJORITY"}'],
    ['{"version":1,"round":"quote_check","sender":"a","prices":[1,2,3],"amounts":[]}'],
    ['{"version":1,"round":"quote_check","sender":"a","prices":[],"amounts":[1]}'],
    ['{"version":1,"round":"unknown","sender":"a"}'],
    ["not json"],
  ])("rejects %s", (raw) => {
    try {
      decodePayload(raw);
      throw new Error("expected decodePayload to throw");
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(TriarbError);
      expect((err as TriarbError).code).toBe("PAYLOAD_INVALID");
    }
  });
});
