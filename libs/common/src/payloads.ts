import { TriarbError, invariant } from "./errors.js";
import { jsonStringify } from "./json.js";
import { DECISION_EVENTS, type DecisionEvent, type RoundName } from "./round.js";

export const PAYLOAD_VERSION = 1;

type PayloadBase = {
  version: typeof PAYLOAD_VERSION;
  sender: string;
};

export type QuoteCheckPayload = PayloadBase & {
  round: "quote_check";
  prices: number[];
  amounts: bigint[];
};

export type DecisionPayload = PayloadBase & {
  round: "decision_making";
  event: DecisionEvent;
};

export type TxPreparationPayload = PayloadBase & {
  round: "tx_preparation";
  tx_submitter: string;
  tx_hash: string | null;
};

export type SettlementPayload = PayloadBase & {
  round: "settlement";
  final_tx_hash: string | null;
};

export type RoundPayload =
  | QuoteCheckPayload
  | DecisionPayload
  | TxPreparationPayload
  | SettlementPayload;

export type PayloadOf<R extends RoundName> = Extract<RoundPayload, { round: R }>;

function ensureObject(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new TriarbError("PAYLOAD_INVALID", "payload is not an object");
  }
  return value as Record<string, unknown>;
}

function asString(value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new TriarbError("PAYLOAD_INVALID", `payload.${field} not a string`);
  }
  return value;
}

function asNullableString(value: unknown, field: string): string | null {
  if (value === null) return null;
  return asString(value, field);
}

function asNumberArray(value: unknown, field: string): number[] {
  if (!Array.isArray(value)) {
    throw new TriarbError("PAYLOAD_INVALID", `payload.${field} not an array`);
  }
  return value.map((v: unknown, i) => {
    if (typeof v !== "number" || !Number.isFinite(v)) {
      throw new TriarbError("PAYLOAD_INVALID", `payload.${field}[${String(i)}] not a number`);
    }
    return v;
  });
}

function asBigIntArray(value: unknown, field: string): bigint[] {
  if (!Array.isArray(value)) {
    throw new TriarbError("PAYLOAD_INVALID", `payload.${field} not an array`);
  }
  return value.map((v: unknown, i) => {
    if (typeof v !== "string" || !/^-?\d+$/.test(v)) {
      throw new TriarbError(
        "PAYLOAD_INVALID",
        `payload.${field}[${String(i)}] invalid bigint string`,
      );
    }
    return BigInt(v);
  });
}

function asDecisionEvent(value: unknown): DecisionEvent {
  const raw = asString(value, "event");
  const found = DECISION_EVENTS.find((e) => e === raw);
  if (found === undefined) {
    throw new TriarbError("PAYLOAD_INVALID", `payload.event unknown: ${raw}`);
  }
  return found;
}

export function assertQuoteShape(prices: readonly number[], amounts: readonly bigint[]): void {
  const empty = prices.length === 0 && amounts.length === 0;
  const full = prices.length === 3 && amounts.length === 4;
  invariant(
    empty || full,
    "PAYLOAD_INVALID",
    `quote must carry 3 prices and 4 amounts or none, got ${String(prices.length)}/${String(amounts.length)}`,
  );
}

// Field order is fixed per variant so every agent produces the same bytes.
function wireFields(payload: RoundPayload): Record<string, unknown> {
  switch (payload.round) {
    case "quote_check":
      return { prices: payload.prices, amounts: payload.amounts };
    case "decision_making":
      return { event: payload.event };
    case "tx_preparation":
      return { tx_submitter: payload.tx_submitter, tx_hash: payload.tx_hash };
    case "settlement":
      return { final_tx_hash: payload.final_tx_hash };
  }
}

export function encodePayload(payload: RoundPayload): string {
  return jsonStringify({
    version: payload.version,
    round: payload.round,
    sender: payload.sender,
    ...wireFields(payload),
  });
}

/** Encoding of the agreed-upon content, i.e. everything but the sender. */
export function payloadContent(payload: RoundPayload): string {
  return jsonStringify({
    version: payload.version,
    round: payload.round,
    ...wireFields(payload),
  });
}

export function decodePayload(raw: string): RoundPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new TriarbError("PAYLOAD_INVALID", "invalid payload json", { cause: err });
  }

  const obj = ensureObject(parsed);
  invariant(
    obj.version === PAYLOAD_VERSION,
    "PAYLOAD_INVALID",
    `unsupported payload version: ${String(obj.version)}`,
  );
  const sender = asString(obj.sender, "sender");
  const round = asString(obj.round, "round");

  switch (round) {
    case "quote_check": {
      const prices = asNumberArray(obj.prices, "prices");
      const amounts = asBigIntArray(obj.amounts, "amounts");
      assertQuoteShape(prices, amounts);
      return { version: PAYLOAD_VERSION, sender, round, prices, amounts };
    }
    case "decision_making":
      return { version: PAYLOAD_VERSION, sender, round, event: asDecisionEvent(obj.event) };
    case "tx_preparation":
      return {
        version: PAYLOAD_VERSION,
        sender,
        round,
        tx_submitter: asString(obj.tx_submitter, "tx_submitter"),
        tx_hash: asNullableString(obj.tx_hash, "tx_hash"),
      };
    case "settlement":
      return {
        version: PAYLOAD_VERSION,
        sender,
        round,
        final_tx_hash: asNullableString(obj.final_tx_hash, "final_tx_hash"),
      };
    default:
      throw new TriarbError("PAYLOAD_INVALID", `unknown payload round: ${round}`);
  }
}
