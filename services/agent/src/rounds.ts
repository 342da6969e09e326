import { TriarbError } from "@triarb/common";
import type { Event, RoundName, RoundPayload, SynchronizedData } from "@triarb/common";

/** `"reset"` ends the period; the next one starts again at quote_check. */
export type Transition = RoundName | "reset";

export const INITIAL_ROUND: RoundName = "quote_check";

const TRANSITIONS: Record<RoundName, Partial<Record<Event, Transition>>> = {
  quote_check: {
    DONE: "decision_making",
    NO_MAJORITY: "quote_check",
  },
  decision_making: {
    DONE: "reset",
    TRANSACT: "tx_preparation",
    NO_MAJORITY: "decision_making",
  },
  tx_preparation: {
    DONE: "settlement",
    ERROR: "reset",
    NO_MAJORITY: "tx_preparation",
  },
  settlement: {
    DONE: "reset",
    ERROR: "reset",
    NO_MAJORITY: "settlement",
  },
};

export function nextRound(round: RoundName, event: Event): Transition {
  const next = TRANSITIONS[round][event];
  if (next === undefined) {
    throw new TriarbError("ROUND_STATE_INVALID", `no transition from ${round} on ${event}`);
  }
  return next;
}

/** Event a committed payload ends its round with. */
export function roundEvent(payload: RoundPayload): Event {
  switch (payload.round) {
    case "quote_check":
      return "DONE";
    case "decision_making":
      return payload.event;
    case "tx_preparation":
      return payload.tx_hash == null ? "ERROR" : "DONE";
    case "settlement":
      return payload.final_tx_hash == null ? "ERROR" : "DONE";
  }
}

/** Each round writes only the fields it owns. */
export function applyPayload(sync: SynchronizedData, payload: RoundPayload): SynchronizedData {
  const event = roundEvent(payload);
  switch (payload.round) {
    case "quote_check":
      return { ...sync, prices: [...payload.prices], amounts: [...payload.amounts] };
    case "decision_making":
      return { ...sync, event };
    case "tx_preparation":
      return { ...sync, tx_hash: payload.tx_hash, tx_submitter: payload.tx_submitter };
    case "settlement":
      return { ...sync, final_tx_hash: payload.final_tx_hash };
  }
}
