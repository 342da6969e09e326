import { PAYLOAD_VERSION, exceedsMarginBps, unitRatio } from "@triarb/common";
import type { DecisionEvent } from "@triarb/common";

import type { Logger } from "../log.js";
import type { Behaviour } from "./context.js";

/**
 * TRANSACT only when the round trip returns strictly more than
 * `1 + margin_bps / 10_000` times the input.
 */
export function getEvent(
  amounts: readonly bigint[],
  margin_bps: number,
  logger?: Logger,
): DecisionEvent {
  const [first, , , last] = amounts;
  if (amounts.length !== 4 || first === undefined || last === undefined) return "DONE";
  if (first === 0n) return "DONE";

  const transact = exceedsMarginBps(first, last, margin_bps);
  logger?.log("info", "decision", {
    amount_in: first,
    amount_out: last,
    ratio: unitRatio(last, first),
    margin_bps,
    event: transact ? "TRANSACT" : "DONE",
  });
  return transact ? "TRANSACT" : "DONE";
}

export const decisionBehaviour: Behaviour<"decision_making"> = (ctx) =>
  Promise.resolve({
    version: PAYLOAD_VERSION,
    round: "decision_making",
    sender: ctx.sender,
    event: getEvent(ctx.sync.amounts, ctx.params.min_profit_margin_bps, ctx.logger),
  });
