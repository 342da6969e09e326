import { EMPTY_QUOTE, PAYLOAD_VERSION, formatRatio, invariant, roundTripPath } from "@triarb/common";
import type { QuoteResult } from "@triarb/common";

import type { Behaviour, BehaviourContext } from "./context.js";

function emptyQuote(): QuoteResult {
  return { prices: [...EMPTY_QUOTE.prices], amounts: [...EMPTY_QUOTE.amounts] };
}

/**
 * Quotes the probe amount over `t1 → t2 → t3 → t1` and derives the marginal
 * rate of each hop. Any unusable answer yields an empty quote.
 */
export async function getPrices(ctx: BehaviourContext): Promise<QuoteResult> {
  const tokens = ctx.params.target_tokens;
  invariant(tokens.length === 3, "ROUND_STATE_INVALID", "expecting 3 target tokens");

  const amountIn = ctx.params.probe_amount_wei;
  const path = roundTripPath(tokens);
  ctx.logger.log("info", "quoting round trip", {
    symbols: tokens.map((t) => t.symbol),
    amount_in: amountIn,
  });

  const response = await ctx.contracts.getAmountsOut({
    router: ctx.params.router_address,
    amount_in: amountIn,
    path,
  });
  if (!response.ok) {
    ctx.logger.log("error", "getting amounts out failed", {
      code: response.error.code,
      error: response.error.message,
    });
    return emptyQuote();
  }

  const amounts = response.body.amounts;
  if (amounts.length === 0) {
    ctx.logger.log("error", "quote returned no amounts");
    return emptyQuote();
  }

  const zeroAt = amounts.findIndex((a) => a <= 0n);
  if (zeroAt !== -1) {
    ctx.logger.log("error", "quote returned non-positive amount", { hop: zeroAt, amounts });
    return emptyQuote();
  }

  const [, out1, out2, out3] = amounts;
  if (amounts.length < 4 || out1 === undefined || out2 === undefined || out3 === undefined) {
    ctx.logger.log("error", "quote returned too few amounts", { amounts });
    return emptyQuote();
  }

  const prices = [
    Number(out1) / Number(amountIn),
    Number(out2) / Number(out1),
    Number(out3) / Number(out2),
  ];
  ctx.logger.log("info", "quote", { prices, amounts, round_trip: formatRatio(out3, amountIn) });
  return { prices, amounts: [amountIn, out1, out2, out3] };
}

export const quoteCheckBehaviour: Behaviour<"quote_check"> = async (ctx) => {
  const { prices, amounts } = await getPrices(ctx);
  return {
    version: PAYLOAD_VERSION,
    round: "quote_check",
    sender: ctx.sender,
    prices,
    amounts,
  };
};
