import { PAYLOAD_VERSION, TriarbError } from "@triarb/common";

import type { Behaviour } from "./context.js";

export const settlementBehaviour: Behaviour<"settlement"> = async (ctx) => {
  const tx_hash = ctx.sync.tx_hash;
  if (tx_hash == null) {
    throw new TriarbError("ROUND_STATE_INVALID", "settlement without an agreed tx hash");
  }
  const final_tx_hash = await ctx.settlement.settle({
    safe_contract_address: ctx.sync.safe_contract_address,
    tx_hash,
    logger: ctx.logger,
  });
  return {
    version: PAYLOAD_VERSION,
    round: "settlement",
    sender: ctx.sender,
    final_tx_hash,
  };
};
