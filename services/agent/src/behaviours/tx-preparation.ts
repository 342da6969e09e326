import {
  CallOperation,
  PAYLOAD_VERSION,
  TriarbError,
  asTriarbError,
  roundTripPath,
  withFeeBps,
} from "@triarb/common";
import type { BundleStep, BundleStepKind, TransactionBundle } from "@triarb/common";

import type { ContractApiResponse, RawTransaction, SafeTxHashRequest } from "../chain/contract-api.js";
import { buildSafeTx, encodeSettlementPayload } from "../chain/safe.js";
import type { Behaviour, BehaviourContext } from "./context.js";

export const TX_SUBMITTER = "tx_preparation";

export type PreparedTx = {
  bundle: TransactionBundle;
  multisend_data: string;
  safe_tx_hash: string;
  nonce: bigint;
  /** Settlement payload proposed for sign-off. */
  tx_hash: string;
};

function toStep(
  ctx: BehaviourContext,
  kind: BundleStepKind,
  to: string,
  response: ContractApiResponse<RawTransaction>,
): BundleStep | null {
  if (!response.ok) {
    ctx.logger.log("error", `building ${kind} call failed`, {
      code: response.error.code,
      error: response.error.message,
    });
    return null;
  }
  return { kind, operation: CallOperation.CALL, to, value: 0n, data: response.body.data };
}

async function buildFlashSwapTx(
  ctx: BehaviourContext,
  borrowAmount: bigint,
  borrowToken: string,
): Promise<BundleStep | null> {
  const pair = ctx.params.flash_swap_pair_address;
  const token0 = await ctx.contracts.getPairToken0({ pair });
  if (!token0.ok) {
    ctx.logger.log("error", "reading pair token0 failed", { code: token0.error.code });
    return null;
  }
  const borrowIsToken0 = token0.body.token0.toLowerCase() === borrowToken.toLowerCase();

  const response = await ctx.contracts.buildPairSwap({
    pair,
    amount0_out: borrowIsToken0 ? borrowAmount : 0n,
    amount1_out: borrowIsToken0 ? 0n : borrowAmount,
    to: ctx.sync.safe_contract_address,
    data: "0x",
  });
  return toStep(ctx, "borrow", pair, response);
}

async function buildApprovalTx(
  ctx: BehaviourContext,
  token: string,
  amount: bigint,
): Promise<BundleStep | null> {
  const response = await ctx.contracts.buildApproval({
    token,
    spender: ctx.params.router_address,
    amount,
  });
  return toStep(ctx, "approve", token, response);
}

async function buildArbitrageSwapTx(
  ctx: BehaviourContext,
  amountIn: bigint,
  amountOutMin: bigint,
): Promise<BundleStep | null> {
  const nowSeconds = Math.floor(ctx.now().getTime() / 1000);
  const response = await ctx.contracts.buildRouterSwap({
    router: ctx.params.router_address,
    amount_in: amountIn,
    amount_out_min: amountOutMin,
    path: roundTripPath(ctx.params.target_tokens),
    to: ctx.sync.safe_contract_address,
    deadline: BigInt(nowSeconds + ctx.params.swap_deadline_seconds),
  });
  return toStep(ctx, "swap", ctx.params.router_address, response);
}

async function buildRepayTx(
  ctx: BehaviourContext,
  token: string,
  amount: bigint,
): Promise<BundleStep | null> {
  const pair = ctx.params.flash_swap_pair_address;
  const response = await ctx.contracts.buildTransfer({ token, to: pair, amount });
  return toStep(ctx, "repay", token, response);
}

/**
 * Builds `[borrow, approve, swap, repay]`, batches it through MultiSend and
 * hashes the Safe transaction. Returns null as soon as any step fails so no
 * partial bundle is ever proposed.
 */
export async function prepareTx(ctx: BehaviourContext): Promise<PreparedTx | null> {
  const amounts = ctx.sync.amounts;
  const [amountIn, , , amountOutMin] = amounts;
  if (amounts.length !== 4 || amountIn === undefined || amountOutMin === undefined) {
    throw new TriarbError(
      "ROUND_STATE_INVALID",
      `invalid amounts ${String(amounts.length)}, expecting 4 values`,
    );
  }

  const borrowToken = ctx.params.target_tokens[0].address;
  const repayAmount = withFeeBps(amountIn, ctx.params.flash_swap_fee_bps);

  const steps: BundleStep[] = [];

  const borrow = await buildFlashSwapTx(ctx, amountIn, borrowToken);
  if (borrow == null) return null;
  steps.push(borrow);

  const approve = await buildApprovalTx(ctx, borrowToken, repayAmount);
  if (approve == null) return null;
  steps.push(approve);

  const swap = await buildArbitrageSwapTx(ctx, amountIn, amountOutMin);
  if (swap == null) return null;
  steps.push(swap);

  const repay = await buildRepayTx(ctx, borrowToken, repayAmount);
  if (repay == null) return null;
  steps.push(repay);

  const bundle: TransactionBundle = Object.freeze(steps);
  ctx.logger.log("info", "bundle built", { kinds: bundle.map((s) => s.kind) });

  const multisend = await ctx.contracts.buildMultiSend({
    multisend: ctx.params.multisend_address,
    txs: bundle,
  });
  if (!multisend.ok) {
    ctx.logger.log("error", "multisend encoding failed", { code: multisend.error.code });
    return null;
  }

  const hashRequest: SafeTxHashRequest = {
    safe: ctx.sync.safe_contract_address,
    to: ctx.params.multisend_address,
    value: 0n,
    data: multisend.body.data,
    operation: CallOperation.DELEGATE_CALL,
    safe_tx_gas: ctx.params.safe_tx_gas,
  };
  const hashed = await ctx.contracts.getSafeTxHash(hashRequest);
  if (!hashed.ok) {
    ctx.logger.log("error", "get safe hash failed", {
      code: hashed.error.code,
      error: hashed.error.message,
    });
    return null;
  }

  let tx_hash: string;
  try {
    tx_hash = encodeSettlementPayload({
      safe_tx_hash: hashed.body.tx_hash,
      tx: buildSafeTx({ ...hashRequest, nonce: hashed.body.nonce }),
    });
  } catch (err: unknown) {
    const e = asTriarbError(err, "PAYLOAD_SERIALIZATION_FAILED", "settlement payload failed");
    ctx.logger.log("error", e.message, { code: e.code });
    return null;
  }

  ctx.logger.log("info", "safe tx hash", {
    safe_tx_hash: hashed.body.tx_hash,
    nonce: hashed.body.nonce,
  });
  return {
    bundle,
    multisend_data: multisend.body.data,
    safe_tx_hash: hashed.body.tx_hash,
    nonce: hashed.body.nonce,
    tx_hash,
  };
}

export const txPreparationBehaviour: Behaviour<"tx_preparation"> = async (ctx) => {
  const prepared = await prepareTx(ctx);
  return {
    version: PAYLOAD_VERSION,
    round: "tx_preparation",
    sender: ctx.sender,
    tx_submitter: TX_SUBMITTER,
    tx_hash: prepared?.tx_hash ?? null,
  };
};
