import type { CallDescriptor, CallOperation, TriarbError } from "@triarb/common";

export type ContractApiResponse<T> =
  | { ok: true; body: T }
  | { ok: false; error: TriarbError };

export type RawTransaction = { data: string };

export type GetAmountsOutRequest = {
  router: string;
  amount_in: bigint;
  path: readonly string[];
};

export type PairSwapRequest = {
  pair: string;
  amount0_out: bigint;
  amount1_out: bigint;
  to: string;
  data: string;
};

export type RouterSwapRequest = {
  router: string;
  amount_in: bigint;
  amount_out_min: bigint;
  path: readonly string[];
  to: string;
  deadline: bigint;
};

export type ApprovalRequest = {
  token: string;
  spender: string;
  amount: bigint;
};

export type TransferRequest = {
  token: string;
  to: string;
  amount: bigint;
};

export type MultiSendRequest = {
  multisend: string;
  txs: readonly CallDescriptor[];
};

export type SafeTxHashRequest = {
  safe: string;
  to: string;
  value: bigint;
  data: string;
  operation: CallOperation;
  safe_tx_gas: bigint;
};

export type SafeTxHashBody = {
  tx_hash: string;
  nonce: bigint;
};

/**
 * Chain interaction capability. Every operation reports failure through the
 * response instead of throwing, so callers check `ok` before reading `body`.
 */
export interface ContractApi {
  getAmountsOut(req: GetAmountsOutRequest): Promise<ContractApiResponse<{ amounts: bigint[] }>>;
  getPairToken0(req: { pair: string }): Promise<ContractApiResponse<{ token0: string }>>;

  buildPairSwap(req: PairSwapRequest): Promise<ContractApiResponse<RawTransaction>>;
  buildRouterSwap(req: RouterSwapRequest): Promise<ContractApiResponse<RawTransaction>>;
  buildApproval(req: ApprovalRequest): Promise<ContractApiResponse<RawTransaction>>;
  buildTransfer(req: TransferRequest): Promise<ContractApiResponse<RawTransaction>>;
  buildMultiSend(req: MultiSendRequest): Promise<ContractApiResponse<RawTransaction>>;

  getSafeTxHash(req: SafeTxHashRequest): Promise<ContractApiResponse<SafeTxHashBody>>;
}
