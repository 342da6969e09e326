export const CallOperation = {
  CALL: 0,
  DELEGATE_CALL: 1,
} as const;

export type CallOperation = (typeof CallOperation)[keyof typeof CallOperation];

export type CallDescriptor = {
  operation: CallOperation;
  to: string;
  value: bigint;
  data: string;
};

export type BundleStepKind = "borrow" | "approve" | "swap" | "repay";

export const BUNDLE_ORDER: readonly BundleStepKind[] = [
  "borrow",
  "approve",
  "swap",
  "repay",
];

export type BundleStep = CallDescriptor & { kind: BundleStepKind };

export type TransactionBundle = readonly BundleStep[];

export const NULL_ADDRESS = "0x0000000000000000000000000000000000000000";

export type SafeTx = {
  to: string;
  value: bigint;
  data: string;
  operation: CallOperation;
  safeTxGas: bigint;
  baseGas: bigint;
  gasPrice: bigint;
  gasToken: string;
  refundReceiver: string;
  nonce: bigint;
};
