import { TriarbError, invariant, NULL_ADDRESS } from "@triarb/common";
import type { CallOperation, SafeTx } from "@triarb/common";
import { getAddress, hexlify, toBeHex, toUtf8Bytes, TypedDataEncoder } from "ethers";

const SAFE_TX_TYPES = {
  SafeTx: [
    { name: "to", type: "address" },
    { name: "value", type: "uint256" },
    { name: "data", type: "bytes" },
    { name: "operation", type: "uint8" },
    { name: "safeTxGas", type: "uint256" },
    { name: "baseGas", type: "uint256" },
    { name: "gasPrice", type: "uint256" },
    { name: "gasToken", type: "address" },
    { name: "refundReceiver", type: "address" },
    { name: "nonce", type: "uint256" },
  ],
};

export function buildSafeTx(opts: {
  to: string;
  value: bigint;
  data: string;
  operation: CallOperation;
  safe_tx_gas: bigint;
  nonce: bigint;
}): SafeTx {
  return {
    to: opts.to,
    value: opts.value,
    data: opts.data,
    operation: opts.operation,
    safeTxGas: opts.safe_tx_gas,
    baseGas: 0n,
    gasPrice: 0n,
    gasToken: NULL_ADDRESS,
    refundReceiver: NULL_ADDRESS,
    nonce: opts.nonce,
  };
}

/** EIP-712 digest a Safe (>= 1.3.0) owner signs for `tx`. */
export function computeSafeTxHash(opts: {
  chain_id: bigint;
  safe: string;
  tx: SafeTx;
}): string {
  return TypedDataEncoder.hash(
    { chainId: opts.chain_id, verifyingContract: opts.safe },
    SAFE_TX_TYPES,
    opts.tx,
  );
}

function word(value: bigint | boolean): string {
  const n = typeof value === "boolean" ? (value ? 1n : 0n) : value;
  invariant(n >= 0n, "PAYLOAD_SERIALIZATION_FAILED", "negative value in settlement payload");
  return toBeHex(n, 32).slice(2);
}

// The checksummed `0x` text of the address, as 42 bytes of hex.
function addressText(value: string, field: string): string {
  try {
    return hexlify(toUtf8Bytes(getAddress(value))).slice(2);
  } catch (err: unknown) {
    throw new TriarbError("PAYLOAD_SERIALIZATION_FAILED", `invalid ${field}: ${value}`, {
      cause: err,
    });
  }
}

/**
 * Serializes the agreed Safe transaction for settlement:
 * safeTxHash | value | safeTxGas | to | operation (1 byte) | baseGas | gasPrice |
 * gasToken | refundReceiver | useFlashbots | gasLimit | raiseOnFailedSimulation | data.
 * Numbers are 32-byte big-endian words; addresses are their 42-character
 * checksummed text. The result is lower-case hex without a `0x` prefix.
 */
export function encodeSettlementPayload(opts: {
  safe_tx_hash: string;
  tx: SafeTx;
  use_flashbots?: boolean;
  gas_limit?: bigint;
  raise_on_failed_simulation?: boolean;
}): string {
  const hash = opts.safe_tx_hash.startsWith("0x") ? opts.safe_tx_hash.slice(2) : opts.safe_tx_hash;
  if (!/^[0-9a-fA-F]{64}$/.test(hash)) {
    throw new TriarbError("PAYLOAD_SERIALIZATION_FAILED", "safe tx hash must be 32 bytes");
  }
  invariant(
    opts.tx.operation === 0 || opts.tx.operation === 1,
    "PAYLOAD_SERIALIZATION_FAILED",
    "invalid operation",
  );
  const data = opts.tx.data.startsWith("0x") ? opts.tx.data.slice(2) : opts.tx.data;

  return [
    hash.toLowerCase(),
    word(opts.tx.value),
    word(opts.tx.safeTxGas),
    addressText(opts.tx.to, "to"),
    toBeHex(opts.tx.operation, 1).slice(2),
    word(opts.tx.baseGas),
    word(opts.tx.gasPrice),
    addressText(opts.tx.gasToken, "gasToken"),
    addressText(opts.tx.refundReceiver, "refundReceiver"),
    word(opts.use_flashbots ?? false),
    word(opts.gas_limit ?? 0n),
    word(opts.raise_on_failed_simulation ?? false),
    data.toLowerCase(),
  ].join("");
}
