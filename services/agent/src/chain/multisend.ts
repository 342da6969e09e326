import { TriarbError } from "@triarb/common";
import type { CallDescriptor } from "@triarb/common";
import { concat, dataLength, solidityPacked } from "ethers";

import { multisendIface } from "./abi.js";

/**
 * Packs calls the way MultiSend reads them:
 * `uint8 operation | address to | uint256 value | uint256 dataLength | bytes data`,
 * back to back in the given order.
 */
export function packMultiSendTxs(txs: readonly CallDescriptor[]): string {
  if (txs.length === 0) {
    throw new TriarbError("ENCODE_FAILED", "multisend needs at least one call");
  }
  return concat(
    txs.map((tx) =>
      solidityPacked(
        ["uint8", "address", "uint256", "uint256", "bytes"],
        [tx.operation, tx.to, tx.value, dataLength(tx.data), tx.data],
      ),
    ),
  );
}

export function encodeMultiSend(txs: readonly CallDescriptor[]): string {
  return multisendIface.encodeFunctionData("multiSend", [packMultiSendTxs(txs)]);
}
