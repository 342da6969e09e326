import { TriarbError, asTriarbError } from "@triarb/common";
import type { ErrorCode } from "@triarb/common";
import { getAddress } from "ethers";

import { erc20Iface, pairIface, routerIface, safeIface } from "./abi.js";
import type {
  ApprovalRequest,
  ContractApi,
  ContractApiResponse,
  GetAmountsOutRequest,
  MultiSendRequest,
  PairSwapRequest,
  RawTransaction,
  RouterSwapRequest,
  SafeTxHashBody,
  SafeTxHashRequest,
  TransferRequest,
} from "./contract-api.js";
import { encodeMultiSend } from "./multisend.js";
import { buildSafeTx, computeSafeTxHash } from "./safe.js";

/** The slice of an ethers provider the contract API reads through. */
export type ChainReader = {
  call(tx: { to: string; data: string }): Promise<string>;
  getNetwork(): Promise<{ chainId: bigint }>;
};

async function attempt<T>(
  code: ErrorCode,
  message: string,
  fn: () => Promise<T> | T,
): Promise<ContractApiResponse<T>> {
  try {
    return { ok: true, body: await fn() };
  } catch (err: unknown) {
    return { ok: false, error: asTriarbError(err, code, message) };
  }
}

function toBigIntArray(value: unknown, field: string): bigint[] {
  if (!Array.isArray(value)) {
    throw new TriarbError("CONTRACT_CALL_FAILED", `${field} is not an array`);
  }
  return value.map((v: unknown) => {
    if (typeof v !== "bigint") {
      throw new TriarbError("CONTRACT_CALL_FAILED", `${field} holds a non-integer`);
    }
    return v;
  });
}

function toBigInt(value: unknown, field: string): bigint {
  if (typeof value !== "bigint") {
    throw new TriarbError("CONTRACT_CALL_FAILED", `${field} is not an integer`);
  }
  return value;
}

function checksummed(addresses: readonly string[]): string[] {
  return addresses.map((a) => getAddress(a));
}

export class EthersContractApi implements ContractApi {
  constructor(private readonly reader: ChainReader) {}

  getAmountsOut(req: GetAmountsOutRequest): Promise<ContractApiResponse<{ amounts: bigint[] }>> {
    return attempt("CONTRACT_CALL_FAILED", "getAmountsOut failed", async () => {
      const data = routerIface.encodeFunctionData("getAmountsOut", [
        req.amount_in,
        checksummed(req.path),
      ]);
      const ret = await this.reader.call({ to: req.router, data });
      const decoded = routerIface.decodeFunctionResult("getAmountsOut", ret);
      return { amounts: toBigIntArray(decoded[0], "amounts") };
    });
  }

  getPairToken0(req: { pair: string }): Promise<ContractApiResponse<{ token0: string }>> {
    return attempt("CONTRACT_CALL_FAILED", "token0 failed", async () => {
      const data = pairIface.encodeFunctionData("token0", []);
      const ret = await this.reader.call({ to: req.pair, data });
      const decoded = pairIface.decodeFunctionResult("token0", ret);
      return { token0: String(decoded[0]).toLowerCase() };
    });
  }

  buildPairSwap(req: PairSwapRequest): Promise<ContractApiResponse<RawTransaction>> {
    return attempt("ENCODE_FAILED", "pair swap encoding failed", () => ({
      data: pairIface.encodeFunctionData("swap", [
        req.amount0_out,
        req.amount1_out,
        getAddress(req.to),
        req.data,
      ]),
    }));
  }

  buildRouterSwap(req: RouterSwapRequest): Promise<ContractApiResponse<RawTransaction>> {
    return attempt("ENCODE_FAILED", "router swap encoding failed", () => ({
      data: routerIface.encodeFunctionData("swapExactTokensForTokens", [
        req.amount_in,
        req.amount_out_min,
        checksummed(req.path),
        getAddress(req.to),
        req.deadline,
      ]),
    }));
  }

  buildApproval(req: ApprovalRequest): Promise<ContractApiResponse<RawTransaction>> {
    return attempt("ENCODE_FAILED", "approval encoding failed", () => ({
      data: erc20Iface.encodeFunctionData("approve", [getAddress(req.spender), req.amount]),
    }));
  }

  buildTransfer(req: TransferRequest): Promise<ContractApiResponse<RawTransaction>> {
    return attempt("ENCODE_FAILED", "transfer encoding failed", () => ({
      data: erc20Iface.encodeFunctionData("transfer", [getAddress(req.to), req.amount]),
    }));
  }

  buildMultiSend(req: MultiSendRequest): Promise<ContractApiResponse<RawTransaction>> {
    return attempt("ENCODE_FAILED", "multisend encoding failed", () => ({
      data: encodeMultiSend(req.txs),
    }));
  }

  getSafeTxHash(req: SafeTxHashRequest): Promise<ContractApiResponse<SafeTxHashBody>> {
    return attempt("SAFE_HASH_FAILED", "safe tx hash failed", async () => {
      const ret = await this.reader.call({
        to: req.safe,
        data: safeIface.encodeFunctionData("nonce", []),
      });
      const nonce = toBigInt(safeIface.decodeFunctionResult("nonce", ret)[0], "nonce");
      const { chainId } = await this.reader.getNetwork();

      const tx = buildSafeTx({
        to: req.to,
        value: req.value,
        data: req.data,
        operation: req.operation,
        safe_tx_gas: req.safe_tx_gas,
        nonce,
      });
      return { tx_hash: computeSafeTxHash({ chain_id: chainId, safe: req.safe, tx }), nonce };
    });
  }
}
