import type { Logger } from "./log.js";

export type SettlementRequest = {
  safe_contract_address: string;
  /** Settlement payload agreed in tx_preparation. */
  tx_hash: string;
  logger: Logger;
};

/**
 * Hands an agreed Safe transaction to whatever collects signatures and
 * broadcasts it. Resolves to the on-chain transaction hash once known.
 */
export interface SettlementHandler {
  settle(req: SettlementRequest): Promise<string | null>;
}

/** Records the hand-off only; signing happens outside this agent. */
export class LoggingSettlement implements SettlementHandler {
  settle(req: SettlementRequest): Promise<string | null> {
    req.logger.log("info", "settlement hand-off", {
      safe: req.safe_contract_address,
      payload_bytes: req.tx_hash.length / 2,
    });
    return Promise.resolve(null);
  }
}
