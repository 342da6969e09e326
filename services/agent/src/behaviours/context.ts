import type { PayloadOf, RoundName, SynchronizedData } from "@triarb/common";

import type { ContractApi } from "../chain/contract-api.js";
import type { AgentConfig } from "../config.js";
import type { Logger } from "../log.js";
import type { SettlementHandler } from "../settlement.js";

/**
 * Everything a behaviour may read. `params` and `sync` are snapshots; a
 * behaviour reports its result only through the payload it returns.
 */
export type BehaviourContext = {
  readonly params: Readonly<AgentConfig>;
  readonly sync: Readonly<SynchronizedData>;
  readonly contracts: ContractApi;
  readonly settlement: SettlementHandler;
  readonly sender: string;
  readonly logger: Logger;
  readonly now: () => Date;
};

export type Behaviour<R extends RoundName> = (ctx: BehaviourContext) => Promise<PayloadOf<R>>;
