import { initialSynchronizedData, newTraceId, nextPeriod } from "@triarb/common";
import type { Event, RoundKey, RoundName, SynchronizedData, TraceId } from "@triarb/common";

import type { Behaviour, BehaviourContext } from "./behaviours/context.js";
import { decisionBehaviour } from "./behaviours/decision.js";
import { quoteCheckBehaviour } from "./behaviours/quote-check.js";
import { settlementBehaviour } from "./behaviours/settlement.js";
import { txPreparationBehaviour } from "./behaviours/tx-preparation.js";
import type { ContractApi } from "./chain/contract-api.js";
import type { AgentConfig } from "./config.js";
import type { ConsensusClient } from "./consensus/types.js";
import { createLogger } from "./log.js";
import type { Logger } from "./log.js";
import { INITIAL_ROUND, applyPayload, nextRound, roundEvent } from "./rounds.js";
import type { Transition } from "./rounds.js";
import type { SettlementHandler } from "./settlement.js";
import type { RoundJournal } from "./storage/postgres.js";

const SERVICE = "agent";

const BEHAVIOURS = {
  quote_check: quoteCheckBehaviour,
  decision_making: decisionBehaviour,
  tx_preparation: txPreparationBehaviour,
  settlement: settlementBehaviour,
} satisfies { [R in RoundName]: Behaviour<R> };

export type RoundMachineDeps = {
  params: AgentConfig;
  contracts: ContractApi;
  consensus: ConsensusClient;
  journal: RoundJournal;
  settlement: SettlementHandler;
  /** Defaults to `params.agent_address`. */
  sender?: string;
  now?: () => Date;
  service?: string;
};

export type StepResult = {
  key: RoundKey;
  event: Event;
  next: Transition;
  /** Committed state right after the round, before any period reset. */
  sync: SynchronizedData;
};

export type PeriodSummary = {
  period: number;
  trace_id: TraceId;
  steps: StepResult[];
};

/**
 * Runs one agent's rounds in order. Only one round is ever in flight, and a
 * round does not advance before the substrate reports its outcome.
 */
export class RoundMachine {
  private sync: SynchronizedData;
  private round: RoundName = INITIAL_ROUND;
  private readonly sender: string;
  private readonly now: () => Date;
  private readonly service: string;

  constructor(private readonly deps: RoundMachineDeps) {
    this.sync = initialSynchronizedData({
      safe_contract_address: deps.params.safe_contract_address,
      participants: deps.params.participants,
    });
    this.sender = deps.sender ?? deps.params.agent_address;
    this.now = deps.now ?? (() => new Date());
    this.service = deps.service ?? SERVICE;
  }

  get current(): { round: RoundName; sync: SynchronizedData } {
    return { round: this.round, sync: this.sync };
  }

  private context(logger: Logger): BehaviourContext {
    return {
      params: this.deps.params,
      sync: this.sync,
      contracts: this.deps.contracts,
      settlement: this.deps.settlement,
      sender: this.sender,
      logger,
      now: this.now,
    };
  }

  async step(logger: Logger): Promise<StepResult> {
    const key: RoundKey = { period: this.sync.period, round: this.round };
    const behaviour = BEHAVIOURS[key.round];

    const payload = await behaviour(this.context(logger));
    await this.deps.consensus.submitPayload(key, payload);
    const outcome = await this.deps.consensus.awaitRoundEnd(key);

    let event: Event = "NO_MAJORITY";
    if (outcome.status === "committed") {
      this.sync = applyPayload(this.sync, outcome.payload);
      event = roundEvent(outcome.payload);
    }
    const committed = this.sync;
    const next = nextRound(key.round, event);
    if (next === "reset") {
      this.sync = nextPeriod(this.sync);
      this.round = INITIAL_ROUND;
    } else {
      this.round = next;
    }

    logger.log(event === "NO_MAJORITY" ? "warn" : "info", "round end", {
      period: key.period,
      round: key.round,
      event,
      next,
    });
    if (outcome.status === "committed") {
      await this.deps.journal.record({
        trace_id: logger.trace_id,
        key,
        event,
        payload: outcome.payload,
      });
    }
    return { key, event, next, sync: committed };
  }

  /** Steps until the period resets or the round budget runs out. */
  async runPeriod(): Promise<PeriodSummary> {
    const trace_id = newTraceId();
    const logger = createLogger(this.service, trace_id);
    const period = this.sync.period;
    const steps: StepResult[] = [];

    while (this.sync.period === period) {
      if (steps.length >= this.deps.params.max_rounds_per_period) {
        logger.log("warn", "round budget exhausted, starting a new period", {
          period,
          round: this.round,
        });
        this.sync = nextPeriod(this.sync);
        this.round = INITIAL_ROUND;
        break;
      }
      steps.push(await this.step(logger));
    }
    return { period, trace_id, steps };
  }
}
