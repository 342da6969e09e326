export type Event = "DONE" | "TRANSACT" | "ERROR" | "NO_MAJORITY";

/** The two outcomes the decision round can agree on. */
export type DecisionEvent = Extract<Event, "DONE" | "TRANSACT">;

export const DECISION_EVENTS: readonly DecisionEvent[] = ["DONE", "TRANSACT"];

export type RoundName =
  | "quote_check"
  | "decision_making"
  | "tx_preparation"
  | "settlement";

export const ROUND_NAMES: readonly RoundName[] = [
  "quote_check",
  "decision_making",
  "tx_preparation",
  "settlement",
];

export type RoundKey = {
  period: number;
  round: RoundName;
};

export type SynchronizedData = {
  period: number;
  safe_contract_address: string;
  participants: readonly string[];

  prices: number[];
  amounts: bigint[];
  event: Event | null;
  tx_hash: string | null;
  tx_submitter: string | null;
  final_tx_hash: string | null;
};

export function initialSynchronizedData(opts: {
  safe_contract_address: string;
  participants: readonly string[];
}): SynchronizedData {
  return {
    period: 0,
    safe_contract_address: opts.safe_contract_address,
    participants: [...opts.participants],
    prices: [],
    amounts: [],
    event: null,
    tx_hash: null,
    tx_submitter: null,
    final_tx_hash: null,
  };
}

export function nextPeriod(sync: SynchronizedData): SynchronizedData {
  return { ...initialSynchronizedData(sync), period: sync.period + 1 };
}

export function roundKeyString(key: RoundKey): string {
  return `${String(key.period)}:${key.round}`;
}
