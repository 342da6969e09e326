import crypto from "node:crypto";

export type TraceId = string;

export function newTraceId(): TraceId {
  return crypto.randomUUID();
}

// Quorum size for `n` participants: more than two thirds.
export function consensusThreshold(participants: number): number {
  if (!Number.isInteger(participants) || participants <= 0) return 1;
  return Math.floor((2 * participants) / 3) + 1;
}
