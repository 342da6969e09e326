import { consensusThreshold, payloadContent } from "@triarb/common";
import type { RoundPayload } from "@triarb/common";

import type { RoundOutcome } from "./types.js";

/**
 * Decides a round from the submissions seen so far. Returns null while a
 * quorum is still possible.
 */
export function tallyRound(
  participants: readonly string[],
  submissions: ReadonlyMap<string, RoundPayload>,
): RoundOutcome | null {
  const threshold = consensusThreshold(participants.length);
  const votes = new Map<string, { count: number; payload: RoundPayload }>();

  for (const sender of participants) {
    const payload = submissions.get(sender);
    if (payload === undefined) continue;
    const content = payloadContent(payload);
    const entry = votes.get(content) ?? { count: 0, payload };
    entry.count += 1;
    votes.set(content, entry);
    if (entry.count >= threshold) return { status: "committed", payload: entry.payload };
  }

  const submitted = participants.filter((p) => submissions.has(p)).length;
  const best = Math.max(0, ...[...votes.values()].map((v) => v.count));
  const remaining = participants.length - submitted;
  if (best + remaining < threshold) return { status: "no_majority" };
  return null;
}
