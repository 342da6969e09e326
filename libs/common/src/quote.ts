export type TargetToken = {
  symbol: string;
  address: string;
};

export type TargetTokenPath = readonly [TargetToken, TargetToken, TargetToken];

export type QuoteResult = {
  prices: number[];
  amounts: bigint[];
};

export const EMPTY_QUOTE: Readonly<QuoteResult> = Object.freeze({
  prices: [],
  amounts: [],
});

/** Round-trip route `t1 → t2 → t3 → t1` as addresses. */
export function roundTripPath(tokens: TargetTokenPath): string[] {
  const [t1, t2, t3] = tokens;
  return [t1.address, t2.address, t3.address, t1.address];
}
