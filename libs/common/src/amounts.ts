import { TriarbError, invariant } from "./errors.js";

const TEN_THOUSAND = 10_000n;

// On-chain fractional-unit divisor used when a ratio is shown as a float.
export const WEI_PER_UNIT = 1e18;

function toBigIntBps(value: number, field: string): bigint {
  if (!Number.isFinite(value) || !Number.isInteger(value) || value < 0) {
    throw new TriarbError("ENV_INVALID", `invalid ${field}: ${String(value)}`);
  }
  return BigInt(value);
}

export function formatRatio(
  numerator: bigint,
  denominator: bigint,
  fractionDigits = 6,
): string {
  if (denominator === 0n) {
    throw new TriarbError("QUOTE_INVALID", "division by zero");
  }
  if (fractionDigits < 0 || !Number.isInteger(fractionDigits)) {
    throw new TriarbError(
      "ENV_INVALID",
      `invalid fractionDigits: ${String(fractionDigits)}`,
    );
  }

  const scale = 10n ** BigInt(fractionDigits);
  const scaled = (numerator * scale) / denominator;
  const integer = scaled / scale;
  const frac = scaled % scale;
  return `${integer.toString()}.${frac.toString().padStart(fractionDigits, "0")}`;
}

/** Fee charged on `amount`, rounded down. */
export function feeOfBps(amount: bigint, feeBps: number): bigint {
  invariant(amount >= 0n, "ROUND_STATE_INVALID", "amount must be >= 0");
  const fee = toBigIntBps(feeBps, "feeBps");
  invariant(fee <= TEN_THOUSAND, "ENV_INVALID", "feeBps must be <= 10_000");
  return (amount * fee) / TEN_THOUSAND;
}

export function withFeeBps(amount: bigint, feeBps: number): bigint {
  return amount + feeOfBps(amount, feeBps);
}

/**
 * True when `amountOut / amountIn > 1 + marginBps / 10_000`, evaluated on
 * integers so that a ratio sitting exactly on the threshold never passes.
 */
export function exceedsMarginBps(
  amountIn: bigint,
  amountOut: bigint,
  marginBps: number,
): boolean {
  if (amountIn <= 0n) return false;
  const margin = toBigIntBps(marginBps, "marginBps");
  return amountOut * TEN_THOUSAND > amountIn * (TEN_THOUSAND + margin);
}

/** Float ratio of two on-chain integers after scaling both to whole units. */
export function unitRatio(numerator: bigint, denominator: bigint): number {
  if (denominator === 0n) return Number.NaN;
  const a = Number(numerator) / WEI_PER_UNIT;
  const b = Number(denominator) / WEI_PER_UNIT;
  return a / b;
}
