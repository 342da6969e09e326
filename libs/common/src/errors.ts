export type ErrorCode =
  | "ENV_MISSING"
  | "ENV_INVALID"
  | "QUOTE_INVALID"
  | "CONTRACT_CALL_FAILED"
  | "ENCODE_FAILED"
  | "SAFE_HASH_FAILED"
  | "PAYLOAD_INVALID"
  | "PAYLOAD_SERIALIZATION_FAILED"
  | "ROUND_STATE_INVALID"
  | "CONSENSUS_FAILED"
  | "RPC_CONNECT_FAILED"
  | "REDIS_CONNECT_FAILED"
  | "REDIS_WRITE_FAILED"
  | "REDIS_READ_FAILED"
  | "PG_CONNECT_FAILED"
  | "PG_SCHEMA_FAILED"
  | "PG_INSERT_FAILED";

export class TriarbError extends Error {
  readonly code: ErrorCode;
  readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, opts?: { cause?: unknown }) {
    super(message);
    this.name = "TriarbError";
    this.code = code;
    this.cause = opts?.cause;
  }
}

export function asTriarbError(
  err: unknown,
  fallbackCode: ErrorCode,
  fallbackMessage: string,
): TriarbError {
  if (err instanceof TriarbError) return err;
  return new TriarbError(fallbackCode, fallbackMessage, { cause: err });
}

export function invariant(
  condition: unknown,
  code: ErrorCode,
  message: string,
): asserts condition {
  if (!condition) throw new TriarbError(code, message);
}
