import { TriarbError, encodePayload } from "@triarb/common";
import type { Event, RoundKey, RoundPayload, TraceId } from "@triarb/common";
import { Pool } from "pg";

export type RoundCommit = {
  trace_id: TraceId;
  key: RoundKey;
  event: Event;
  payload: RoundPayload;
};

export interface RoundJournal {
  record(commit: RoundCommit): Promise<void>;
}

export function createPgPool(postgresUrl: string): Pool {
  return new Pool({ connectionString: postgresUrl });
}

export async function ensurePgSchema(pool: Pool): Promise<void> {
  try {
    await pool.query(`
      create table if not exists round_commits (
        id bigserial primary key,
        trace_id uuid not null,
        period bigint not null,
        round text not null,
        event text not null,
        payload jsonb not null,
        created_at timestamptz not null default now()
      );
    `);
  } catch (err: unknown) {
    throw new TriarbError("PG_SCHEMA_FAILED", "failed to ensure postgres schema", {
      cause: err,
    });
  }
}

export async function insertRoundCommit(pool: Pool, commit: RoundCommit): Promise<void> {
  try {
    await pool.query(
      `
      insert into round_commits (
        trace_id,
        period,
        round,
        event,
        payload
      ) values ($1::uuid, $2::bigint, $3, $4, $5::jsonb);
      `,
      [
        commit.trace_id,
        String(commit.key.period),
        commit.key.round,
        commit.event,
        encodePayload(commit.payload),
      ],
    );
  } catch (err: unknown) {
    throw new TriarbError("PG_INSERT_FAILED", "failed to insert round_commit", {
      cause: err,
    });
  }
}

export class PgRoundJournal implements RoundJournal {
  constructor(private readonly pool: Pool) {}

  record(commit: RoundCommit): Promise<void> {
    return insertRoundCommit(this.pool, commit);
  }
}
