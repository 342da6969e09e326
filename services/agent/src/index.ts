import { TriarbError, asTriarbError, newTraceId } from "@triarb/common";
import { JsonRpcProvider } from "ethers";
import { createClient } from "redis";

import { EthersContractApi } from "./chain/ethers-contract-api.js";
import { loadConfig, loadDotenv } from "./config.js";
import type { AgentConfig } from "./config.js";
import { LocalConsensus } from "./consensus/local.js";
import { RedisConsensus, redisRoundStore } from "./consensus/redis.js";
import type { RedisClient } from "./consensus/redis.js";
import type { ConsensusClient } from "./consensus/types.js";
import { createHealthServer } from "./health.js";
import { createLogger, logLine } from "./log.js";
import type { Logger } from "./log.js";
import { runLoop } from "./loop.js";
import { RoundMachine } from "./machine.js";
import { LoggingSettlement } from "./settlement.js";
import { PgRoundJournal, createPgPool, ensurePgSchema } from "./storage/postgres.js";

const SERVICE = "agent";

async function connectConsensus(
  cfg: AgentConfig,
  logger: Logger,
): Promise<{ consensus: ConsensusClient; redis: RedisClient | null }> {
  if (cfg.consensus_mode === "local") {
    return { consensus: new LocalConsensus(cfg.participants), redis: null };
  }

  const redis = createClient({ url: cfg.redis_url });
  await redis.connect().catch((err: unknown) => {
    throw new TriarbError("REDIS_CONNECT_FAILED", "failed to connect redis", {
      cause: err,
    });
  });
  const consensus = new RedisConsensus(redisRoundStore(redis), {
    run_id: cfg.consensus_run_id,
    participants: cfg.participants,
    poll_interval_ms: cfg.round_poll_interval_ms,
    timeout_ms: cfg.round_timeout_ms,
    logger,
  });
  return { consensus, redis };
}

async function main(): Promise<void> {
  loadDotenv();
  const cfg = loadConfig();
  const trace_id = newTraceId();

  logLine(SERVICE, "info", trace_id, "starting", {
    rpc_url: cfg.rpc_url,
    agent_address: cfg.agent_address,
    participants: cfg.participants.length,
    consensus_mode: cfg.consensus_mode,
    consensus_run_id: cfg.consensus_run_id,
    target_tokens: cfg.target_tokens.map((t) => t.symbol),
    min_profit_margin_bps: cfg.min_profit_margin_bps,
    flash_swap_fee_bps: cfg.flash_swap_fee_bps,
    period_interval_ms: cfg.period_interval_ms,
  });

  const provider = new JsonRpcProvider(cfg.rpc_url);
  await provider.getNetwork().catch((err: unknown) => {
    throw new TriarbError("RPC_CONNECT_FAILED", "failed to reach rpc", { cause: err });
  });

  const { consensus, redis } = await connectConsensus(cfg, createLogger(SERVICE, trace_id));

  const pg = createPgPool(cfg.postgres_url);
  await pg.query("select 1").catch((err: unknown) => {
    throw new TriarbError("PG_CONNECT_FAILED", "failed to connect postgres", { cause: err });
  });
  await ensurePgSchema(pg);

  const machine = new RoundMachine({
    params: cfg,
    contracts: new EthersContractApi(provider),
    consensus,
    journal: new PgRoundJournal(pg),
    settlement: new LoggingSettlement(),
  });

  const server = createHealthServer(SERVICE, () => machine.current);
  server.listen(cfg.health_port, () => {
    logLine(SERVICE, "info", trace_id, "health listening", { port: cfg.health_port });
  });

  const tick = async (): Promise<void> => {
    try {
      const summary = await machine.runPeriod();
      logLine(SERVICE, "info", summary.trace_id, "period finished", {
        period: summary.period,
        rounds: summary.steps.map((s) => `${s.key.round}:${s.event}`),
      });
    } catch (err: unknown) {
      const e = asTriarbError(err, "CONSENSUS_FAILED", "period failed");
      logLine(SERVICE, "error", newTraceId(), e.message, {
        code: e.code,
        round: machine.current.round,
      });
    }
  };

  const shutdown = async (signal: string): Promise<void> => {
    logLine(SERVICE, "info", newTraceId(), "shutdown", { signal });
    provider.destroy();
    await Promise.allSettled([
      redis ? redis.quit() : Promise.resolve(),
      pg.end(),
      new Promise<void>((resolve) => server.close(() => resolve())),
    ]);
  };

  await runLoop({ interval_ms: cfg.period_interval_ms, tick, shutdown });
}

main().catch((err: unknown) => {
  const e = asTriarbError(err, "RPC_CONNECT_FAILED", "agent crashed");
  logLine(SERVICE, "error", newTraceId(), e.message, { code: e.code });
  process.exitCode = 1;
});
