import "dotenv/config";
import type { Redis } from "ioredis";
import type { Pool } from "pg";
import { v7 as uuid } from "uuid";
import { loadConfig } from "./config";
import { createPool, createRedis, runMigrations } from "./db";
import { DraftNegotiator } from "./engine/draft-negotiator";
import { OperationPoller } from "./engine/operation-poller";
import { loadStrategyCatalog } from "./engine/strategies";
import { TimeslotResolver } from "./engine/timeslot-resolver";
import { createGrpcServer, startGrpcServer, stopGrpcServer } from "./grpc/server";
import { HealthProbe } from "./grpc/health.service";
import { FulfillmentApi } from "./remote/fulfillment-api";
import { HttpRemoteClient } from "./remote/remote-client";
import { FileTaskStore } from "./repositories/file-task.repository";
import { TaskStore } from "./repositories/task-store";
import { TaskRepository } from "./repositories/task.repository";
import {
  BookingService,
  ConsoleNotifier,
  LabelStore,
  LeaderElector,
  RateGovernor,
  RetentionReaper,
  SafeNotifier,
  WorkerLoop,
} from "./services";
import { TaskRunner } from "./task-runner";

const TAG = "[supplybook]";

const config = loadConfig();
const workerId = config.workerId ?? `worker-${uuid().slice(0, 8)}`;

// Wiring
const pool: Pool | null =
  config.store.driver === "postgres" && config.store.databaseUrl
    ? createPool(config.store.databaseUrl)
    : null;
const redis: Redis | null = config.redisUrl ? createRedis(config.redisUrl) : null;

const store: TaskStore = pool
  ? new TaskRepository(pool)
  : new FileTaskStore(config.store.dir);

const governor = new RateGovernor(config.engine.rate);
const api = new FulfillmentApi(new HttpRemoteClient(config.remote), {
  observe: (status) => governor.observe(status),
});
const negotiator = new DraftNegotiator(
  api,
  governor,
  loadStrategyCatalog(config.engine.draft.strategiesFile),
  config.engine.draft,
);
const runner = new TaskRunner(
  store,
  {
    api,
    governor,
    negotiator,
    poller: new OperationPoller(governor, config.engine.poll),
    resolver: new TimeslotResolver(config.engine.timeslot.allowFallback),
    labels: new LabelStore(config.engine.labelsDir),
    config: config.engine,
  },
  new SafeNotifier(new ConsoleNotifier()),
);
const bookings = new BookingService(store);

// Components
const worker = new WorkerLoop(store, runner, {
  workerId,
  intervalMs: config.engine.tickIntervalMs,
  stepTimeoutMs: config.engine.stepTimeoutMs,
});
const reaper = new RetentionReaper(
  bookings,
  config.retention.days,
  config.retention.intervalMs,
);
const elector = redis
  ? new LeaderElector(redis, config.leaderTtlSeconds, workerId)
  : null;
const grpcServer = createGrpcServer(bookings, healthProbes());

let leadershipRetry: NodeJS.Timeout | null = null;

function healthProbes(): HealthProbe[] {
  const probes: HealthProbe[] = [() => store.ping()];
  if (redis) probes.push(() => redis.ping());
  return probes;
}

function startDriving(): void {
  worker.start();
  reaper.start();
}

async function stopDriving(): Promise<void> {
  reaper.stop();
  await worker.stop();
}

/** Standbys keep trying until the current leader's lock lapses. */
async function contendForLeadership(leader: LeaderElector): Promise<void> {
  const won = await leader.tryBecomeLeader(() => {
    console.warn(`${TAG} leadership lost, pausing worker`);
    stopDriving()
      .then(() => scheduleLeadershipRetry(leader))
      .catch((err) => console.error(`${TAG} failed to pause worker:`, err));
  });
  if (won) {
    console.log(`${TAG} ${workerId} is the leader`);
    startDriving();
    return;
  }
  console.log(`${TAG} another instance is leader, standing by`);
  scheduleLeadershipRetry(leader);
}

function scheduleLeadershipRetry(leader: LeaderElector): void {
  const delayMs = config.leaderTtlSeconds * 1000;
  leadershipRetry = setTimeout(() => {
    leadershipRetry = null;
    contendForLeadership(leader).catch((err) => {
      console.error(`${TAG} leader election failed:`, err);
      scheduleLeadershipRetry(leader);
    });
  }, delayMs);
}

async function main() {
  console.log(`${TAG} starting engine... (worker: ${workerId}, store: ${config.store.driver})`);

  // Health checks
  if (pool) {
    await pool.query("SELECT 1");
    console.log(`${TAG} postgres connected`);
    await runMigrations(pool);
  }
  await store.ping();

  if (redis) {
    await redis.ping();
    console.log(`${TAG} redis connected`);
  }

  // gRPC
  await startGrpcServer(grpcServer, config.grpcPort);

  // Worker and reaper run only on the leader when Redis is configured
  if (elector) {
    await contendForLeadership(elector);
  } else {
    startDriving();
  }

  console.log(`${TAG} engine ready`);
}

async function shutdown(signal: string) {
  console.log(`${TAG} ${signal} received, shutting down...`);

  if (leadershipRetry) clearTimeout(leadershipRetry);
  await stopDriving();
  if (elector) await elector.releaseLeadership();
  await stopGrpcServer(grpcServer);

  if (pool) await pool.end();
  if (redis) await redis.quit();
  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
