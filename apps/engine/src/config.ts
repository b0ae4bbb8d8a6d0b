import path from 'path';
import { z } from 'zod';

const ms = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const count = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const flag = (fallback: boolean) =>
    z
        .enum(['true', 'false', '1', '0'])
        .default(fallback ? 'true' : 'false')
        .transform(value => value === 'true' || value === '1');
const optionalString = z
    .string()
    .optional()
    .transform(value => (value && value.trim() !== '' ? value.trim() : null));

const envSchema = z.object({
    GRPC_PORT: count(50051),
    WORKER_ID: optionalString,

    STORE_DRIVER: z.enum(['postgres', 'file']).default('file'),
    DATABASE_URL: optionalString,
    TASK_STORE_DIR: z.string().default('./data/tasks'),
    REDIS_URL: optionalString,
    LEADER_TTL_SECONDS: count(30),
    RETENTION_DAYS: count(30),
    REAPER_INTERVAL_MS: ms(3_600_000),

    REMOTE_BASE_URL: z.string().url().default('https://api-seller.example.com'),
    REMOTE_CLIENT_ID: z.string().default(''),
    REMOTE_API_KEY: z.string().default(''),
    REMOTE_TIMEOUT_MS: ms(30_000),
    REMOTE_TRANSPORT_RETRIES: z.coerce.number().int().nonnegative().default(2),

    TICK_INTERVAL_MS: ms(5_000),
    TASK_STEP_TIMEOUT_MS: ms(12_000),
    TRANSIENT_RETRY_MS: ms(5_000),
    MAX_TRANSIENT_FAILURES: count(50),

    MAX_DRAFT_ATTEMPTS: count(20),
    FAST_STRATEGY_DELAY_MS: ms(2_000),
    NORMAL_STRATEGY_DELAY_MS: ms(10_000),
    DRAFT_RETRY_BASE_MS: ms(20_000),
    DRAFT_SHAPE_ERROR_MARKERS: z.string().default('supply type is unknown,unknown field,cannot unmarshal'),
    DRAFT_STRATEGIES_FILE: optionalString,

    GLOBAL_DRAFT_MIN_INTERVAL_MS: ms(1_000),
    RATE_LIMIT_BASE_WAIT_MS: ms(4_000),
    RATE_LIMIT_MAX_WAIT_MS: ms(40_000),
    RATE_LIMIT_JITTER_MS: ms(1_500),

    OPERATION_POLL_INTERVAL_MS: ms(25_000),
    OPERATION_POLL_TIMEOUT_MS: ms(600_000),
    MAX_OPERATION_RETRIES: count(25),

    SLOT_POLL_INTERVAL_MS: ms(180_000),
    TIMESLOT_SEARCH_EXTRA_DAYS: z.coerce.number().int().nonnegative().default(0),
    TIMESLOT_ALLOW_FALLBACK: flag(true),

    STAGE_RETRY_BASE_MS: ms(5_000),
    MAX_STAGE_RETRIES: count(8),

    ORDER_FILL_POLL_INTERVAL_MS: ms(20_000),
    ORDER_FAST_POLL_INTERVAL_MS: ms(5_000),
    ORDER_FAST_POLL_WINDOW_MS: ms(60_000),

    LABELS_DIR: z.string().default('./data/labels'),
});

export interface DraftConfig {
    maxAttempts: number;
    fastDelayMs: number;
    normalDelayMs: number;
    transientBaseMs: number;
    shapeErrorMarkers: string[];
    strategiesFile: string | null;
}

export interface RateConfig {
    globalDraftIntervalMs: number;
    baseWaitMs: number;
    maxWaitMs: number;
    jitterMs: number;
}

export interface PollConfig {
    intervalMs: number;
    timeoutMs: number;
    maxRetries: number;
}

export interface EngineConfig {
    tickIntervalMs: number;
    stepTimeoutMs: number;
    transientRetryMs: number;
    maxTransientFailures: number;
    draft: DraftConfig;
    rate: RateConfig;
    poll: PollConfig;
    timeslot: { pollIntervalMs: number; extraDays: number; allowFallback: boolean };
    stage: { retryBaseMs: number; maxRetries: number };
    order: { pollIntervalMs: number; fastPollIntervalMs: number; fastPollWindowMs: number };
    labelsDir: string;
}

export interface RemoteConfig {
    baseUrl: string;
    clientId: string;
    apiKey: string;
    timeoutMs: number;
    transportRetries: number;
}

export interface AppConfig {
    grpcPort: number;
    workerId: string | null;
    store: { driver: 'postgres' | 'file'; databaseUrl: string | null; dir: string };
    redisUrl: string | null;
    leaderTtlSeconds: number;
    retention: { days: number; intervalMs: number };
    remote: RemoteConfig;
    engine: EngineConfig;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new ConfigError(`invalid configuration: ${details}`);
    }
    const e = parsed.data;

    if (e.STORE_DRIVER === 'postgres' && !e.DATABASE_URL) {
        throw new ConfigError('invalid configuration: DATABASE_URL is required when STORE_DRIVER=postgres');
    }

    return {
        grpcPort: e.GRPC_PORT,
        workerId: e.WORKER_ID,
        store: { driver: e.STORE_DRIVER, databaseUrl: e.DATABASE_URL, dir: path.resolve(e.TASK_STORE_DIR) },
        redisUrl: e.REDIS_URL,
        leaderTtlSeconds: e.LEADER_TTL_SECONDS,
        retention: { days: e.RETENTION_DAYS, intervalMs: e.REAPER_INTERVAL_MS },
        remote: {
            baseUrl: e.REMOTE_BASE_URL,
            clientId: e.REMOTE_CLIENT_ID,
            apiKey: e.REMOTE_API_KEY,
            timeoutMs: e.REMOTE_TIMEOUT_MS,
            transportRetries: e.REMOTE_TRANSPORT_RETRIES,
        },
        engine: {
            tickIntervalMs: e.TICK_INTERVAL_MS,
            stepTimeoutMs: e.TASK_STEP_TIMEOUT_MS,
            transientRetryMs: e.TRANSIENT_RETRY_MS,
            maxTransientFailures: e.MAX_TRANSIENT_FAILURES,
            draft: {
                maxAttempts: e.MAX_DRAFT_ATTEMPTS,
                fastDelayMs: e.FAST_STRATEGY_DELAY_MS,
                normalDelayMs: e.NORMAL_STRATEGY_DELAY_MS,
                transientBaseMs: e.DRAFT_RETRY_BASE_MS,
                shapeErrorMarkers: e.DRAFT_SHAPE_ERROR_MARKERS.split(',')
                    .map(marker => marker.trim().toLowerCase())
                    .filter(marker => marker !== ''),
                strategiesFile: e.DRAFT_STRATEGIES_FILE,
            },
            rate: {
                globalDraftIntervalMs: e.GLOBAL_DRAFT_MIN_INTERVAL_MS,
                baseWaitMs: e.RATE_LIMIT_BASE_WAIT_MS,
                maxWaitMs: e.RATE_LIMIT_MAX_WAIT_MS,
                jitterMs: e.RATE_LIMIT_JITTER_MS,
            },
            poll: {
                intervalMs: e.OPERATION_POLL_INTERVAL_MS,
                timeoutMs: e.OPERATION_POLL_TIMEOUT_MS,
                maxRetries: e.MAX_OPERATION_RETRIES,
            },
            timeslot: {
                pollIntervalMs: e.SLOT_POLL_INTERVAL_MS,
                extraDays: e.TIMESLOT_SEARCH_EXTRA_DAYS,
                allowFallback: e.TIMESLOT_ALLOW_FALLBACK,
            },
            stage: { retryBaseMs: e.STAGE_RETRY_BASE_MS, maxRetries: e.MAX_STAGE_RETRIES },
            order: {
                pollIntervalMs: e.ORDER_FILL_POLL_INTERVAL_MS,
                fastPollIntervalMs: e.ORDER_FAST_POLL_INTERVAL_MS,
                fastPollWindowMs: e.ORDER_FAST_POLL_WINDOW_MS,
            },
            labelsDir: path.resolve(e.LABELS_DIR),
        },
    };
}
