import fs from 'fs';
import os from 'os';
import path from 'path';
import { BookingRequestInput, parseBookingRequest } from '@supplybook/sdk';
import { EngineConfig } from '../../src/config';
import { TaskRecord, createTaskRecord } from '../../src/db/task.entity';
import { DraftNegotiator } from '../../src/engine/draft-negotiator';
import { OperationPoller } from '../../src/engine/operation-poller';
import { StageContext, StageServices } from '../../src/engine/stage-context';
import { loadStrategyCatalog } from '../../src/engine/strategies';
import { TimeslotResolver } from '../../src/engine/timeslot-resolver';
import { FulfillmentApi } from '../../src/remote/fulfillment-api';
import { RemoteClient } from '../../src/remote/remote-client';
import { TaskStore } from '../../src/repositories/task-store';
import { LabelStore } from '../../src/services/label-store';
import { Notification, Notifier, SafeNotifier } from '../../src/services/notifier';
import { RateGovernor } from '../../src/services/rate-governor';
import { dueAt } from '../../src/services/worker-loop';
import { TaskRunner } from '../../src/task-runner';

export const BASE_NOW = Date.parse('2026-11-01T08:00:00Z');
export const TASK_ID = 'a1b2c3d4-0000-4000-8000-000000000001';

// 07:00Z to 09:00Z on 5 November
export const WINDOW_START = '2026-11-05T10:00:00+03:00';
export const WINDOW_END = '2026-11-05T12:00:00+03:00';

export function bookingInput(overrides: Partial<BookingRequestInput> = {}): BookingRequestInput {
    return {
        lineItems: [{ productId: '1001', quantity: 12, boxes: 2 }],
        windowStart: WINDOW_START,
        windowEnd: WINDOW_END,
        recipient: 'ops-chat-1',
        ...overrides,
    };
}

export function makeTask(overrides: Partial<TaskRecord> = {}, input: BookingRequestInput = bookingInput()): TaskRecord {
    return { ...createTaskRecord(parseBookingRequest(input), TASK_ID, BASE_NOW), ...overrides };
}

export function makeTempDir(prefix: string): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function testEngineConfig(labelsDir: string, overrides: Partial<EngineConfig> = {}): EngineConfig {
    return {
        tickIntervalMs: 1000,
        stepTimeoutMs: 5000,
        transientRetryMs: 1000,
        maxTransientFailures: 3,
        draft: {
            maxAttempts: 20,
            fastDelayMs: 100,
            normalDelayMs: 200,
            transientBaseMs: 1000,
            shapeErrorMarkers: ['supply type is unknown', 'unknown field', 'cannot unmarshal'],
            strategiesFile: null,
        },
        rate: { globalDraftIntervalMs: 0, baseWaitMs: 4000, maxWaitMs: 40000, jitterMs: 0 },
        poll: { intervalMs: 1000, timeoutMs: 600000, maxRetries: 5 },
        timeslot: { pollIntervalMs: 180000, extraDays: 0, allowFallback: true },
        stage: { retryBaseMs: 1000, maxRetries: 3 },
        order: { pollIntervalMs: 20000, fastPollIntervalMs: 5000, fastPollWindowMs: 60000 },
        labelsDir,
        ...overrides,
    };
}

export class ManualClock {
    now = BASE_NOW;
    readonly read = (): number => this.now;

    advance(ms: number): void {
        this.now += ms;
    }
}

export class RecordingNotifier implements Notifier {
    readonly sent: ({ recipient: string } & Notification)[] = [];

    async notifyText(recipient: string, text: string): Promise<void> {
        this.sent.push({ recipient, kind: 'text', text });
    }

    async notifyFile(recipient: string, filePath: string, caption: string): Promise<void> {
        this.sent.push({ recipient, kind: 'file', filePath, caption });
    }
}

export interface TestEngine {
    services: StageServices;
    runner: TaskRunner;
    notifier: RecordingNotifier;
    clock: ManualClock;
}

/** Stage services wired the way the entry point wires them, on a manual clock with centred jitter. */
export function buildServices(remote: RemoteClient, config: EngineConfig, clock = new ManualClock()): StageServices {
    const governor = new RateGovernor(config.rate, clock.read, () => 0.5);
    const api = new FulfillmentApi(remote, { observe: status => governor.observe(status), now: clock.read });
    return {
        api,
        governor,
        negotiator: new DraftNegotiator(api, governor, loadStrategyCatalog(), config.draft),
        poller: new OperationPoller(governor, config.poll),
        resolver: new TimeslotResolver(config.timeslot.allowFallback),
        labels: new LabelStore(config.labelsDir),
        config,
    };
}

export function buildEngine(remote: RemoteClient, store: TaskStore, config: EngineConfig, clock = new ManualClock()): TestEngine {
    const services = buildServices(remote, config, clock);
    const notifier = new RecordingNotifier();
    const runner = new TaskRunner(store, services, new SafeNotifier(notifier), clock.read);
    return { services, runner, notifier, clock };
}

/** A handler context that collects notifications into `outbox`. */
export function stageContext(services: StageServices, now: number, outbox: Notification[] = []): StageContext {
    return {
        ...services,
        now,
        notify: text => outbox.push({ kind: 'text', text }),
        notifyFile: (filePath, caption) => outbox.push({ kind: 'file', filePath, caption }),
    };
}

/**
 * Drives one task through the runner, jumping the clock to each due time,
 * until `done` holds for the stored record.
 */
export async function runUntil(
    engine: TestEngine,
    store: TaskStore,
    id: string,
    done: (task: TaskRecord) => boolean,
    maxSteps = 200,
): Promise<TaskRecord> {
    for (let step = 0; step < maxSteps; step++) {
        const task = await store.get(id);
        if (!task) throw new Error(`task ${id} disappeared`);
        if (done(task)) return task;
        engine.clock.now = Math.max(engine.clock.now, dueAt(task));
        await engine.runner.process(id);
    }
    throw new Error(`task ${id} did not settle within ${maxSteps} steps`);
}
