import { TaskRecord, shortId, taskStatus } from '../db/task.entity';
import { TaskStore } from '../repositories/task-store';
import { RunResult } from '../task-runner';
import { KeyedMutex } from '../utils/keyed-mutex';

const TAG = '[worker]';

export interface WorkerLoopConfig {
    workerId: string;
    intervalMs: number;
    /** Upper bound a tick waits on one task; the task keeps its lock until it settles. */
    stepTimeoutMs: number;
}

export interface TickSummary {
    scanned: number;
    dispatched: number;
    skippedLocked: number;
    timedOut: number;
}

export interface TaskProcessor {
    process(id: string): Promise<RunResult>;
}

/** When a task is next eligible to run. */
export function dueAt(task: TaskRecord): number {
    if (task.status === taskStatus.RATE_LIMITED && task.rate_limited_until !== null) {
        return Math.max(task.rate_limited_until, task.next_attempt_at);
    }
    return task.next_attempt_at;
}

/**
 * Periodic scan of active tasks. Every due task is dispatched on its own
 * under a per-task lock, so a slow or failing task never holds up the rest.
 */
export class WorkerLoop {
    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    private readonly locks = new KeyedMutex();

    constructor(
        private readonly store: Pick<TaskStore, 'listActive'>,
        private readonly runner: TaskProcessor,
        private readonly config: WorkerLoopConfig,
        private readonly now: () => number = Date.now,
    ) { }

    get isRunning(): boolean {
        return this.running;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (worker: ${this.config.workerId}, tick: ${this.config.intervalMs}ms)`);
        this.scheduleNext(0);
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        if (this.inFlight) {
            await this.inFlight;
        }
        console.log(`${TAG} stopped`);
    }

    async tick(): Promise<TickSummary> {
        const tasks = await this.store.listActive();
        const now = this.now();
        const summary: TickSummary = { scanned: tasks.length, dispatched: 0, skippedLocked: 0, timedOut: 0 };

        const due = tasks.filter(task => dueAt(task) <= now).sort((a, b) => dueAt(a) - dueAt(b));
        const runs: Promise<void>[] = [];
        for (const task of due) {
            if (this.locks.isLocked(task.id)) {
                summary.skippedLocked += 1;
                continue;
            }
            summary.dispatched += 1;
            runs.push(this.dispatch(task.id, summary));
        }
        await Promise.all(runs);
        return summary;
    }

    private async dispatch(id: string, summary: TickSummary): Promise<void> {
        const work = this.locks.runExclusive(id, () => this.runner.process(id));

        let timer: NodeJS.Timeout | undefined = undefined;
        const timeout = new Promise<'timeout'>(resolve => {
            timer = setTimeout(() => resolve('timeout'), this.config.stepTimeoutMs);
        });

        try {
            const result = await Promise.race([work, timeout]);
            if (result === 'timeout') {
                summary.timedOut += 1;
                console.warn(`${TAG} task ${shortId(id)} still running after ${this.config.stepTimeoutMs}ms, moving on`);
                work.catch(err => console.error(`${TAG} task ${shortId(id)} failed after timeout:`, err));
            }
        } catch (err) {
            console.error(`${TAG} task ${shortId(id)} failed:`, err);
        } finally {
            clearTimeout(timer);
        }
    }

    private scheduleNext(delayMs: number): void {
        if (!this.running) return;
        this.currentTimeout = setTimeout(() => {
            this.inFlight = this.loop().finally(() => {
                this.inFlight = null;
            });
        }, delayMs);
    }

    private async loop(): Promise<void> {
        try {
            const summary = await this.tick();
            if (summary.dispatched > 0 || summary.timedOut > 0) {
                console.log(
                    `${TAG} tick: ${summary.dispatched} dispatched, ${summary.skippedLocked} busy, ${summary.timedOut} timed out`,
                );
            }
        } catch (err) {
            console.error(`${TAG} tick failed:`, err);
        }
        this.scheduleNext(this.config.intervalMs);
    }
}
