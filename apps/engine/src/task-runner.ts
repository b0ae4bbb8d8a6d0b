import { EngineConfig } from './config';
import { TaskRecord, cloneTask, isTerminal, shortId, taskStatus } from './db/task.entity';
import { handlerFor } from './engine/handlers';
import { StageContext, StageServices } from './engine/stage-context';
import { bookingDeadline, failTask, isWindowExpired, resumeFromRateLimit, schedule } from './engine/state-machine';
import { StageRetryError } from './errors';
import { TaskStore } from './repositories/task-store';
import { Notification, SafeNotifier } from './services/notifier';
import { errorMessage } from './utils/json';

const TAG = '[runner]';

export type RunResult =
    | 'missing'
    | 'terminal'
    | 'not_due'
    | 'resumed'
    | 'expired'
    | 'advanced'
    | 'discarded'
    | 'errored';

/**
 * Runs one step of one task: re-read, advance by a single stage, commit.
 *
 * The commit only lands if nobody else wrote the task meanwhile, so an
 * operator cancel or retry during a remote call always wins. Notifications
 * queued by the step go out after the commit, never before.
 */
export class TaskRunner {
    constructor(
        private readonly store: TaskStore,
        private readonly services: StageServices,
        private readonly notifier: SafeNotifier,
        private readonly now: () => number = Date.now,
    ) { }

    private get config(): EngineConfig {
        return this.services.config;
    }

    async process(id: string): Promise<RunResult> {
        const stored = await this.store.get(id);
        if (!stored) return 'missing';
        if (isTerminal(stored.status)) return 'terminal';

        const now = this.now();
        if (stored.next_attempt_at > now) return 'not_due';
        if (stored.status === taskStatus.RATE_LIMITED && stored.rate_limited_until !== null && stored.rate_limited_until > now) {
            return 'not_due';
        }

        let task = cloneTask(stored);
        const outbox: Notification[] = [];
        let result: RunResult;
        try {
            result = await this.advance(task, now, outbox);
        } catch (err) {
            outbox.length = 0;
            task = cloneTask(stored);
            this.recordError(task, err, now);
            result = 'errored';
        }

        const committed = await this.store.update(id, current => (current.revision === stored.revision ? task : null));
        if (!committed) {
            console.log(`${TAG} task ${shortId(id)} changed while running, result discarded`);
            return 'discarded';
        }

        if (committed.status !== stored.status) {
            console.log(`${TAG} task ${shortId(id)} ${stored.status} -> ${committed.status}`);
        }
        if (committed.status === taskStatus.FAILED) {
            outbox.push({ kind: 'text', text: failureText(committed) });
        }
        for (const notification of outbox) {
            await this.notifier.deliver(committed.recipient, notification);
        }
        return result;
    }

    private async advance(task: TaskRecord, now: number, outbox: Notification[]): Promise<RunResult> {
        if (isWindowExpired(task, now)) {
            const ended = bookingDeadline(task) > task.window_end_at
                ? `chosen slot ended at ${task.slot_to}`
                : `requested window ended at ${task.window_end}`;
            failTask(task, 'window_expired', now, `${ended} before a supply order was ready`);
            return 'expired';
        }
        if (task.status === taskStatus.RATE_LIMITED) {
            resumeFromRateLimit(task, now);
            return 'resumed';
        }

        const handler = handlerFor(task.status);
        if (!handler) return 'terminal';

        const ctx: StageContext = {
            ...this.services,
            now,
            notify: text => outbox.push({ kind: 'text', text }),
            notifyFile: (filePath, caption) => outbox.push({ kind: 'file', filePath, caption }),
        };
        await handler(task, ctx);
        return 'advanced';
    }

    private recordError(task: TaskRecord, err: unknown, now: number): void {
        const retry = err instanceof StageRetryError;
        const message = retry ? err.reason : `unexpected: ${errorMessage(err)}`;
        console.error(`${TAG} task ${shortId(task.id)} failed in ${task.status}:`, err);

        task.transient_failures += 1;
        task.last_error = message;
        if (task.transient_failures > this.config.maxTransientFailures) {
            failTask(task, 'transient_errors_exhausted', now, message);
            return;
        }
        schedule(task, retry ? err.delay : this.config.transientRetryMs, now);
    }
}

function failureText(task: TaskRecord): string {
    const reason = task.failure_reason ?? 'unknown';
    const detail = task.last_error && task.last_error !== reason ? ` ${task.last_error}` : '';
    return `Booking ${shortId(task.id)} failed (${reason}).${detail}`;
}
