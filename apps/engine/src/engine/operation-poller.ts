import { PollConfig } from '../config';
import { TaskRecord } from '../db/task.entity';
import { ApiOutcome } from '../remote/fulfillment-api';
import { RateGovernor } from '../services/rate-governor';

export type PollResult<T> =
    | { kind: 'done'; value: T }
    | { kind: 'waiting'; delayMs: number }
    | { kind: 'rate_limited'; waitMs: number }
    | { kind: 'failed'; reason: string; message: string };

/**
 * One status check per call for a long-running remote operation. The
 * wall-clock budget starts at `op_started_at`; `op_retries` counts failed
 * checks. Rate-limited checks count against neither.
 */
export class OperationPoller {
    constructor(
        private readonly governor: RateGovernor,
        private readonly config: PollConfig,
    ) { }

    /** Marks the start of a freshly submitted operation. */
    begin(task: TaskRecord, now: number): void {
        task.op_started_at = now;
        task.op_retries = 0;
    }

    async poll<T>(
        task: TaskRecord,
        label: string,
        now: number,
        probe: () => Promise<ApiOutcome<T>>,
    ): Promise<PollResult<T>> {
        if (task.op_started_at === null) {
            task.op_started_at = now;
        }
        const elapsed = now - task.op_started_at;
        if (elapsed > this.config.timeoutMs) {
            return {
                kind: 'failed',
                reason: `${label}_poll_timeout`,
                message: `${label} operation still unfinished after ${Math.round(elapsed / 1000)}s`,
            };
        }

        const outcome = await probe();
        switch (outcome.kind) {
            case 'ok':
                task.op_started_at = null;
                task.op_retries = 0;
                return { kind: 'done', value: outcome.value };

            case 'pending':
                return { kind: 'waiting', delayMs: this.config.intervalMs };

            case 'rate_limited':
                return { kind: 'rate_limited', waitMs: this.governor.rateLimitWait(outcome.retryAfterMs) };

            case 'failed':
                return { kind: 'failed', reason: `${label}_remote_error`, message: outcome.message };

            case 'not_found':
            case 'rejected':
            case 'transient':
                task.op_retries += 1;
                task.last_error = outcome.message;
                if (task.op_retries > this.config.maxRetries) {
                    return {
                        kind: 'failed',
                        reason: `${label}_poll_retries_exceeded`,
                        message: `${label} status check failed ${task.op_retries} times; last error: ${outcome.message}`,
                    };
                }
                return { kind: 'waiting', delayMs: this.config.intervalMs };
        }
    }
}
