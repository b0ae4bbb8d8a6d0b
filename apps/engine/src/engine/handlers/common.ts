import { TaskRecord } from '../../db/task.entity';
import { ApiOutcome } from '../../remote/fulfillment-api';
import { PollResult } from '../operation-poller';
import { StageContext } from '../stage-context';
import { enterRateLimit, failTask, schedule } from '../state-machine';

/** Same stage again after a backoff, or failure once the stage retry budget is spent. */
export function retryStage(task: TaskRecord, ctx: StageContext, label: string, message: string): void {
    task.stage_attempts += 1;
    task.last_error = message;
    if (task.stage_attempts > ctx.config.stage.maxRetries) {
        failTask(task, `${label}_failed`, ctx.now, `${label} failed ${task.stage_attempts} times; last error: ${message}`);
        return;
    }
    schedule(task, ctx.governor.transientBackoff(task.stage_attempts, ctx.config.stage.retryBaseMs), ctx.now);
}

export function applyPoll<T>(
    task: TaskRecord,
    ctx: StageContext,
    label: string,
    result: PollResult<T>,
    onDone: (value: T) => void,
): void {
    switch (result.kind) {
        case 'done':
            onDone(result.value);
            return;
        case 'waiting':
            schedule(task, result.delayMs, ctx.now);
            return;
        case 'rate_limited':
            enterRateLimit(task, result.waitMs, ctx.now, label);
            return;
        case 'failed':
            failTask(task, result.reason, ctx.now, result.message);
            return;
    }
}

/**
 * Outcome of a call that starts a remote operation. Rejections fail the task
 * unless the stage has its own way back.
 */
export function applySubmit<T>(
    task: TaskRecord,
    ctx: StageContext,
    label: string,
    outcome: ApiOutcome<T>,
    onOk: (value: T) => void,
    onRejected?: (message: string) => void,
): void {
    switch (outcome.kind) {
        case 'ok':
            onOk(outcome.value);
            return;
        case 'rate_limited':
            enterRateLimit(task, ctx.governor.rateLimitWait(outcome.retryAfterMs), ctx.now, label);
            return;
        case 'pending':
            schedule(task, ctx.config.stage.retryBaseMs, ctx.now);
            return;
        case 'transient':
            retryStage(task, ctx, label, outcome.message);
            return;
        case 'not_found':
        case 'rejected':
        case 'failed':
            if (onRejected) {
                onRejected(outcome.message);
            } else {
                failTask(task, `${label}_rejected`, ctx.now, outcome.message);
            }
            return;
    }
}
