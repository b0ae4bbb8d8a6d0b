import { TaskRecord, taskStatus } from '../../db/task.entity';
import { selectWarehouse } from '../warehouse-selector';
import { StageHandler } from '../stage-context';
import { enterRateLimit, failTask, schedule, transition } from '../state-machine';
import { applyPoll } from './common';

/** First problem with a stored request, or null when it can be booked. */
export function requestProblem(task: TaskRecord): string | null {
    if (task.line_items.length === 0) return 'no line items';
    for (const item of task.line_items) {
        if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
            return `line item ${item.product_id} has quantity ${item.quantity}`;
        }
        const boxes = item.boxes ?? 1;
        if (!Number.isInteger(boxes) || boxes <= 0 || item.quantity % boxes !== 0) {
            return `line item ${item.product_id}: ${item.quantity} units do not split into ${boxes} boxes`;
        }
    }
    if (Number.isNaN(task.window_start_at) || Number.isNaN(task.window_end_at) || task.window_end_at <= task.window_start_at) {
        return 'window end must be after window start';
    }
    return null;
}

export const waitingWindow: StageHandler = async (task, ctx) => {
    const problem = requestProblem(task);
    if (problem) {
        failTask(task, 'invalid_request', ctx.now, problem);
        return;
    }
    transition(task, taskStatus.DRAFT_CREATING, ctx.now);
    schedule(task, 0, ctx.now);
};

export const draftCreating: StageHandler = async (task, ctx) => {
    if (task.draft_operation_id) {
        transition(task, taskStatus.POLLING_DRAFT, ctx.now);
        schedule(task, 0, ctx.now);
        return;
    }

    const step = await ctx.negotiator.negotiate(task, ctx.now);
    switch (step.kind) {
        case 'accepted':
            task.draft_operation_id = step.operationId;
            ctx.poller.begin(task, ctx.now);
            transition(task, taskStatus.POLLING_DRAFT, ctx.now, { strategy: step.strategy });
            schedule(task, ctx.config.poll.intervalMs, ctx.now);
            return;
        case 'next_strategy':
        case 'retry_same':
        case 'throttled':
            schedule(task, step.delayMs, ctx.now);
            return;
        case 'rate_limited':
            enterRateLimit(task, step.waitMs, ctx.now, 'draft_create');
            return;
        case 'failed':
            failTask(task, step.reason, ctx.now, step.message);
            return;
    }
};

export const pollingDraft: StageHandler = async (task, ctx) => {
    if (task.draft_id && task.chosen_warehouse_id) {
        transition(task, taskStatus.TIMESLOT_SEARCH, ctx.now);
        schedule(task, 0, ctx.now);
        return;
    }
    const operationId = task.draft_operation_id;
    if (!operationId) {
        failTask(task, 'missing_operation_id', ctx.now, 'draft poll without a draft operation');
        return;
    }

    const result = await ctx.poller.poll(task, 'draft', ctx.now, () => ctx.api.getDraftInfo(operationId));
    applyPoll(task, ctx, 'draft_info', result, info => {
        const picked = selectWarehouse(info.warehouses, task.destination);
        const warehouseId =
            picked?.warehouseId ?? (task.destination.warehouse_id !== undefined ? String(task.destination.warehouse_id) : null);
        if (!warehouseId) {
            failTask(task, 'warehouse_not_resolved', ctx.now, `draft ${info.draftId} offers no warehouse`);
            return;
        }
        task.draft_id = info.draftId;
        task.chosen_warehouse_id = warehouseId;
        task.bundle_id = picked?.bundleId ?? null;
        task.last_error = null;
        transition(task, taskStatus.TIMESLOT_SEARCH, ctx.now, { draft_id: info.draftId, warehouse_id: warehouseId });
        schedule(task, 0, ctx.now);
    });
};
