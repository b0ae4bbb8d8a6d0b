import { TaskRecord, taskStatus } from '../../db/task.entity';
import { StageContext, StageHandler } from '../stage-context';
import { enterRateLimit, failTask, recordEvent, schedule, transition } from '../state-machine';

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_DRAFT_RECREATES = 5;

function startOfUtcDay(at: number): number {
    const d = new Date(at);
    return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
}

/** Whole UTC days covering the window, widened by `extraDays` at the end. */
export function searchRange(task: TaskRecord, extraDays: number): { dateFrom: string; dateTo: string } {
    const from = startOfUtcDay(task.window_start_at);
    const to = startOfUtcDay(task.window_end_at) + (1 + extraDays) * DAY_MS - 1000;
    return {
        dateFrom: new Date(from).toISOString().replace('.000Z', 'Z'),
        dateTo: new Date(to).toISOString().replace('.000Z', 'Z'),
    };
}

/** The draft is gone on the remote side: build a new one with the shape that worked. */
function recreateDraft(task: TaskRecord, ctx: StageContext, message: string): void {
    task.stale_draft_recreates += 1;
    if (task.stale_draft_recreates > MAX_DRAFT_RECREATES) {
        failTask(task, 'draft_expired', ctx.now, `draft expired ${task.stale_draft_recreates} times; last error: ${message}`);
        return;
    }
    const winner = task.strategies?.findIndex(s => s.name === task.winning_strategy) ?? -1;
    task.strategy_index = winner >= 0 ? winner : 0;
    task.draft_operation_id = null;
    task.draft_id = null;
    task.chosen_warehouse_id = null;
    task.bundle_id = null;
    task.last_error = message;
    transition(task, taskStatus.DRAFT_CREATING, ctx.now, { reason: 'draft_not_found' });
    schedule(task, 0, ctx.now);
}

export const timeslotSearch: StageHandler = async (task, ctx) => {
    if (task.slot_from && task.slot_to) {
        transition(task, taskStatus.TIMESLOT_SETTING, ctx.now);
        schedule(task, 0, ctx.now);
        return;
    }
    const draftId = task.draft_id;
    const warehouseId = task.chosen_warehouse_id;
    if (!draftId || !warehouseId) {
        recreateDraft(task, ctx, 'no draft to search slots for');
        return;
    }

    const outcome = await ctx.api.queryTimeslots({
        draftId,
        warehouseIds: [warehouseId],
        bundleId: task.bundle_id,
        ...searchRange(task, ctx.config.timeslot.extraDays),
    });

    switch (outcome.kind) {
        case 'ok': {
            const choice = ctx.resolver.resolve(outcome.value, { startAt: task.window_start_at, endAt: task.window_end_at });
            if (!choice) {
                task.last_error = outcome.value.length > 0
                    ? `none of ${outcome.value.length} offered slots is usable`
                    : 'no slots offered yet';
                schedule(task, ctx.config.timeslot.pollIntervalMs, ctx.now);
                return;
            }
            const hinted = task.destination.drop_off_warehouse_id;
            task.slot_id = choice.slotId;
            task.slot_from = choice.from;
            task.slot_to = choice.to;
            task.drop_off_warehouse_id = choice.dropOffWarehouseId ?? (hinted !== undefined ? String(hinted) : null);
            task.last_error = null;
            transition(task, taskStatus.TIMESLOT_SETTING, ctx.now, { slot_from: choice.from, exact: choice.exact });
            schedule(task, 0, ctx.now);
            return;
        }
        case 'not_found':
            recreateDraft(task, ctx, outcome.message);
            return;
        case 'rate_limited':
            enterRateLimit(task, ctx.governor.rateLimitWait(outcome.retryAfterMs), ctx.now, 'timeslot_search');
            return;
        case 'pending':
            schedule(task, ctx.config.timeslot.pollIntervalMs, ctx.now);
            return;
        case 'rejected':
        case 'transient':
        case 'failed':
            task.last_error = outcome.message;
            schedule(task, ctx.config.timeslot.pollIntervalMs, ctx.now);
            return;
    }
};

function confirmSlot(task: TaskRecord, ctx: StageContext, result: string): void {
    task.slot_confirmed = true;
    recordEvent(task, 'draft_timeslot', ctx.now, { result });
    transition(task, taskStatus.SUPPLY_CREATING, ctx.now);
    schedule(task, 0, ctx.now);
}

/**
 * Pins the slot on the draft for drop-off supplies. Failure here never
 * blocks the booking: supply creation carries the slot as well.
 */
export const timeslotSetting: StageHandler = async (task, ctx) => {
    if (task.slot_confirmed) {
        transition(task, taskStatus.SUPPLY_CREATING, ctx.now);
        schedule(task, 0, ctx.now);
        return;
    }
    if (!task.draft_id || !task.slot_from || !task.slot_to) {
        failTask(task, 'missing_slot', ctx.now, 'slot confirmation without a draft and slot');
        return;
    }
    if (!task.drop_off_warehouse_id) {
        confirmSlot(task, ctx, 'skipped');
        return;
    }

    const outcome = await ctx.api.setDraftTimeslot({
        draftId: task.draft_id,
        dropOffWarehouseId: task.drop_off_warehouse_id,
        slotId: task.slot_id,
        from: task.slot_from,
        to: task.slot_to,
    });

    switch (outcome.kind) {
        case 'ok':
            confirmSlot(task, ctx, 'set');
            return;
        case 'not_found':
            confirmSlot(task, ctx, 'unsupported');
            return;
        case 'rejected':
        case 'failed':
            task.last_error = outcome.message;
            confirmSlot(task, ctx, 'rejected');
            return;
        case 'rate_limited':
            enterRateLimit(task, ctx.governor.rateLimitWait(outcome.retryAfterMs), ctx.now, 'timeslot_set');
            return;
        case 'pending':
            schedule(task, ctx.config.stage.retryBaseMs, ctx.now);
            return;
        case 'transient':
            task.stage_attempts += 1;
            task.last_error = outcome.message;
            if (task.stage_attempts > ctx.config.stage.maxRetries) {
                confirmSlot(task, ctx, 'gave_up');
                return;
            }
            schedule(task, ctx.governor.transientBackoff(task.stage_attempts, ctx.config.stage.retryBaseMs), ctx.now);
            return;
    }
};
