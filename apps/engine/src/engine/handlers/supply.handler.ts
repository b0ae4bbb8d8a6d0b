import { TaskRecord, shortId, taskStatus } from '../../db/task.entity';
import { StageContext, StageHandler } from '../stage-context';
import { enterRateLimit, failTask, recordEvent, schedule, transition } from '../state-machine';
import { applyPoll, applySubmit } from './common';

const MAX_SLOT_RETRIES = 5;
const SLOT_REFUSAL = /slot/i;

/** The slot went away between search and submit. The counter survives the stage change. */
function searchAgain(task: TaskRecord, ctx: StageContext, message: string): void {
    task.supply_slot_retries += 1;
    if (task.supply_slot_retries > MAX_SLOT_RETRIES) {
        failTask(task, 'supply_slot_retries_exhausted', ctx.now, `supply refused the slot ${task.supply_slot_retries} times; last error: ${message}`);
        return;
    }
    task.last_error = message;
    task.slot_id = null;
    task.slot_from = null;
    task.slot_to = null;
    task.slot_confirmed = false;
    transition(task, taskStatus.TIMESLOT_SEARCH, ctx.now, { reason: 'slot_refused', retry: task.supply_slot_retries });
    schedule(task, ctx.governor.transientBackoff(task.supply_slot_retries, ctx.config.stage.retryBaseMs), ctx.now);
}

export const supplyCreating: StageHandler = async (task, ctx) => {
    if (task.supply_operation_id) {
        transition(task, taskStatus.POLLING_SUPPLY, ctx.now);
        schedule(task, 0, ctx.now);
        return;
    }
    if (!task.draft_id || !task.chosen_warehouse_id || !task.slot_from || !task.slot_to) {
        failTask(task, 'missing_booking_data', ctx.now, 'supply creation needs a draft, a warehouse and a slot');
        return;
    }

    const outcome = await ctx.api.createSupply({
        draftId: task.draft_id,
        warehouseId: task.chosen_warehouse_id,
        slotId: task.slot_id,
        from: task.slot_from,
        to: task.slot_to,
        dropOffWarehouseId: task.drop_off_warehouse_id,
    });

    if (outcome.kind === 'rejected' && (outcome.status === 401 || outcome.status === 403)) {
        failTask(task, 'remote_unauthorized', ctx.now, outcome.message);
        return;
    }
    const slotGone =
        outcome.kind === 'not_found' ||
        (outcome.kind === 'rejected' && (outcome.status === 409 || SLOT_REFUSAL.test(outcome.message)));

    applySubmit(
        task,
        ctx,
        'supply_create',
        outcome,
        operationId => {
            task.supply_operation_id = operationId;
            task.last_error = null;
            ctx.poller.begin(task, ctx.now);
            transition(task, taskStatus.POLLING_SUPPLY, ctx.now);
            schedule(task, ctx.config.poll.intervalMs, ctx.now);
        },
        slotGone ? message => searchAgain(task, ctx, message) : undefined,
    );
};

export const pollingSupply: StageHandler = async (task, ctx) => {
    if (task.order_id) {
        transition(task, taskStatus.ORDER_DATA_FILLING, ctx.now);
        schedule(task, 0, ctx.now);
        return;
    }
    const operationId = task.supply_operation_id;
    if (!operationId) {
        failTask(task, 'missing_operation_id', ctx.now, 'supply poll without a supply operation');
        return;
    }

    const result = await ctx.poller.poll(task, 'supply', ctx.now, () => ctx.api.getSupplyStatus(operationId));
    applyPoll(task, ctx, 'supply_status', result, orderId => {
        task.order_id = orderId;
        task.last_error = null;
        transition(task, taskStatus.ORDER_DATA_FILLING, ctx.now, { order_id: orderId });
        schedule(task, 0, ctx.now);
        ctx.notify(`Supply order ${orderId} created for booking ${shortId(task.id)}, slot ${task.slot_from} to ${task.slot_to}.`);
    });
};

/**
 * Waits for the order to receive its supply id, pinning the slot on the
 * order where the remote allows it. Never fails on its own: only a rate
 * limit or the window running out moves the task elsewhere.
 */
export const orderDataFilling: StageHandler = async (task, ctx) => {
    if (task.supply_id) {
        transition(task, taskStatus.CARGO_PREP, ctx.now);
        schedule(task, 0, ctx.now);
        return;
    }
    const orderId = task.order_id;
    if (!orderId) {
        failTask(task, 'missing_order_id', ctx.now, 'order data stage without an order');
        return;
    }

    const outcome = await ctx.api.getOrder(orderId);
    if (outcome.kind === 'rate_limited') {
        enterRateLimit(task, ctx.governor.rateLimitWait(outcome.retryAfterMs), ctx.now, 'order_get');
        return;
    }
    if (outcome.kind !== 'ok') {
        task.last_error = outcome.kind === 'pending' ? null : outcome.message;
        schedule(task, ctx.config.order.pollIntervalMs, ctx.now);
        return;
    }

    const order = outcome.value;
    if (order.orderNumber) task.order_number = order.orderNumber;
    if (order.supplyId) {
        task.supply_id = order.supplyId;
        task.last_error = null;
        transition(task, taskStatus.CARGO_PREP, ctx.now, { supply_id: order.supplyId });
        schedule(task, 0, ctx.now);
        return;
    }

    if (order.timeslotCanSet && task.order_timeslot_state === 'pending' && task.slot_from && task.slot_to) {
        const set = await ctx.api.setOrderTimeslot(orderId, task.slot_from, task.slot_to);
        switch (set.kind) {
            case 'ok':
                task.order_timeslot_state = 'set';
                task.order_fast_poll_until = ctx.now + ctx.config.order.fastPollWindowMs;
                recordEvent(task, 'order_timeslot', ctx.now, { result: 'set' });
                break;
            case 'not_found':
                task.order_timeslot_state = 'unsupported';
                recordEvent(task, 'order_timeslot', ctx.now, { result: 'unsupported' });
                break;
            case 'rate_limited':
                enterRateLimit(task, ctx.governor.rateLimitWait(set.retryAfterMs), ctx.now, 'order_timeslot');
                return;
            case 'pending':
                break;
            default:
                task.last_error = set.message;
        }
    }

    if (order.missing.length > 0 && task.order_prompted_at === null) {
        task.order_prompted_at = ctx.now;
        const label = task.order_number ?? orderId;
        ctx.notify(`Order ${label} is waiting for: ${order.missing.join(', ')}. Fill these in on the fulfillment side.`);
    }

    const fast = task.order_fast_poll_until !== null && ctx.now < task.order_fast_poll_until;
    schedule(task, fast ? ctx.config.order.fastPollIntervalMs : ctx.config.order.pollIntervalMs, ctx.now);
};
