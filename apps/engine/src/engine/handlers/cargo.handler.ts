import { CargoBox, TaskRecord, shortId, taskStatus } from '../../db/task.entity';
import { StageRetryError } from '../../errors';
import { errorMessage, toRemoteId } from '../../utils/json';
import { StageContext, StageHandler } from '../stage-context';
import { enterRateLimit, failTask, schedule, transition } from '../state-machine';
import { applyPoll, applySubmit, retryStage } from './common';

/** One box per `boxes` share of each line item, keyed `<short id>-<item>-<box>`. */
export function planBoxes(task: TaskRecord): CargoBox[] | string {
    const prefix = shortId(task.id);
    const boxes: CargoBox[] = [];
    for (const [index, item] of task.line_items.entries()) {
        const count = item.boxes ?? 1;
        if (!Number.isInteger(item.quantity) || item.quantity <= 0 || !Number.isInteger(count) || count <= 0 || item.quantity % count !== 0) {
            return `line item ${item.product_id}: ${item.quantity} units do not split into ${count} boxes`;
        }
        for (let n = 1; n <= count; n++) {
            boxes.push({ key: `${prefix}-${index + 1}-${n}`, product_id: item.product_id, quantity: item.quantity / count });
        }
    }
    return boxes;
}

export const cargoPrep: StageHandler = async (task, ctx) => {
    if (!task.cargo_payload) {
        const planned = planBoxes(task);
        if (typeof planned === 'string') {
            failTask(task, 'invalid_request', ctx.now, planned);
            return;
        }
        task.cargo_payload = planned;
    }
    transition(task, taskStatus.CARGO_CREATING, ctx.now, { boxes: task.cargo_payload.length });
    schedule(task, 0, ctx.now);
};

export const cargoCreating: StageHandler = async (task, ctx) => {
    if (task.cargo_operation_id) {
        transition(task, taskStatus.POLLING_CARGO, ctx.now);
        schedule(task, 0, ctx.now);
        return;
    }
    if (!task.supply_id || !task.cargo_payload) {
        failTask(task, 'missing_booking_data', ctx.now, 'cargo creation needs a supply id and a box plan');
        return;
    }

    const outcome = await ctx.api.createCargoes({
        supplyId: task.supply_id,
        cargoes: task.cargo_payload.map(box => ({
            key: box.key,
            items: [{ sku: toRemoteId(box.product_id), quantity: box.quantity }],
        })),
    });
    applySubmit(task, ctx, 'cargo_create', outcome, operationId => {
        task.cargo_operation_id = operationId;
        task.last_error = null;
        ctx.poller.begin(task, ctx.now);
        transition(task, taskStatus.POLLING_CARGO, ctx.now);
        schedule(task, ctx.config.poll.intervalMs, ctx.now);
    });
};

export const pollingCargo: StageHandler = async (task, ctx) => {
    if (task.cargo_ids.length > 0) {
        transition(task, taskStatus.LABELS_CREATING, ctx.now);
        schedule(task, 0, ctx.now);
        return;
    }
    const operationId = task.cargo_operation_id;
    if (!operationId) {
        failTask(task, 'missing_operation_id', ctx.now, 'cargo poll without a cargo operation');
        return;
    }

    const result = await ctx.poller.poll(task, 'cargo', ctx.now, () => ctx.api.getCargoInfo(operationId));
    applyPoll(task, ctx, 'cargo_info', result, ids => {
        task.cargo_ids = ids;
        task.last_error = null;
        transition(task, taskStatus.LABELS_CREATING, ctx.now, { cargoes: ids.length });
        schedule(task, 0, ctx.now);
    });
};

export const labelsCreating: StageHandler = async (task, ctx) => {
    if (task.labels_operation_id) {
        transition(task, taskStatus.POLLING_LABELS, ctx.now);
        schedule(task, 0, ctx.now);
        return;
    }
    if (!task.supply_id || task.cargo_ids.length === 0) {
        failTask(task, 'missing_booking_data', ctx.now, 'label creation needs a supply id and cargo ids');
        return;
    }

    const outcome = await ctx.api.createLabels(task.supply_id, task.cargo_ids);
    applySubmit(task, ctx, 'labels_create', outcome, operationId => {
        task.labels_operation_id = operationId;
        task.last_error = null;
        ctx.poller.begin(task, ctx.now);
        transition(task, taskStatus.POLLING_LABELS, ctx.now);
        schedule(task, ctx.config.poll.intervalMs, ctx.now);
    });
};

function finish(task: TaskRecord, ctx: StageContext, filePath: string): void {
    transition(task, taskStatus.DONE, ctx.now, { labels: filePath });
    const name = task.order_number ?? task.order_id ?? shortId(task.id);
    ctx.notifyFile(filePath, `Labels for supply order ${name}`);
}

export const pollingLabels: StageHandler = async (task, ctx) => {
    if (task.label_file_path) {
        finish(task, ctx, task.label_file_path);
        return;
    }
    const operationId = task.labels_operation_id;
    if (!operationId) {
        failTask(task, 'missing_operation_id', ctx.now, 'label poll without a label operation');
        return;
    }

    if (!task.label_file_guid) {
        const result = await ctx.poller.poll(task, 'labels', ctx.now, () => ctx.api.getLabels(operationId));
        if (result.kind !== 'done') {
            applyPoll(task, ctx, 'labels_info', result, () => undefined);
            return;
        }
        task.label_file_guid = result.value;
    }

    const file = await ctx.api.fetchLabelFile(task.label_file_guid);
    switch (file.kind) {
        case 'ok': {
            let filePath: string;
            try {
                filePath = await ctx.labels.save(task.id, file.value);
            } catch (err) {
                throw new StageRetryError(ctx.config.transientRetryMs, `label file could not be written: ${errorMessage(err)}`, err);
            }
            task.label_file_path = filePath;
            task.last_error = null;
            finish(task, ctx, filePath);
            return;
        }
        case 'rate_limited':
            enterRateLimit(task, ctx.governor.rateLimitWait(file.retryAfterMs), ctx.now, 'label_file');
            return;
        case 'pending':
            schedule(task, ctx.config.poll.intervalMs, ctx.now);
            return;
        default:
            retryStage(task, ctx, 'label_file', file.message);
    }
};
