import { z } from 'zod';
import { BookingRequest, StrategyPreference } from '@supplybook/sdk';

/**
 * Pipeline stages of a booking task, in order, plus the side states.
 * DONE, FAILED and CANCELED are terminal.
 */
export enum taskStatus {
    WAITING_WINDOW = 'waiting_window',
    DRAFT_CREATING = 'draft_creating',
    POLLING_DRAFT = 'polling_draft',
    TIMESLOT_SEARCH = 'timeslot_search',
    TIMESLOT_SETTING = 'timeslot_setting',
    SUPPLY_CREATING = 'supply_creating',
    POLLING_SUPPLY = 'polling_supply',
    ORDER_DATA_FILLING = 'order_data_filling',
    CARGO_PREP = 'cargo_prep',
    CARGO_CREATING = 'cargo_creating',
    POLLING_CARGO = 'polling_cargo',
    LABELS_CREATING = 'labels_creating',
    POLLING_LABELS = 'polling_labels',
    RATE_LIMITED = 'rate_limited',
    DONE = 'done',
    FAILED = 'failed',
    CANCELED = 'canceled',
}

export const TERMINAL_STATUSES: readonly taskStatus[] = [taskStatus.DONE, taskStatus.FAILED, taskStatus.CANCELED];

export function isTerminal(status: taskStatus): boolean {
    return TERMINAL_STATUSES.includes(status);
}

export type SupplyKind = StrategyPreference;

export interface LineItemRecord {
    product_id: string;
    quantity: number;
    boxes?: number;
}

export interface DestinationRecord {
    warehouse_name?: string;
    warehouse_id?: number;
    drop_off_warehouse_id?: number;
    strategy_preference?: SupplyKind;
}

/** One candidate draft payload shape. `fields` are merged into the request body. */
export interface DraftStrategy {
    name: string;
    kind: SupplyKind;
    fields: Record<string, string>;
    useDropOff: boolean;
}

export interface CargoBox {
    key: string;
    product_id: string;
    quantity: number;
}

export interface TaskEvent {
    at: number;
    event: string;
    detail?: Record<string, unknown>;
}

export type OrderTimeslotState = 'pending' | 'set' | 'unsupported';

/** A booking task as persisted. Unknown fields in a stored document are carried along untouched. */
export interface TaskRecord {
    id: string;
    status: taskStatus;
    recipient: string;
    line_items: LineItemRecord[];
    window_start: string;
    window_end: string;
    window_start_at: number;
    window_end_at: number;
    destination: DestinationRecord;

    draft_operation_id: string | null;
    draft_id: string | null;
    chosen_warehouse_id: string | null;
    bundle_id: string | null;
    slot_id: string | null;
    slot_from: string | null;
    slot_to: string | null;
    drop_off_warehouse_id: string | null;
    slot_confirmed: boolean;
    supply_operation_id: string | null;
    order_id: string | null;
    order_number: string | null;
    supply_id: string | null;
    order_timeslot_state: OrderTimeslotState;
    order_prompted_at: number | null;
    order_fast_poll_until: number | null;
    cargo_payload: CargoBox[] | null;
    cargo_operation_id: string | null;
    cargo_ids: string[];
    labels_operation_id: string | null;
    label_file_guid: string | null;
    label_file_path: string | null;

    last_error: string | null;
    last_error_hint: string | null;
    failure_reason: string | null;
    draft_attempts: number;
    stage_attempts: number;
    transient_failures: number;
    op_retries: number;
    op_started_at: number | null;
    stale_draft_recreates: number;
    supply_slot_retries: number;
    next_attempt_at: number;
    rate_limited_until: number | null;
    history: TaskEvent[];

    strategies: DraftStrategy[] | null;
    strategy_index: number;
    strategies_tried: string[];
    winning_strategy: string | null;

    created_at: number;
    updated_at: number;
    completed_at: number | null;
    revision: number;
}

const nullableString = z.string().nullable().default(null);
const nullableNumber = z.number().nullable().default(null);
const counter = z.number().int().nonnegative().default(0);

export const draftStrategySchema = z.object({
    name: z.string().min(1),
    kind: z.enum(['direct', 'crossdock']),
    fields: z.record(z.string()).default({}),
    useDropOff: z.boolean().default(false),
});

const taskRecordSchema = z
    .object({
        id: z.string().min(1),
        status: z.nativeEnum(taskStatus),
        recipient: z.string(),
        line_items: z.array(
            z.object({
                product_id: z.string(),
                quantity: z.number(),
                boxes: z.number().int().positive().optional(),
            }),
        ),
        window_start: z.string(),
        window_end: z.string(),
        window_start_at: z.number(),
        window_end_at: z.number(),
        destination: z
            .object({
                warehouse_name: z.string().optional(),
                warehouse_id: z.number().optional(),
                drop_off_warehouse_id: z.number().optional(),
                strategy_preference: z.enum(['direct', 'crossdock']).optional(),
            })
            .passthrough()
            .default({}),

        draft_operation_id: nullableString,
        draft_id: nullableString,
        chosen_warehouse_id: nullableString,
        bundle_id: nullableString,
        slot_id: nullableString,
        slot_from: nullableString,
        slot_to: nullableString,
        drop_off_warehouse_id: nullableString,
        slot_confirmed: z.boolean().default(false),
        supply_operation_id: nullableString,
        order_id: nullableString,
        order_number: nullableString,
        supply_id: nullableString,
        order_timeslot_state: z.enum(['pending', 'set', 'unsupported']).default('pending'),
        order_prompted_at: nullableNumber,
        order_fast_poll_until: nullableNumber,
        cargo_payload: z
            .array(z.object({ key: z.string(), product_id: z.string(), quantity: z.number() }))
            .nullable()
            .default(null),
        cargo_operation_id: nullableString,
        cargo_ids: z.array(z.string()).default([]),
        labels_operation_id: nullableString,
        label_file_guid: nullableString,
        label_file_path: nullableString,

        last_error: nullableString,
        last_error_hint: nullableString,
        failure_reason: nullableString,
        draft_attempts: counter,
        stage_attempts: counter,
        transient_failures: counter,
        op_retries: counter,
        op_started_at: nullableNumber,
        stale_draft_recreates: counter,
        supply_slot_retries: counter,
        next_attempt_at: z.number().default(0),
        rate_limited_until: nullableNumber,
        history: z
            .array(z.object({ at: z.number(), event: z.string(), detail: z.record(z.unknown()).optional() }))
            .default([]),

        strategies: z.array(draftStrategySchema).nullable().default(null),
        strategy_index: counter,
        strategies_tried: z.array(z.string()).default([]),
        winning_strategy: nullableString,

        created_at: z.number(),
        updated_at: z.number(),
        completed_at: nullableNumber,
        revision: counter,
    })
    .passthrough();

export class TaskParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TaskParseError';
    }
}

/** Validates a stored document. Fields this version does not know about are kept. */
export function parseTaskRecord(raw: unknown): TaskRecord {
    const result = taskRecordSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new TaskParseError(`invalid task document: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown'}`);
    }
    const task: TaskRecord = result.data;
    return task;
}

export function cloneTask(task: TaskRecord): TaskRecord {
    return parseTaskRecord(JSON.parse(JSON.stringify(task)));
}

export function shortId(id: string): string {
    return id.replace(/-/g, '').slice(0, 8);
}

export function createTaskRecord(request: BookingRequest, id: string, now: number): TaskRecord {
    const hint = request.destinationHint ?? {};
    const destination: DestinationRecord = {};
    if (hint.warehouseName !== undefined) destination.warehouse_name = hint.warehouseName;
    if (hint.warehouseId !== undefined) destination.warehouse_id = hint.warehouseId;
    if (hint.dropOffWarehouseId !== undefined) destination.drop_off_warehouse_id = hint.dropOffWarehouseId;
    if (hint.strategyPreference !== undefined) destination.strategy_preference = hint.strategyPreference;

    return {
        id,
        status: taskStatus.WAITING_WINDOW,
        recipient: request.recipient,
        line_items: request.lineItems.map(item =>
            item.boxes === undefined
                ? { product_id: item.productId, quantity: item.quantity }
                : { product_id: item.productId, quantity: item.quantity, boxes: item.boxes },
        ),
        window_start: request.windowStart,
        window_end: request.windowEnd,
        window_start_at: Date.parse(request.windowStart),
        window_end_at: Date.parse(request.windowEnd),
        destination,

        draft_operation_id: null,
        draft_id: null,
        chosen_warehouse_id: null,
        bundle_id: null,
        slot_id: null,
        slot_from: null,
        slot_to: null,
        drop_off_warehouse_id: null,
        slot_confirmed: false,
        supply_operation_id: null,
        order_id: null,
        order_number: null,
        supply_id: null,
        order_timeslot_state: 'pending',
        order_prompted_at: null,
        order_fast_poll_until: null,
        cargo_payload: null,
        cargo_operation_id: null,
        cargo_ids: [],
        labels_operation_id: null,
        label_file_guid: null,
        label_file_path: null,

        last_error: null,
        last_error_hint: null,
        failure_reason: null,
        draft_attempts: 0,
        stage_attempts: 0,
        transient_failures: 0,
        op_retries: 0,
        op_started_at: null,
        stale_draft_recreates: 0,
        supply_slot_retries: 0,
        next_attempt_at: now,
        rate_limited_until: null,
        history: [{ at: now, event: 'created' }],

        strategies: null,
        strategy_index: 0,
        strategies_tried: [],
        winning_strategy: null,

        created_at: now,
        updated_at: now,
        completed_at: null,
        revision: 0,
    };
}
