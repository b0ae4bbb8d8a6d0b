import { TaskEvent, TaskRecord, isTerminal, taskStatus } from '../db/task.entity';
import { IllegalTransitionError } from '../errors';

export const MAX_HISTORY = 500;

const S = taskStatus;

/**
 * Every status change goes through this table. Self edges mark stages that
 * reschedule themselves. Operator retry is a reset and does not use it.
 */
export const TRANSITIONS: Readonly<Record<taskStatus, readonly taskStatus[]>> = {
    [S.WAITING_WINDOW]: [S.DRAFT_CREATING, S.FAILED, S.CANCELED],
    [S.DRAFT_CREATING]: [S.DRAFT_CREATING, S.POLLING_DRAFT, S.RATE_LIMITED, S.FAILED, S.CANCELED],
    [S.POLLING_DRAFT]: [S.POLLING_DRAFT, S.TIMESLOT_SEARCH, S.RATE_LIMITED, S.FAILED, S.CANCELED],
    [S.TIMESLOT_SEARCH]: [S.TIMESLOT_SEARCH, S.TIMESLOT_SETTING, S.DRAFT_CREATING, S.RATE_LIMITED, S.FAILED, S.CANCELED],
    [S.TIMESLOT_SETTING]: [S.TIMESLOT_SETTING, S.SUPPLY_CREATING, S.RATE_LIMITED, S.FAILED, S.CANCELED],
    [S.SUPPLY_CREATING]: [S.SUPPLY_CREATING, S.POLLING_SUPPLY, S.TIMESLOT_SEARCH, S.RATE_LIMITED, S.FAILED, S.CANCELED],
    [S.POLLING_SUPPLY]: [S.POLLING_SUPPLY, S.ORDER_DATA_FILLING, S.RATE_LIMITED, S.FAILED, S.CANCELED],
    [S.ORDER_DATA_FILLING]: [S.ORDER_DATA_FILLING, S.CARGO_PREP, S.RATE_LIMITED, S.FAILED, S.CANCELED],
    [S.CARGO_PREP]: [S.CARGO_CREATING, S.FAILED, S.CANCELED],
    [S.CARGO_CREATING]: [S.CARGO_CREATING, S.POLLING_CARGO, S.RATE_LIMITED, S.FAILED, S.CANCELED],
    [S.POLLING_CARGO]: [S.POLLING_CARGO, S.LABELS_CREATING, S.RATE_LIMITED, S.FAILED, S.CANCELED],
    [S.LABELS_CREATING]: [S.LABELS_CREATING, S.POLLING_LABELS, S.RATE_LIMITED, S.FAILED, S.CANCELED],
    [S.POLLING_LABELS]: [S.POLLING_LABELS, S.DONE, S.RATE_LIMITED, S.FAILED, S.CANCELED],
    [S.RATE_LIMITED]: [
        S.DRAFT_CREATING,
        S.POLLING_DRAFT,
        S.TIMESLOT_SEARCH,
        S.TIMESLOT_SETTING,
        S.SUPPLY_CREATING,
        S.POLLING_SUPPLY,
        S.ORDER_DATA_FILLING,
        S.CARGO_PREP,
        S.CARGO_CREATING,
        S.POLLING_CARGO,
        S.LABELS_CREATING,
        S.POLLING_LABELS,
        S.FAILED,
        S.CANCELED,
    ],
    [S.DONE]: [],
    [S.FAILED]: [],
    [S.CANCELED]: [],
};

/** Stages a task holding an order id must never return to, and the only ones the window bounds. */
const PRE_ORDER_STAGES: readonly taskStatus[] = [
    S.WAITING_WINDOW,
    S.DRAFT_CREATING,
    S.POLLING_DRAFT,
    S.TIMESLOT_SEARCH,
    S.TIMESLOT_SETTING,
    S.SUPPLY_CREATING,
    S.POLLING_SUPPLY,
];

export function canTransition(from: taskStatus, to: taskStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

export function recordEvent(task: TaskRecord, event: string, now: number, detail?: Record<string, unknown>): void {
    const entry: TaskEvent = detail ? { at: now, event, detail } : { at: now, event };
    task.history.push(entry);
    if (task.history.length > MAX_HISTORY) {
        task.history.splice(0, task.history.length - MAX_HISTORY);
    }
}

export function transition(
    task: TaskRecord,
    to: taskStatus,
    now: number,
    detail?: Record<string, unknown>,
): void {
    const from = task.status;
    if (!canTransition(from, to)) {
        throw new IllegalTransitionError(task.id, from, to);
    }
    if (task.order_id && PRE_ORDER_STAGES.includes(to)) {
        throw new IllegalTransitionError(task.id, from, to);
    }
    if (from === to) return;

    task.status = to;
    task.stage_attempts = 0;
    task.transient_failures = 0;
    if (isTerminal(to)) {
        task.completed_at = now;
    }
    recordEvent(task, `status:${to}`, now, { from, ...detail });
}

/** Moves `next_attempt_at` forward to now + delay; it never moves backward here. */
export function schedule(task: TaskRecord, delayMs: number, now: number): void {
    task.next_attempt_at = Math.max(task.next_attempt_at, now + Math.max(0, Math.round(delayMs)));
}

export function failTask(task: TaskRecord, reason: string, now: number, message?: string): void {
    task.failure_reason = reason;
    task.last_error = message ?? reason;
    transition(task, S.FAILED, now, { reason });
}

export function enterRateLimit(task: TaskRecord, waitMs: number, now: number, source: string): void {
    const until = now + Math.max(0, Math.round(waitMs));
    transition(task, S.RATE_LIMITED, now, { source, wait_ms: Math.round(waitMs) });
    task.rate_limited_until = until;
    schedule(task, waitMs, now);
}

/**
 * The stage a rate-limited task goes back to, read off the identifiers it
 * already holds. Nothing about the interrupted stage is stored separately.
 */
export function deriveResumeStatus(task: TaskRecord): taskStatus {
    if (task.labels_operation_id) return S.POLLING_LABELS;
    if (task.cargo_ids.length > 0) return S.LABELS_CREATING;
    if (task.cargo_operation_id) return S.POLLING_CARGO;
    if (task.cargo_payload) return S.CARGO_CREATING;
    if (task.supply_id) return S.CARGO_PREP;
    if (task.order_id) return S.ORDER_DATA_FILLING;
    if (task.supply_operation_id) return S.POLLING_SUPPLY;
    if (task.slot_confirmed) return S.SUPPLY_CREATING;
    if (task.slot_from) return S.TIMESLOT_SETTING;
    if (task.draft_id) return S.TIMESLOT_SEARCH;
    if (task.draft_operation_id) return S.POLLING_DRAFT;
    return S.DRAFT_CREATING;
}

export function resumeFromRateLimit(task: TaskRecord, now: number): taskStatus {
    const to = deriveResumeStatus(task);
    transition(task, to, now, { resumed: true });
    task.rate_limited_until = null;
    schedule(task, 0, now);
    return to;
}

/** The stage whose window rules apply; a rate-limited task answers for the stage it will resume. */
export function effectiveStage(task: TaskRecord): taskStatus {
    return task.status === S.RATE_LIMITED ? deriveResumeStatus(task) : task.status;
}

/** End of the requested window, or of the chosen slot when that ends later. */
export function bookingDeadline(task: TaskRecord): number {
    const slotEnd = task.slot_to ? Date.parse(task.slot_to) : Number.NaN;
    return Number.isNaN(slotEnd) ? task.window_end_at : Math.max(task.window_end_at, slotEnd);
}

/** Only tasks still working towards an order can run out of window. */
export function isWindowExpired(task: TaskRecord, now: number): boolean {
    if (task.order_id) return false;
    return PRE_ORDER_STAGES.includes(effectiveStage(task)) && now > bookingDeadline(task);
}

/** Operator retry: back to the start with every stage identifier and error cleared. */
export function resetTask(task: TaskRecord, now: number): void {
    const from = task.status;
    task.status = S.WAITING_WINDOW;

    task.draft_operation_id = null;
    task.draft_id = null;
    task.chosen_warehouse_id = null;
    task.bundle_id = null;
    task.slot_id = null;
    task.slot_from = null;
    task.slot_to = null;
    task.drop_off_warehouse_id = null;
    task.slot_confirmed = false;
    task.supply_operation_id = null;
    task.order_id = null;
    task.order_number = null;
    task.supply_id = null;
    task.order_timeslot_state = 'pending';
    task.order_prompted_at = null;
    task.order_fast_poll_until = null;
    task.cargo_payload = null;
    task.cargo_operation_id = null;
    task.cargo_ids = [];
    task.labels_operation_id = null;
    task.label_file_guid = null;
    task.label_file_path = null;

    task.last_error = null;
    task.last_error_hint = null;
    task.failure_reason = null;
    task.draft_attempts = 0;
    task.stage_attempts = 0;
    task.transient_failures = 0;
    task.op_retries = 0;
    task.op_started_at = null;
    task.stale_draft_recreates = 0;
    task.supply_slot_retries = 0;
    task.rate_limited_until = null;
    task.next_attempt_at = now;
    task.completed_at = null;

    task.strategy_index = 0;
    task.strategies_tried = [];
    task.winning_strategy = null;

    recordEvent(task, 'retry', now, { from });
}
