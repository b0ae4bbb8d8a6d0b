import { DraftConfig } from '../config';
import { DraftStrategy, TaskRecord } from '../db/task.entity';
import { FulfillmentApi, responseMessage } from '../remote/fulfillment-api';
import { RemoteResponse } from '../remote/remote-client';
import { RateGovernor } from '../services/rate-governor';
import { parseRetryAfter } from '../utils/backoff';
import { pickId } from '../utils/json';
import { recordEvent } from './state-machine';
import { buildDraftItems, buildDraftPayload, planStrategies } from './strategies';

const TAG = '[draft]';

export type DraftResponseClass =
    | { kind: 'accepted'; operationId: string }
    | { kind: 'shape_rejected'; message: string }
    | { kind: 'rejected'; message: string }
    | { kind: 'unauthorized'; message: string }
    | { kind: 'transient'; message: string }
    | { kind: 'rate_limited'; retryAfterMs: number | null };

export type NegotiationStep =
    | { kind: 'accepted'; operationId: string; strategy: string }
    | { kind: 'next_strategy'; delayMs: number }
    | { kind: 'retry_same'; delayMs: number }
    | { kind: 'throttled'; delayMs: number }
    | { kind: 'rate_limited'; waitMs: number }
    | { kind: 'failed'; reason: string; message: string };

/** Sorts a create-draft response into the classes negotiation reacts to. */
export function classifyDraftResponse(res: RemoteResponse, shapeMarkers: string[], now: number = Date.now()): DraftResponseClass {
    if (res.status === 429) {
        return { kind: 'rate_limited', retryAfterMs: parseRetryAfter(res.headers, now) };
    }

    const operationId = pickId(res.body, 'operation_id');
    if (operationId && (res.ok || res.status === 409)) {
        return { kind: 'accepted', operationId };
    }

    const message = responseMessage(res);
    if (res.status === 0 || res.status >= 500) return { kind: 'transient', message };
    if (res.status === 401 || res.status === 403) return { kind: 'unauthorized', message };
    if (res.ok) return { kind: 'rejected', message: `accepted without an operation id: ${message}` };

    const text = res.rawText.toLowerCase();
    if (shapeMarkers.some(marker => text.includes(marker))) {
        return { kind: 'shape_rejected', message };
    }
    return { kind: 'rejected', message };
}

/** Short English reading of a draft rejection, kept on the task for operators. */
export function describeDraftError(rawText: string): string | null {
    const text = rawText.toLowerCase();
    if (text.includes('supply type is unknown') || text.includes('unknown field') || text.includes('cannot unmarshal')) {
        return 'the endpoint does not accept this payload shape; trying the next one';
    }
    if (text.includes('warehouse')) return 'the destination warehouse was rejected; check the warehouse hint';
    if (text.includes('sku') || text.includes('item')) return 'an item was rejected; check product ids and quantities';
    if (text.includes('quant')) return 'a quantity was rejected';
    return null;
}

/**
 * Finds, per task, the draft payload shape the remote endpoint accepts.
 * Works one attempt per call so that every attempt is persisted before the next.
 */
export class DraftNegotiator {
    constructor(
        private readonly api: FulfillmentApi,
        private readonly governor: RateGovernor,
        private readonly catalog: DraftStrategy[],
        private readonly config: DraftConfig,
    ) { }

    ensureStrategies(task: TaskRecord): DraftStrategy[] {
        if (!task.strategies || task.strategies.length === 0) {
            task.strategies = planStrategies(this.catalog, {
                preference: task.destination.strategy_preference ?? null,
                dropOffWarehouseId: task.destination.drop_off_warehouse_id ?? null,
            });
        }
        return task.strategies;
    }

    async negotiate(task: TaskRecord, now: number): Promise<NegotiationStep> {
        const strategies = this.ensureStrategies(task);
        const items = buildDraftItems(task.line_items);
        if (items.length === 0 || items.length !== task.line_items.length) {
            return { kind: 'failed', reason: 'invalid_request', message: 'every line item needs a positive whole quantity' };
        }
        if (task.draft_attempts >= this.config.maxAttempts) {
            return this.attemptsExhausted(task);
        }

        const strategy = strategies[task.strategy_index];
        if (!strategy) {
            return this.strategiesExhausted(task);
        }

        const wait = this.governor.reserveDraftSlot();
        if (wait > 0) {
            return { kind: 'throttled', delayMs: wait };
        }

        const payload = buildDraftPayload(strategy, items, task.destination.drop_off_warehouse_id ?? null);
        const res = await this.api.createDraft(payload);
        const verdict = classifyDraftResponse(res, this.config.shapeErrorMarkers, now);

        if (verdict.kind === 'rate_limited') {
            const waitMs = this.governor.rateLimitWait(verdict.retryAfterMs);
            this.governor.coolDownDrafts(waitMs);
            recordEvent(task, 'draft_rate_limited', now, { strategy: strategy.name, wait_ms: waitMs });
            return { kind: 'rate_limited', waitMs };
        }

        task.draft_attempts += 1;
        if (!task.strategies_tried.includes(strategy.name)) {
            task.strategies_tried.push(strategy.name);
        }
        recordEvent(task, 'draft_attempt', now, { strategy: strategy.name, status: res.status, result: verdict.kind });
        console.log(`${TAG} task ${task.id} strategy ${strategy.name} -> ${res.status} (${verdict.kind})`);

        switch (verdict.kind) {
            case 'accepted':
                task.winning_strategy = strategy.name;
                task.last_error = null;
                task.last_error_hint = null;
                return { kind: 'accepted', operationId: verdict.operationId, strategy: strategy.name };

            case 'shape_rejected':
                return this.advance(task, strategies, verdict.message, res.rawText, this.config.fastDelayMs);

            case 'rejected':
                return this.advance(task, strategies, verdict.message, res.rawText, this.config.normalDelayMs);

            case 'unauthorized':
                task.last_error = verdict.message;
                return { kind: 'failed', reason: 'remote_unauthorized', message: verdict.message };

            case 'transient': {
                task.last_error = verdict.message;
                task.transient_failures += 1;
                if (task.draft_attempts >= this.config.maxAttempts) {
                    return this.attemptsExhausted(task);
                }
                const delayMs = this.governor.transientBackoff(task.transient_failures, this.config.transientBaseMs);
                return { kind: 'retry_same', delayMs };
            }
        }
    }

    private advance(
        task: TaskRecord,
        strategies: DraftStrategy[],
        message: string,
        rawText: string,
        delayMs: number,
    ): NegotiationStep {
        task.last_error = message;
        task.last_error_hint = describeDraftError(rawText);
        task.transient_failures = 0;

        const next = task.strategy_index + 1;
        if (next >= strategies.length) {
            task.strategy_index = strategies.length;
            return this.strategiesExhausted(task);
        }
        if (task.draft_attempts >= this.config.maxAttempts) {
            return this.attemptsExhausted(task);
        }
        task.strategy_index = next;
        return { kind: 'next_strategy', delayMs };
    }

    private strategiesExhausted(task: TaskRecord): NegotiationStep {
        return {
            kind: 'failed',
            reason: 'draft_strategies_exhausted',
            message: `all ${task.strategies?.length ?? 0} draft payload shapes were rejected; last error: ${task.last_error ?? 'none'}`,
        };
    }

    private attemptsExhausted(task: TaskRecord): NegotiationStep {
        return {
            kind: 'failed',
            reason: 'draft_attempts_exhausted',
            message: `draft creation gave up after ${task.draft_attempts} attempts; last error: ${task.last_error ?? 'none'}`,
        };
    }
}
