import { OfferedSlot, normalizeOfferedSlots } from '../engine/timeslot-resolver';
import { WarehouseCandidate, normalizeDraftWarehouses } from '../engine/warehouse-selector';
import { parseRetryAfter } from '../utils/backoff';
import { asArray, dig, idString, isRecord, pickId, pickValue, records, toRemoteId } from '../utils/json';
import { DEFAULT_ENDPOINTS, EndpointMap } from './endpoints';
import { RemoteClient, RemoteResponse } from './remote-client';

/** Every remote answer, reduced to what a stage needs to decide its next move. */
export type ApiOutcome<T> =
    | { kind: 'ok'; value: T }
    | { kind: 'pending' }
    | { kind: 'rate_limited'; retryAfterMs: number | null }
    | { kind: 'not_found'; message: string }
    | { kind: 'rejected'; status: number; message: string }
    | { kind: 'transient'; status: number; message: string }
    | { kind: 'failed'; message: string };

export interface DraftInfo {
    draftId: string;
    warehouses: WarehouseCandidate[];
}

export interface TimeslotQuery {
    draftId: string;
    warehouseIds: string[];
    dateFrom: string;
    dateTo: string;
    bundleId: string | null;
}

export interface DraftTimeslotRequest {
    draftId: string;
    dropOffWarehouseId: string;
    slotId: string | null;
    from: string;
    to: string;
}

export interface SupplyRequest {
    draftId: string;
    warehouseId: string;
    slotId: string | null;
    from: string;
    to: string;
    dropOffWarehouseId: string | null;
}

export interface OrderMetadata {
    orderNumber: string | null;
    supplyId: string | null;
    timeslotCanSet: boolean;
    timeslotFrom: string | null;
    timeslotTo: string | null;
    missing: string[];
}

export interface CargoRequest {
    supplyId: string;
    cargoes: { key: string; items: { sku: string | number; quantity: number }[] }[];
}

type OperationState = 'success' | 'in_progress' | 'error' | 'unknown';

function operationState(body: unknown): OperationState {
    if (errorMessages(body).length > 0) return 'error';
    const raw = pickValue(body, 'status') ?? pickValue(body, 'state');
    const status = typeof raw === 'string' ? raw.toUpperCase() : '';
    if (status.includes('SUCCESS')) return 'success';
    if (status.includes('FAIL') || status.includes('ERROR')) return 'error';
    if (status.includes('PROGRESS') || status.includes('PENDING') || status.includes('PROCESSING')) return 'in_progress';
    return 'unknown';
}

function errorMessages(body: unknown): string[] {
    const raw = [...asArray(pickValue(body, 'error_messages')), ...asArray(pickValue(body, 'errors'))];
    return raw
        .map(entry => (typeof entry === 'string' ? entry : idString(dig(entry, 'message')) ?? JSON.stringify(entry)))
        .filter(message => message !== '');
}

function describe(body: unknown, fallback: string): string {
    const messages = errorMessages(body);
    if (messages.length > 0) return messages.join('; ');
    const status = pickValue(body, 'status');
    return typeof status === 'string' ? `${fallback} (${status})` : fallback;
}

export function responseMessage(res: { status: number; body: unknown; rawText: string }): string {
    const message = dig(res.body, 'message');
    if (typeof message === 'string' && message !== '') return `HTTP ${res.status}: ${message}`;
    const raw = res.rawText.trim();
    return raw ? `HTTP ${res.status}: ${raw.slice(0, 300)}` : `HTTP ${res.status}`;
}

function parseOrderMetadata(body: unknown): OrderMetadata {
    const order = records(pickValue(body, 'orders'))[0] ?? (isRecord(pickValue(body, 'order')) ? pickValue(body, 'order') : body);

    const supplyId =
        idString(dig(order, 'supply_id')) ??
        records(dig(order, 'supplies')).map(s => idString(s.supply_id)).find(id => id !== null) ??
        null;

    const timeslot = dig(order, 'timeslot');
    const slotValue = dig(timeslot, 'value', 'timeslot') ?? dig(timeslot, 'value') ?? timeslot;
    const text = (value: unknown) => (typeof value === 'string' && value !== '' ? value : null);

    const missing: string[] = [];
    for (const field of ['vehicle', 'contact']) {
        const section = dig(order, field);
        if (dig(section, 'is_required') === true && !dig(section, 'value')) {
            missing.push(field);
        }
    }
    const timeslotFrom = text(dig(slotValue, 'from')) ?? text(dig(slotValue, 'from_in_timezone'));
    if (dig(timeslot, 'is_required') === true && !timeslotFrom) {
        missing.push('timeslot');
    }

    return {
        orderNumber: idString(dig(order, 'supply_order_number')) ?? idString(dig(order, 'order_number')),
        supplyId,
        timeslotCanSet: dig(timeslot, 'can_set') === true,
        timeslotFrom,
        timeslotTo: text(dig(slotValue, 'to')) ?? text(dig(slotValue, 'to_in_timezone')),
        missing,
    };
}

export interface FulfillmentApiOptions {
    endpoints?: Partial<EndpointMap>;
    /** Receives the status of every response, 0 for transport failures. */
    observe?: (status: number) => void;
    now?: () => number;
}

/**
 * Typed wrapper over the remote fulfillment endpoints. HTTP failures come
 * back as outcomes, never as exceptions.
 */
export class FulfillmentApi {
    private readonly endpoints: EndpointMap;
    private readonly observe: (status: number) => void;
    private readonly now: () => number;

    constructor(
        private readonly client: RemoteClient,
        options: FulfillmentApiOptions = {},
    ) {
        this.endpoints = { ...DEFAULT_ENDPOINTS, ...options.endpoints };
        this.observe = options.observe ?? (() => undefined);
        this.now = options.now ?? Date.now;
    }

    /** Raw response; draft negotiation classifies it itself. */
    async createDraft(payload: Record<string, unknown>): Promise<RemoteResponse> {
        return this.post(this.endpoints.createDraft, payload, false);
    }

    async getDraftInfo(operationId: string): Promise<ApiOutcome<DraftInfo>> {
        const res = await this.post(this.endpoints.draftInfo, { operation_id: operationId });
        return this.classify<DraftInfo>(res, body => {
            const state = operationState(body);
            if (state === 'error') return { kind: 'failed', message: describe(body, 'draft calculation failed') };

            const draftId = pickId(body, 'draft_id');
            if (draftId) return { kind: 'ok', value: { draftId, warehouses: normalizeDraftWarehouses(body) } };
            if (state === 'success') return { kind: 'failed', message: 'draft calculation succeeded without a draft id' };
            return { kind: 'pending' };
        });
    }

    async queryTimeslots(query: TimeslotQuery): Promise<ApiOutcome<OfferedSlot[]>> {
        const payload: Record<string, unknown> = {
            draft_id: toRemoteId(query.draftId),
            warehouse_ids: query.warehouseIds.map(toRemoteId),
            date_from: query.dateFrom,
            date_to: query.dateTo,
        };
        if (query.bundleId) payload.bundle_id = query.bundleId;

        const res = await this.post(this.endpoints.timeslotInfo, payload);
        return this.classify<OfferedSlot[]>(res, body => ({ kind: 'ok', value: normalizeOfferedSlots(body) }));
    }

    async setDraftTimeslot(request: DraftTimeslotRequest): Promise<ApiOutcome<true>> {
        const timeslot: Record<string, unknown> = { from_in_timezone: request.from, to_in_timezone: request.to };
        if (request.slotId) timeslot.id = toRemoteId(request.slotId);

        const res = await this.post(this.endpoints.setDraftTimeslot, {
            draft_id: toRemoteId(request.draftId),
            drop_off_point_warehouse_id: toRemoteId(request.dropOffWarehouseId),
            timeslot,
        });
        return this.classify<true>(res, () => ({ kind: 'ok', value: true }));
    }

    async createSupply(request: SupplyRequest): Promise<ApiOutcome<string>> {
        const payload: Record<string, unknown> = {
            draft_id: toRemoteId(request.draftId),
            warehouse_id: toRemoteId(request.warehouseId),
            timeslot: { from_in_timezone: request.from, to_in_timezone: request.to },
        };
        if (request.slotId) payload.timeslot_id = toRemoteId(request.slotId);
        if (request.dropOffWarehouseId) payload.drop_off_point_warehouse_id = toRemoteId(request.dropOffWarehouseId);

        const res = await this.post(this.endpoints.createSupply, payload, false);
        return this.classify<string>(res, body => this.operationId(body, res));
    }

    async getSupplyStatus(operationId: string): Promise<ApiOutcome<string>> {
        const res = await this.post(this.endpoints.supplyStatus, { operation_id: operationId });
        return this.classify<string>(res, body => {
            const state = operationState(body);
            if (state === 'error') return { kind: 'failed', message: describe(body, 'supply creation failed') };

            const orderId = pickId(body, 'order_id') ?? idString(asArray(pickValue(body, 'order_ids'))[0]);
            if (orderId) return { kind: 'ok', value: orderId };
            if (state === 'success') return { kind: 'failed', message: 'supply creation succeeded without an order id' };
            return { kind: 'pending' };
        });
    }

    async getOrder(orderId: string): Promise<ApiOutcome<OrderMetadata>> {
        const res = await this.post(this.endpoints.orderGet, { order_ids: [toRemoteId(orderId)] });
        return this.classify<OrderMetadata>(res, body => ({ kind: 'ok', value: parseOrderMetadata(body) }));
    }

    async setOrderTimeslot(orderId: string, from: string, to: string): Promise<ApiOutcome<true>> {
        const res = await this.post(this.endpoints.orderTimeslotUpdate, {
            order_id: toRemoteId(orderId),
            timeslot: { from, to },
        });
        return this.classify<true>(res, () => ({ kind: 'ok', value: true }));
    }

    async createCargoes(request: CargoRequest): Promise<ApiOutcome<string>> {
        const res = await this.post(
            this.endpoints.createCargoes,
            {
                supply_id: toRemoteId(request.supplyId),
                delete_current_version: true,
                cargoes: request.cargoes.map(cargo => ({
                    key: cargo.key,
                    value: { type: 'BOX', items: cargo.items.map(item => ({ sku: item.sku, quantity: item.quantity })) },
                })),
            },
            false,
        );
        return this.classify<string>(res, body => this.operationId(body, res));
    }

    async getCargoInfo(operationId: string): Promise<ApiOutcome<string[]>> {
        const res = await this.post(this.endpoints.cargoInfo, { operation_id: operationId });
        return this.classify<string[]>(res, body => {
            const state = operationState(body);
            if (state === 'error') return { kind: 'failed', message: describe(body, 'cargo creation failed') };

            const ids = records(pickValue(body, 'cargoes'))
                .map(cargo => idString(dig(cargo, 'value', 'cargo_id')) ?? idString(cargo.cargo_id))
                .filter((id): id is string => id !== null);
            if (ids.length > 0) return { kind: 'ok', value: ids };
            if (state === 'success') return { kind: 'failed', message: 'cargo creation succeeded without cargo ids' };
            return { kind: 'pending' };
        });
    }

    async createLabels(supplyId: string, cargoIds: string[]): Promise<ApiOutcome<string>> {
        const res = await this.post(
            this.endpoints.createLabels,
            { supply_id: toRemoteId(supplyId), cargo_ids: cargoIds.map(toRemoteId) },
            false,
        );
        return this.classify<string>(res, body => this.operationId(body, res));
    }

    async getLabels(operationId: string): Promise<ApiOutcome<string>> {
        const res = await this.post(this.endpoints.labelsInfo, { operation_id: operationId });
        return this.classify<string>(res, body => {
            const state = operationState(body);
            if (state === 'error') return { kind: 'failed', message: describe(body, 'label generation failed') };

            const guid = pickId(body, 'file_guid');
            if (guid) return { kind: 'ok', value: guid };
            if (state === 'success') return { kind: 'failed', message: 'label generation succeeded without a file' };
            return { kind: 'pending' };
        });
    }

    async fetchLabelFile(fileGuid: string): Promise<ApiOutcome<Buffer>> {
        const res = await this.client.fetchFile(`${this.endpoints.labelFile}${encodeURIComponent(fileGuid)}`);
        this.observe(res.status);
        const summary = { status: res.status, body: null, rawText: res.ok ? '' : res.data.toString('utf-8') };
        return this.classify<Buffer>({ ...summary, ok: res.ok, headers: res.headers }, () =>
            res.data.length > 0
                ? { kind: 'ok', value: res.data }
                : { kind: 'transient', status: res.status, message: 'label file is empty' },
        );
    }

    private async post(path: string, body: unknown, autoRetry = true): Promise<RemoteResponse> {
        const res = await this.client.call('POST', path, body, { autoRetry });
        this.observe(res.status);
        return res;
    }

    private operationId(body: unknown, res: RemoteResponse): ApiOutcome<string> {
        const operationId = pickId(body, 'operation_id');
        return operationId
            ? { kind: 'ok', value: operationId }
            : { kind: 'rejected', status: res.status, message: `no operation id in response: ${responseMessage(res)}` };
    }

    private classify<T>(
        res: Pick<RemoteResponse, 'ok' | 'status' | 'body' | 'rawText' | 'headers'>,
        parse: (body: unknown) => ApiOutcome<T>,
    ): ApiOutcome<T> {
        if (res.status === 429) {
            return { kind: 'rate_limited', retryAfterMs: parseRetryAfter(res.headers, this.now()) };
        }
        if (res.status === 404) {
            return { kind: 'not_found', message: responseMessage(res) };
        }
        if (res.status === 0 || res.status >= 500) {
            return { kind: 'transient', status: res.status, message: responseMessage(res) };
        }
        if (!res.ok) {
            return { kind: 'rejected', status: res.status, message: responseMessage(res) };
        }
        return parse(res.body);
    }
}
