import { DEFAULT_ENDPOINTS as E } from '../../src/remote/endpoints';
import { FulfillmentApi } from '../../src/remote/fulfillment-api';
import { FakeRemote, json } from '../helpers/fake-remote';
import { BASE_NOW } from '../helpers/fixtures';

function setup() {
    const remote = new FakeRemote();
    const seen: number[] = [];
    const api = new FulfillmentApi(remote, { observe: status => seen.push(status), now: () => BASE_NOW });
    return { remote, api, seen };
}

describe('FulfillmentApi', () => {
    describe('draft info', () => {
        it('waits while the draft is being calculated', async () => {
            const { remote, api } = setup();
            remote.on(E.draftInfo, json(200, { status: 'CALCULATION_STATUS_IN_PROGRESS' }));
            expect(await api.getDraftInfo('op-1')).toEqual({ kind: 'pending' });
            expect(remote.callsTo(E.draftInfo)[0]?.body).toEqual({ operation_id: 'op-1' });
        });

        it('returns the draft and its warehouses', async () => {
            const { remote, api } = setup();
            remote.on(
                E.draftInfo,
                json(200, { status: 'CALCULATION_STATUS_SUCCESS', draft_id: 5551, warehouses: [{ warehouse_id: 22 }] }),
            );
            expect(await api.getDraftInfo('op-1')).toEqual({
                kind: 'ok',
                value: {
                    draftId: '5551',
                    warehouses: [{ warehouseId: '22', name: null, bundleId: null, available: true }],
                },
            });
        });

        it('fails with the remote error messages', async () => {
            const { remote, api } = setup();
            remote.on(E.draftInfo, json(200, { status: 'CALCULATION_STATUS_FAILED', errors: [{ message: 'bad sku' }] }));
            expect(await api.getDraftInfo('op-1')).toEqual({ kind: 'failed', message: 'bad sku' });
        });

        it('fails when success comes without a draft id', async () => {
            const { remote, api } = setup();
            remote.on(E.draftInfo, json(200, { status: 'CALCULATION_STATUS_SUCCESS' }));
            expect(await api.getDraftInfo('op-1')).toEqual({
                kind: 'failed',
                message: 'draft calculation succeeded without a draft id',
            });
        });
    });

    describe('status classes', () => {
        it('maps 429 with its Retry-After hint', async () => {
            const { remote, api, seen } = setup();
            remote.on(E.supplyStatus, json(429, {}, { 'Retry-After': '7' }));
            expect(await api.getSupplyStatus('op-2')).toEqual({ kind: 'rate_limited', retryAfterMs: 7000 });
            expect(seen).toEqual([429]);
        });

        it('maps 404, 5xx and other client errors', async () => {
            const { remote, api } = setup();
            remote.on(E.supplyStatus, { status: 503 }, json(400, { message: 'bad operation' }));

            expect(await api.getOrder('9001')).toEqual({
                kind: 'not_found',
                message: `HTTP 404: no route for ${E.orderGet}`,
            });
            expect(await api.getSupplyStatus('op-2')).toEqual({ kind: 'transient', status: 503, message: 'HTTP 503' });
            expect(await api.getSupplyStatus('op-2')).toEqual({
                kind: 'rejected',
                status: 400,
                message: 'HTTP 400: bad operation',
            });
        });
    });

    it('builds the timeslot query with numeric ids where possible', async () => {
        const { remote, api } = setup();
        remote.on(E.timeslotInfo, json(200, { timeslots: [] }));

        const outcome = await api.queryTimeslots({
            draftId: '5551',
            warehouseIds: ['22', 'WH-x'],
            dateFrom: '2026-11-05T00:00:00Z',
            dateTo: '2026-11-05T23:59:59Z',
            bundleId: 'bundle-1',
        });

        expect(outcome).toEqual({ kind: 'ok', value: [] });
        expect(remote.callsTo(E.timeslotInfo)[0]?.body).toEqual({
            draft_id: 5551,
            warehouse_ids: [22, 'WH-x'],
            date_from: '2026-11-05T00:00:00Z',
            date_to: '2026-11-05T23:59:59Z',
            bundle_id: 'bundle-1',
        });
    });

    it('creates supplies without transport retries', async () => {
        const { remote, api } = setup();
        remote.on(E.createSupply, json(200, { result: { operation_id: 'op-9' } }), json(200, {}));
        const request = { draftId: '5551', warehouseId: '22', slotId: '41', from: 'F', to: 'T', dropOffWarehouseId: null };

        expect(await api.createSupply(request)).toEqual({ kind: 'ok', value: 'op-9' });
        expect(await api.createSupply(request)).toEqual({
            kind: 'rejected',
            status: 200,
            message: 'no operation id in response: HTTP 200: {}',
        });
        expect(remote.callsTo(E.createSupply)[0]).toEqual({
            method: 'POST',
            path: E.createSupply,
            body: {
                draft_id: 5551,
                warehouse_id: 22,
                timeslot: { from_in_timezone: 'F', to_in_timezone: 'T' },
                timeslot_id: 41,
            },
            autoRetry: false,
        });
    });

    describe('order metadata', () => {
        it('lists required fields that are still empty', async () => {
            const { remote, api } = setup();
            remote.on(
                E.orderGet,
                json(200, {
                    orders: [
                        {
                            supply_order_number: 'SO-1',
                            supply_id: 7001,
                            vehicle: { is_required: true, value: null },
                            contact: { is_required: true, value: 'dock 4' },
                            timeslot: { is_required: true, can_set: true },
                        },
                    ],
                }),
            );
            expect(await api.getOrder('9001')).toEqual({
                kind: 'ok',
                value: {
                    orderNumber: 'SO-1',
                    supplyId: '7001',
                    timeslotCanSet: true,
                    timeslotFrom: null,
                    timeslotTo: null,
                    missing: ['vehicle', 'timeslot'],
                },
            });
            expect(remote.callsTo(E.orderGet)[0]?.body).toEqual({ order_ids: [9001] });
        });

        it('reads a nested timeslot value', async () => {
            const { remote, api } = setup();
            remote.on(
                E.orderGet,
                json(200, { order: { order_number: 77, timeslot: { value: { timeslot: { from: 'A', to: 'B' } } } } }),
            );
            const outcome = await api.getOrder('9001');
            expect(outcome.kind === 'ok' && outcome.value).toEqual({
                orderNumber: '77',
                supplyId: null,
                timeslotCanSet: false,
                timeslotFrom: 'A',
                timeslotTo: 'B',
                missing: [],
            });
        });
    });

    describe('label file', () => {
        it('escapes the guid into the path', async () => {
            const { remote, api } = setup();
            remote.onFile(`${E.labelFile}a%20b`, { status: 200, data: Buffer.from('pdf') });
            const outcome = await api.fetchLabelFile('a b');
            expect(outcome.kind === 'ok' && outcome.value.toString('utf-8')).toBe('pdf');
        });

        it('treats an empty file as transient', async () => {
            const { remote, api } = setup();
            remote.onFile(`${E.labelFile}guid-1`, { status: 200, data: Buffer.alloc(0) });
            expect(await api.fetchLabelFile('guid-1')).toEqual({
                kind: 'transient',
                status: 200,
                message: 'label file is empty',
            });
        });

        it('reports a missing file', async () => {
            const { api } = setup();
            expect(await api.fetchLabelFile('guid-2')).toEqual({ kind: 'not_found', message: 'HTTP 404: not found' });
        });
    });

    it('honours endpoint overrides', async () => {
        const remote = new FakeRemote();
        const api = new FulfillmentApi(remote, { endpoints: { draftInfo: '/v2/draft/create/info' } });
        remote.on('/v2/draft/create/info', json(200, { draft_id: 1 }));
        const outcome = await api.getDraftInfo('op-1');
        expect(outcome.kind).toBe('ok');
    });
});
