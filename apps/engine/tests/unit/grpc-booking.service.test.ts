import fs from 'fs';
import path from 'path';
import { sendUnaryData, status } from '@grpc/grpc-js';
import { decodePayload, encodePayload } from '@supplybook/sdk';
import { taskStatus } from '../../src/db/task.entity';
import { BookingGrpcService } from '../../src/grpc/booking.service';
import { HealthService } from '../../src/grpc/health.service';
import { FileTaskStore } from '../../src/repositories/file-task.repository';
import { BookingService } from '../../src/services/booking.service';
import { BASE_NOW, TASK_ID, bookingInput, makeTask, makeTempDir } from '../helpers/fixtures';

interface Reply<Res> {
    error: Parameters<sendUnaryData<Res>>[0];
    value: Res | null | undefined;
}

function invoke<Req, Res>(
    handler: (call: { request: Req }, callback: sendUnaryData<Res>) => Promise<void>,
    request: Req,
): Promise<Reply<Res>> {
    return new Promise(resolve => {
        void handler({ request }, (error, value) => resolve({ error, value }));
    });
}

describe('BookingGrpcService', () => {
    let dir: string;
    let store: FileTaskStore;
    let service: BookingGrpcService;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        dir = makeTempDir('supplybook-grpc');
        store = new FileTaskStore(dir, () => BASE_NOW);
        service = new BookingGrpcService(new BookingService(store, { now: () => BASE_NOW, newId: () => TASK_ID }));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    describe('submitBooking', () => {
        it('returns the new task id', async () => {
            const reply = await invoke(service.submitBooking.bind(service), { request: encodePayload(bookingInput()) });
            expect(reply.error).toBeNull();
            expect(reply.value).toEqual({ task_id: TASK_ID, short_id: 'a1b2c3d4' });
        });

        it('maps malformed bytes to INVALID_ARGUMENT', async () => {
            const reply = await invoke(service.submitBooking.bind(service), { request: Buffer.from('{oops') });
            expect(reply.error?.code).toBe(status.INVALID_ARGUMENT);
            expect(reply.error?.details).toMatch(/^Failed to decode payload/);
        });

        it('maps a rejected booking to INVALID_ARGUMENT', async () => {
            const reply = await invoke(service.submitBooking.bind(service), {
                request: encodePayload(bookingInput({ lineItems: [] })),
            });
            expect(reply.error?.code).toBe(status.INVALID_ARGUMENT);
            expect(reply.error?.details).toMatch(/^invalid booking request: lineItems: /);
        });
    });

    describe('getTask', () => {
        it('returns the task document', async () => {
            await store.upsert(makeTask());
            const reply = await invoke(service.getTask.bind(service), { task_id: TASK_ID });

            expect(reply.value?.status).toBe('waiting_window');
            expect(decodePayload(reply.value?.task)).toMatchObject({ id: TASK_ID, recipient: 'ops-chat-1' });
        });

        it('answers NOT_FOUND for an unknown id', async () => {
            const reply = await invoke(service.getTask.bind(service), { task_id: 'missing' });
            expect(reply.error).toEqual({ code: status.NOT_FOUND, details: 'Task missing not found' });
        });

        it('answers INVALID_ARGUMENT for an id that is not a file name', async () => {
            const reply = await invoke(service.getTask.bind(service), { task_id: '../escape' });
            expect(reply.error).toEqual({ code: status.INVALID_ARGUMENT, details: 'invalid task id: ../escape' });
        });

        it('answers INTERNAL when the store fails', async () => {
            fs.writeFileSync(path.join(dir, `${TASK_ID}.json`), '{ torn write');
            const reply = await invoke(service.getTask.bind(service), { task_id: TASK_ID });
            expect(reply.error?.code).toBe(status.INTERNAL);
        });
    });

    it('lists task summaries', async () => {
        await store.upsert(makeTask({ last_error: 'HTTP 503', next_attempt_at: BASE_NOW + 10 }));
        await store.upsert(makeTask({ id: 'finished', status: taskStatus.DONE }));

        const active = await invoke(service.listTasks.bind(service), { active_only: true });
        expect(active.value?.tasks).toEqual([
            {
                task_id: TASK_ID,
                short_id: 'a1b2c3d4',
                status: 'waiting_window',
                last_error: 'HTTP 503',
                next_attempt_at: BASE_NOW + 10,
            },
        ]);

        const all = await invoke(service.listTasks.bind(service), { active_only: false });
        expect(all.value?.tasks.map(t => t.task_id).sort()).toEqual([TASK_ID, 'finished'].sort());
    });

    it('cancels, retries and deletes', async () => {
        await store.upsert(makeTask());

        expect((await invoke(service.cancelTask.bind(service), { task_id: TASK_ID })).value).toEqual({ success: true });
        expect((await invoke(service.cancelTask.bind(service), { task_id: TASK_ID })).value).toEqual({ success: false });
        expect((await invoke(service.retryTask.bind(service), { task_id: TASK_ID })).value).toEqual({ success: true });
        expect((await store.get(TASK_ID))?.status).toBe(taskStatus.WAITING_WINDOW);
        expect((await invoke(service.deleteTask.bind(service), { task_id: TASK_ID })).value).toEqual({ success: true });
        expect(await store.get(TASK_ID)).toBeNull();
    });

    describe('purgeTasks', () => {
        it('requires a positive age unless purging everything', async () => {
            const reply = await invoke(service.purgeTasks.bind(service), { older_than_days: 0, all: false });
            expect(reply.error?.code).toBe(status.INVALID_ARGUMENT);
        });

        it('purges everything when asked', async () => {
            await store.upsert(makeTask());
            await store.upsert(makeTask({ id: 'second' }));
            const reply = await invoke(service.purgeTasks.bind(service), { older_than_days: 0, all: true });
            expect(reply.value).toEqual({ removed: 2 });
        });

        it('purges by age', async () => {
            await store.upsert(makeTask({ status: taskStatus.DONE, completed_at: BASE_NOW - 10 * 24 * 60 * 60 * 1000 }));
            const reply = await invoke(service.purgeTasks.bind(service), { older_than_days: 7, all: false });
            expect(reply.value).toEqual({ removed: 1 });
        });
    });
});

describe('HealthService', () => {
    it('serves while every probe answers', async () => {
        const health = new HealthService([async () => 'PONG', async () => undefined]);
        expect(await health.status()).toBe('SERVING');
    });

    it('stops serving when a probe fails', async () => {
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const health = new HealthService([async () => 'PONG', () => Promise.reject(new Error('redis down'))]);

        const reply = await invoke(health.check.bind(health), { service: '' });

        expect(reply.value).toEqual({ status: 'NOT_SERVING' });
        jest.restoreAllMocks();
    });
});
