import * as grpc from '@grpc/grpc-js';
import { z } from 'zod';
import { BookingRequestInput } from './booking-request';
import { BOOKING_PROTO, BOOKING_SERVICE, loadService } from './proto';
import { PurgeOptions, SubmittedBooking, TaskSnapshot, TaskSummary } from './types';
import { decodePayload, encodePayload } from './utils/payload';

type GrpcCallback = (err: grpc.ServiceError | null, res?: unknown) => void;

function rpc(fn: (cb: GrpcCallback) => void): Promise<unknown> {
    return new Promise((resolve, reject) => {
        fn((err, res) => (err ? reject(err) : resolve(res)));
    });
}

const submitResponse = z.object({ task_id: z.string(), short_id: z.string() });
const taskResponse = z.object({ status: z.string(), task: z.instanceof(Uint8Array) });
const controlResponse = z.object({ success: z.boolean() });
const purgeResponse = z.object({ removed: z.number() });
const listResponse = z.object({
    tasks: z.array(
        z.object({
            task_id: z.string(),
            short_id: z.string(),
            status: z.string(),
            last_error: z.string(),
            next_attempt_at: z.union([z.string(), z.number()]).transform(Number),
        }),
    ),
});

export interface BookingClient {
    submitBooking(request: BookingRequestInput): Promise<SubmittedBooking>;
    getTask(taskId: string): Promise<TaskSnapshot>;
    listTasks(activeOnly?: boolean): Promise<TaskSummary[]>;
    cancelTask(taskId: string): Promise<boolean>;
    retryTask(taskId: string): Promise<boolean>;
    deleteTask(taskId: string): Promise<boolean>;
    purgeTasks(options: PurgeOptions): Promise<number>;
    close(): void;
}

export function createBookingClient(
    address: string,
    credentials: grpc.ChannelCredentials = grpc.credentials.createInsecure(),
): BookingClient {
    const service = loadService(BOOKING_PROTO, BOOKING_SERVICE);
    const client = new grpc.Client(address, credentials);

    const unary = (method: string, request: object): Promise<unknown> => {
        const definition = service[method];
        if (!definition) {
            return Promise.reject(new Error(`unknown method ${method}`));
        }
        return rpc(cb =>
            client.makeUnaryRequest(
                definition.path,
                definition.requestSerialize,
                definition.responseDeserialize,
                request,
                cb,
            ),
        );
    };

    const control = async (method: string, taskId: string) =>
        controlResponse.parse(await unary(method, { task_id: taskId })).success;

    return {
        submitBooking: async request => {
            const res = submitResponse.parse(await unary('SubmitBooking', { request: encodePayload(request) }));
            return { taskId: res.task_id, shortId: res.short_id };
        },

        getTask: async taskId => {
            const res = taskResponse.parse(await unary('GetTask', { task_id: taskId }));
            return { status: res.status, task: z.record(z.unknown()).parse(decodePayload(res.task) ?? {}) };
        },

        listTasks: async (activeOnly = false) => {
            const res = listResponse.parse(await unary('ListTasks', { active_only: activeOnly }));
            return res.tasks.map(t => ({
                taskId: t.task_id,
                shortId: t.short_id,
                status: t.status,
                lastError: t.last_error,
                nextAttemptAt: t.next_attempt_at,
            }));
        },

        cancelTask: taskId => control('CancelTask', taskId),
        retryTask: taskId => control('RetryTask', taskId),
        deleteTask: taskId => control('DeleteTask', taskId),

        purgeTasks: async options => {
            const res = purgeResponse.parse(
                await unary('PurgeTasks', { older_than_days: options.olderThanDays ?? 0, all: options.all ?? false }),
            );
            return res.removed;
        },

        close: () => client.close(),
    };
}
