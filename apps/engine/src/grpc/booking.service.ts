import * as grpc from '@grpc/grpc-js';
import { ServerUnaryCall, sendUnaryData } from '@grpc/grpc-js';
import { BookingRequestError, PayloadError, decodePayload, encodePayload } from '@supplybook/sdk';
import { TaskRecord, shortId } from '../db/task.entity';
import { InvalidTaskIdError } from '../errors';
import { BookingService } from '../services/booking.service';
import { errorMessage } from '../utils/json';

interface SubmitBookingRequest {
    request: Buffer;
}

interface SubmitBookingResponse {
    task_id: string;
    short_id: string;
}

interface TaskRequest {
    task_id: string;
}

interface TaskResponse {
    status: string;
    task: Buffer;
}

interface ListTasksRequest {
    active_only: boolean;
}

interface TaskSummaryMessage {
    task_id: string;
    short_id: string;
    status: string;
    last_error: string;
    next_attempt_at: number;
}

interface ListTasksResponse {
    tasks: TaskSummaryMessage[];
}

interface ControlResponse {
    success: boolean;
}

interface PurgeTasksRequest {
    older_than_days: number;
    all: boolean;
}

interface PurgeTasksResponse {
    removed: number;
}

type UnaryCall<Req, Res> = Pick<ServerUnaryCall<Req, Res>, 'request'>;

function summarize(task: TaskRecord): TaskSummaryMessage {
    return {
        task_id: task.id,
        short_id: shortId(task.id),
        status: task.status,
        last_error: task.last_error ?? '',
        next_attempt_at: task.next_attempt_at,
    };
}

function invalidArgument(err: unknown): boolean {
    return err instanceof BookingRequestError || err instanceof PayloadError || err instanceof InvalidTaskIdError;
}

/**
 * gRPC surface for booking operators. Task documents travel as JSON bytes;
 * bad input maps to INVALID_ARGUMENT, unknown ids to NOT_FOUND.
 */
export class BookingGrpcService {
    constructor(private readonly bookings: BookingService) { }

    async submitBooking(
        call: UnaryCall<SubmitBookingRequest, SubmitBookingResponse>,
        callback: sendUnaryData<SubmitBookingResponse>,
    ) {
        try {
            const task = await this.bookings.submit(decodePayload(call.request.request));
            callback(null, { task_id: task.id, short_id: shortId(task.id) });
        } catch (error) {
            this.fail('submitBooking', error, callback);
        }
    }

    async getTask(call: UnaryCall<TaskRequest, TaskResponse>, callback: sendUnaryData<TaskResponse>) {
        try {
            const { task_id } = call.request;
            const task = await this.bookings.get(task_id);
            if (!task) {
                return callback({ code: grpc.status.NOT_FOUND, details: `Task ${task_id} not found` });
            }
            callback(null, { status: task.status, task: encodePayload(task) });
        } catch (error) {
            this.fail('getTask', error, callback);
        }
    }

    async listTasks(call: UnaryCall<ListTasksRequest, ListTasksResponse>, callback: sendUnaryData<ListTasksResponse>) {
        try {
            const tasks = call.request.active_only ? await this.bookings.listActive() : await this.bookings.list();
            callback(null, { tasks: tasks.map(summarize) });
        } catch (error) {
            this.fail('listTasks', error, callback);
        }
    }

    async cancelTask(call: UnaryCall<TaskRequest, ControlResponse>, callback: sendUnaryData<ControlResponse>) {
        await this.control('cancelTask', () => this.bookings.cancel(call.request.task_id), callback);
    }

    async retryTask(call: UnaryCall<TaskRequest, ControlResponse>, callback: sendUnaryData<ControlResponse>) {
        await this.control('retryTask', () => this.bookings.retry(call.request.task_id), callback);
    }

    async deleteTask(call: UnaryCall<TaskRequest, ControlResponse>, callback: sendUnaryData<ControlResponse>) {
        await this.control('deleteTask', () => this.bookings.delete(call.request.task_id), callback);
    }

    async purgeTasks(call: UnaryCall<PurgeTasksRequest, PurgeTasksResponse>, callback: sendUnaryData<PurgeTasksResponse>) {
        try {
            const { older_than_days, all } = call.request;
            if (all) {
                return callback(null, { removed: await this.bookings.purgeAll() });
            }
            if (!Number.isInteger(older_than_days) || older_than_days <= 0) {
                return callback({
                    code: grpc.status.INVALID_ARGUMENT,
                    details: 'older_than_days must be a positive whole number unless all is set',
                });
            }
            callback(null, { removed: await this.bookings.purgeOlderThan(older_than_days) });
        } catch (error) {
            this.fail('purgeTasks', error, callback);
        }
    }

    private async control(
        method: string,
        action: () => Promise<boolean>,
        callback: sendUnaryData<ControlResponse>,
    ): Promise<void> {
        try {
            callback(null, { success: await action() });
        } catch (error) {
            this.fail(method, error, callback);
        }
    }

    private fail<T>(method: string, error: unknown, callback: sendUnaryData<T>): void {
        if (invalidArgument(error)) {
            callback({ code: grpc.status.INVALID_ARGUMENT, details: errorMessage(error) });
            return;
        }
        console.error(`[grpc] ${method} error:`, error);
        callback({ code: grpc.status.INTERNAL, details: errorMessage(error) });
    }
}
