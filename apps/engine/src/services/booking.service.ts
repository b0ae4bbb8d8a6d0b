import { parseBookingRequest } from '@supplybook/sdk';
import { v4 as uuidv4 } from 'uuid';
import { TaskRecord, createTaskRecord, isTerminal, shortId, taskStatus } from '../db/task.entity';
import { resetTask, transition } from '../engine/state-machine';
import { TaskStore } from '../repositories/task-store';

const TAG = '[booking]';
const DAY_MS = 24 * 60 * 60 * 1000;

export interface BookingServiceOptions {
    now?: () => number;
    newId?: () => string;
}

/** Operator surface over the task store. */
export class BookingService {
    private readonly now: () => number;
    private readonly newId: () => string;

    constructor(
        private readonly store: TaskStore,
        options: BookingServiceOptions = {},
    ) {
        this.now = options.now ?? Date.now;
        this.newId = options.newId ?? uuidv4;
    }

    /** Validates and stores a new task. Throws BookingRequestError on invalid input. */
    async submit(input: unknown): Promise<TaskRecord> {
        const request = parseBookingRequest(input);
        const task = await this.store.upsert(createTaskRecord(request, this.newId(), this.now()));
        console.log(`${TAG} task ${shortId(task.id)} submitted for ${task.recipient}`);
        return task;
    }

    async get(id: string): Promise<TaskRecord | null> {
        return this.store.get(id);
    }

    async list(): Promise<TaskRecord[]> {
        return this.store.list();
    }

    async listActive(): Promise<TaskRecord[]> {
        return this.store.listActive();
    }

    /** False when the task is missing or already terminal. */
    async cancel(id: string): Promise<boolean> {
        const updated = await this.store.update(id, task => {
            if (isTerminal(task.status)) return null;
            transition(task, taskStatus.CANCELED, this.now(), { by: 'operator' });
            return task;
        });
        if (updated) console.log(`${TAG} task ${shortId(id)} canceled`);
        return updated !== null;
    }

    /** Restarts the task from the beginning. False when it does not exist. */
    async retry(id: string): Promise<boolean> {
        const updated = await this.store.update(id, task => {
            resetTask(task, this.now());
            return task;
        });
        if (updated) console.log(`${TAG} task ${shortId(id)} reset for retry`);
        return updated !== null;
    }

    async delete(id: string): Promise<boolean> {
        return this.store.delete(id, 'operator_delete');
    }

    /** Removes terminal tasks finished more than `days` ago. */
    async purgeOlderThan(days: number): Promise<number> {
        const cutoff = this.now() - days * DAY_MS;
        let removed = 0;
        for (const task of await this.store.list()) {
            if (!isTerminal(task.status)) continue;
            if ((task.completed_at ?? task.updated_at) >= cutoff) continue;
            if (await this.store.delete(task.id, `retention_${days}d`)) removed += 1;
        }
        if (removed > 0) console.log(`${TAG} purged ${removed} tasks older than ${days} days`);
        return removed;
    }

    /** Removes every task, active ones included. */
    async purgeAll(): Promise<number> {
        let removed = 0;
        for (const task of await this.store.list()) {
            if (await this.store.delete(task.id, 'purge_all')) removed += 1;
        }
        console.log(`${TAG} purged all ${removed} tasks`);
        return removed;
    }
}
