import { TaskRecord } from '../db/task.entity';

/** Returns the record to store, or null to leave the stored one untouched. */
export type TaskMutator = (current: TaskRecord) => TaskRecord | null;

/**
 * Durable task storage. Writes for one id are serialized; every write
 * refreshes `updated_at` and bumps `revision`.
 */
export interface TaskStore {
    list(): Promise<TaskRecord[]>;
    listActive(): Promise<TaskRecord[]>;
    get(id: string): Promise<TaskRecord | null>;
    upsert(task: TaskRecord): Promise<TaskRecord>;
    /** Atomic read-modify-write. Resolves to the stored record, or null when nothing was written. */
    update(id: string, mutate: TaskMutator): Promise<TaskRecord | null>;
    /** Removes the task after writing an audit trace. False when it did not exist. */
    delete(id: string, reason: string): Promise<boolean>;
    ping(): Promise<void>;
}

export function stamp(task: TaskRecord, now: number): TaskRecord {
    return { ...task, updated_at: now, revision: task.revision + 1 };
}
