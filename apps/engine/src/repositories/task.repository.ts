import { PgClient, PgPool } from '../db';
import { TERMINAL_STATUSES, TaskRecord, parseTaskRecord } from '../db/task.entity';
import { TransactionManager } from '../db/transaction.manager';
import { dig } from '../utils/json';
import { TaskMutator, TaskStore, stamp } from './task-store';

function taskFrom(row: unknown): TaskRecord {
    return parseTaskRecord(dig(row, 'doc'));
}

/** Tasks as jsonb documents in `booking_tasks`, with status and due time broken out for scans. */
export class TaskRepository implements TaskStore {
    private readonly tx: TransactionManager;

    constructor(
        private readonly pool: PgPool,
        private readonly now: () => number = Date.now,
    ) {
        this.tx = new TransactionManager(pool);
    }

    async list(): Promise<TaskRecord[]> {
        const res = await this.pool.query('SELECT doc FROM booking_tasks ORDER BY created_at ASC');
        return res.rows.map(taskFrom);
    }

    async listActive(): Promise<TaskRecord[]> {
        const res = await this.pool.query(
            'SELECT doc FROM booking_tasks WHERE status <> ALL($1::text[]) ORDER BY next_attempt_at ASC',
            [[...TERMINAL_STATUSES]],
        );
        return res.rows.map(taskFrom);
    }

    async get(id: string): Promise<TaskRecord | null> {
        const res = await this.pool.query('SELECT doc FROM booking_tasks WHERE id = $1', [id]);
        const row = res.rows[0];
        return row ? taskFrom(row) : null;
    }

    async upsert(task: TaskRecord): Promise<TaskRecord> {
        const stored = stamp(task, this.now());
        await this.tx.run(client => this.save(client, stored));
        return stored;
    }

    async update(id: string, mutate: TaskMutator): Promise<TaskRecord | null> {
        return this.tx.run(async client => {
            const res = await client.query('SELECT doc FROM booking_tasks WHERE id = $1 FOR UPDATE', [id]);
            const row = res.rows[0];
            if (!row) return null;

            const next = mutate(taskFrom(row));
            if (!next) return null;

            const stored = stamp(next, this.now());
            await this.save(client, stored);
            return stored;
        });
    }

    async delete(id: string, reason: string): Promise<boolean> {
        return this.tx.run(async client => {
            const res = await client.query('SELECT doc FROM booking_tasks WHERE id = $1 FOR UPDATE', [id]);
            const row = res.rows[0];
            if (!row) return false;

            const task = taskFrom(row);
            await client.query(
                'INSERT INTO booking_task_audit (task_id, status, reason, doc) VALUES ($1, $2, $3, $4)',
                [task.id, task.status, reason, JSON.stringify(task)],
            );
            await client.query('DELETE FROM booking_tasks WHERE id = $1', [id]);
            return true;
        });
    }

    async ping(): Promise<void> {
        await this.pool.query('SELECT 1');
    }

    private async save(client: PgClient, task: TaskRecord): Promise<void> {
        await client.query(
            `INSERT INTO booking_tasks (id, status, doc, next_attempt_at, created_at, updated_at)
             VALUES ($1, $2, $3, to_timestamp($4 / 1000.0), to_timestamp($5 / 1000.0), to_timestamp($6 / 1000.0))
             ON CONFLICT (id) DO UPDATE
             SET status = EXCLUDED.status,
                 doc = EXCLUDED.doc,
                 next_attempt_at = EXCLUDED.next_attempt_at,
                 updated_at = EXCLUDED.updated_at`,
            [task.id, task.status, JSON.stringify(task), task.next_attempt_at, task.created_at, task.updated_at],
        );
    }
}
