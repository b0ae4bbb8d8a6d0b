import fs from 'fs/promises';
import path from 'path';
import { TaskRecord, cloneTask, isTerminal, parseTaskRecord } from '../db/task.entity';
import { InvalidTaskIdError } from '../errors';
import { KeyedMutex } from '../utils/keyed-mutex';
import { TaskMutator, TaskStore, stamp } from './task-store';

const TAG = '[store]';
const ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const AUDIT_LOG = 'audit.log';

function isMissing(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** One JSON document per task in a directory; each write lands via temp file and rename. */
export class FileTaskStore implements TaskStore {
    private readonly locks = new KeyedMutex();
    private writes = 0;

    constructor(
        private readonly dir: string,
        private readonly now: () => number = Date.now,
    ) { }

    async list(): Promise<TaskRecord[]> {
        await fs.mkdir(this.dir, { recursive: true });
        const names = (await fs.readdir(this.dir)).filter(name => name.endsWith('.json')).sort();
        const tasks: TaskRecord[] = [];
        for (const name of names) {
            try {
                const task = await this.read(path.join(this.dir, name));
                if (task) tasks.push(task);
            } catch (err) {
                console.error(`${TAG} skipping unreadable task file ${name}:`, err);
            }
        }
        return tasks.sort((a, b) => a.created_at - b.created_at);
    }

    async listActive(): Promise<TaskRecord[]> {
        return (await this.list()).filter(task => !isTerminal(task.status));
    }

    async get(id: string): Promise<TaskRecord | null> {
        return this.read(this.fileFor(id));
    }

    async upsert(task: TaskRecord): Promise<TaskRecord> {
        const file = this.fileFor(task.id);
        return this.locks.runExclusive(task.id, async () => {
            const stored = stamp(task, this.now());
            await this.write(file, stored);
            return stored;
        });
    }

    async update(id: string, mutate: TaskMutator): Promise<TaskRecord | null> {
        const file = this.fileFor(id);
        return this.locks.runExclusive(id, async () => {
            const current = await this.read(file);
            if (!current) return null;

            const next = mutate(cloneTask(current));
            if (!next) return null;

            const stored = stamp(next, this.now());
            await this.write(file, stored);
            return stored;
        });
    }

    async delete(id: string, reason: string): Promise<boolean> {
        const file = this.fileFor(id);
        return this.locks.runExclusive(id, async () => {
            const current = await this.read(file);
            if (!current) return false;

            const entry = { at: this.now(), id, status: current.status, reason };
            await fs.appendFile(path.join(this.dir, AUDIT_LOG), `${JSON.stringify(entry)}\n`);
            await fs.unlink(file);
            return true;
        });
    }

    async ping(): Promise<void> {
        await fs.mkdir(this.dir, { recursive: true });
        await fs.access(this.dir);
    }

    private fileFor(id: string): string {
        if (!ID_PATTERN.test(id)) {
            throw new InvalidTaskIdError(id);
        }
        return path.join(this.dir, `${id}.json`);
    }

    private async read(file: string): Promise<TaskRecord | null> {
        let text: string;
        try {
            text = await fs.readFile(file, 'utf-8');
        } catch (err) {
            if (isMissing(err)) return null;
            throw err;
        }
        return parseTaskRecord(JSON.parse(text));
    }

    private async write(file: string, task: TaskRecord): Promise<void> {
        await fs.mkdir(this.dir, { recursive: true });
        this.writes += 1;
        const temp = `${file}.${process.pid}.${this.writes}.tmp`;
        await fs.writeFile(temp, JSON.stringify(task, null, 2));
        await fs.rename(temp, file);
    }
}
