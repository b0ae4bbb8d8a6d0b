import { TaskParseError, taskStatus } from '../../src/db/task.entity';
import { TaskRepository } from '../../src/repositories/task.repository';
import { FakePg } from '../helpers/fake-pg';
import { BASE_NOW, TASK_ID, makeTask } from '../helpers/fixtures';

describe('TaskRepository', () => {
    let pg: FakePg;
    let repo: TaskRepository;
    let now: number;

    beforeEach(() => {
        pg = new FakePg();
        now = BASE_NOW;
        repo = new TaskRepository(pg, () => now);
    });

    it('stores a task and reads it back', async () => {
        now = BASE_NOW + 10;
        const stored = await repo.upsert(makeTask());

        expect(stored.revision).toBe(1);
        expect(stored.updated_at).toBe(BASE_NOW + 10);
        expect(pg.statements).toEqual(['BEGIN', 'INSERT INTO', 'COMMIT']);
        expect(pg.released).toBe(1);
        expect(await repo.get(TASK_ID)).toEqual(stored);
    });

    it('returns null for an unknown id', async () => {
        expect(await repo.get('missing')).toBeNull();
    });

    it('lists active tasks by due time and all tasks by age', async () => {
        await repo.upsert(makeTask({ id: 'late', next_attempt_at: BASE_NOW + 500, created_at: BASE_NOW - 30 }));
        await repo.upsert(makeTask({ id: 'soon', next_attempt_at: BASE_NOW + 100, created_at: BASE_NOW - 10 }));
        await repo.upsert(makeTask({ id: 'done', status: taskStatus.DONE, created_at: BASE_NOW - 20 }));

        expect((await repo.listActive()).map(t => t.id)).toEqual(['soon', 'late']);
        expect((await repo.list()).map(t => t.id)).toEqual(['late', 'done', 'soon']);
    });

    it('applies a mutation under a row lock and bumps the revision', async () => {
        await repo.upsert(makeTask());
        pg.statements.length = 0;

        const updated = await repo.update(TASK_ID, current => ({ ...current, last_error: 'HTTP 503' }));

        expect(updated?.revision).toBe(2);
        expect(updated?.last_error).toBe('HTTP 503');
        expect((await repo.get(TASK_ID))?.last_error).toBe('HTTP 503');
        expect(pg.statements).toEqual(['BEGIN', 'SELECT doc', 'INSERT INTO', 'COMMIT', 'SELECT doc']);
    });

    it('writes nothing when the mutator declines', async () => {
        await repo.upsert(makeTask());
        expect(await repo.update(TASK_ID, () => null)).toBeNull();
        expect((await repo.get(TASK_ID))?.revision).toBe(1);
    });

    it('returns null when updating a task that is gone', async () => {
        expect(await repo.update('missing', current => current)).toBeNull();
    });

    it('rolls back when the mutator throws', async () => {
        await repo.upsert(makeTask());

        await expect(
            repo.update(TASK_ID, () => {
                throw new Error('boom');
            }),
        ).rejects.toThrow('boom');

        expect(pg.statements.slice(-1)).toEqual(['ROLLBACK']);
        expect(pg.released).toBe(2);
    });

    it('keeps an audit row when deleting', async () => {
        await repo.upsert(makeTask({ status: taskStatus.FAILED }));

        expect(await repo.delete(TASK_ID, 'operator_delete')).toBe(true);
        expect(await repo.get(TASK_ID)).toBeNull();
        expect(pg.audit).toHaveLength(1);
        expect(pg.audit[0]).toMatchObject({ task_id: TASK_ID, status: 'failed', reason: 'operator_delete' });

        expect(await repo.delete(TASK_ID, 'operator_delete')).toBe(false);
    });

    it('carries fields it does not know about', async () => {
        pg.seed(TASK_ID, { ...makeTask(), legacy_note: 'kept' });

        await repo.update(TASK_ID, current => ({ ...current, stage_attempts: 1 }));

        expect(pg.docs.get(TASK_ID)).toMatchObject({ legacy_note: 'kept', stage_attempts: 1 });
    });

    it('rejects a malformed document', async () => {
        pg.seed(TASK_ID, { id: TASK_ID, status: 'lost' });
        await expect(repo.get(TASK_ID)).rejects.toBeInstanceOf(TaskParseError);
    });

    it('pings the database', async () => {
        await repo.ping();
        expect(pg.statements).toEqual(['SELECT 1']);
    });
});
