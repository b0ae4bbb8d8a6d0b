import type { PgClient, PgPool } from '.';

/**
 * Runs a callback inside a database transaction: commits on success,
 * rolls back and re-throws on error.
 *
 * @example
 * await txManager.run(async (client) => {
 *   await client.query('SELECT doc FROM booking_tasks WHERE id = $1 FOR UPDATE', [id]);
 *   await client.query('UPDATE booking_tasks SET ...');
 * });
 */
export class TransactionManager {
    constructor(private pool: Pick<PgPool, 'connect'>) { }

    async run<T>(callback: (client: PgClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            await client.query('ROLLBACK');
            throw e;
        } finally {
            client.release();
        }
    }
}
