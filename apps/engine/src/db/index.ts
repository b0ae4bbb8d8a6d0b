/**
 * Database connection management for Postgres and Redis.
 */
import fs from 'fs/promises';
import Redis from 'ioredis';
import path from 'path';
import { Pool } from 'pg';

const TAG = '[db]';

export const MIGRATIONS_DIR = path.join(__dirname, '..', '..', 'db', 'migrations');

/** The slice of a pg pool or client the stores use. Rows stay unknown until parsed. */
export interface Queryable {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface PgClient extends Queryable {
    release(): void;
}

export interface PgPool extends Queryable {
    connect(): Promise<PgClient>;
}

/**
 * Postgres connection pool:
 * - max: 10 connections (one engine process, short transactions)
 * - idleTimeoutMillis: 30s
 * - connectionTimeoutMillis: 2s
 */
export function createPool(connectionString: string): Pool {
    const pool = new Pool({
        connectionString,
        max: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
    pool.on('error', err => console.error(`${TAG} idle client error:`, err));
    return pool;
}

/** Redis client for leader election. */
export function createRedis(url: string): Redis {
    const redis = new Redis(url, { maxRetriesPerRequest: 3 });
    redis.on('error', err => console.error(`${TAG} redis error:`, err));
    return redis;
}

/** Applies every `.sql` file in name order. The scripts are idempotent. */
export async function runMigrations(pool: Queryable, dir: string = MIGRATIONS_DIR): Promise<string[]> {
    const files = (await fs.readdir(dir)).filter(name => name.endsWith('.sql')).sort();
    for (const file of files) {
        const sql = await fs.readFile(path.join(dir, file), 'utf-8');
        await pool.query(sql);
        console.log(`${TAG} applied ${file}`);
    }
    return files;
}
