const LEADER_KEY = 'supplybook:worker:leader';

const RELEASE_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

const RENEW_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("expire", KEYS[1], ARGV[2])
    else
        return 0
    end
`;

/** The slice of an ioredis client the lock needs. */
export interface RedisLike {
    set(key: string, value: string, expiryMode: 'EX', seconds: number, mode: 'NX'): Promise<'OK' | null>;
    get(key: string): Promise<string | null>;
    eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
}

/**
 * Single-driver lock: only the holder runs the worker loop and the reaper.
 * The lock expires on its own if the holder dies without releasing it.
 */
export class LeaderElector {
    private readonly workerId: string;
    private renewalInterval: NodeJS.Timeout | null = null;
    private onLost: (() => void) | null = null;

    constructor(
        private redis: RedisLike,
        private readonly ttlSeconds: number,
        workerId?: string,
    ) {
        this.workerId = workerId || `worker-${process.pid}-${Date.now()}`;
    }

    get id(): string {
        return this.workerId;
    }

    /** `onLost` fires once if a renewal finds the lock held by someone else. */
    async tryBecomeLeader(onLost?: () => void): Promise<boolean> {
        const result = await this.redis.set(LEADER_KEY, this.workerId, 'EX', this.ttlSeconds, 'NX');

        // a restarted process with the same id keeps its lock
        const leader = result === 'OK' || (await this.redis.get(LEADER_KEY)) === this.workerId;
        if (leader) {
            this.onLost = onLost ?? null;
            this.startRenewal();
        }
        return leader;
    }

    async releaseLeadership(): Promise<void> {
        this.stopRenewal();
        await this.redis.eval(RELEASE_SCRIPT, 1, LEADER_KEY, this.workerId);
    }

    async isLeader(): Promise<boolean> {
        const currentLeader = await this.redis.get(LEADER_KEY);
        return currentLeader === this.workerId;
    }

    private startRenewal(): void {
        if (this.renewalInterval) return;
        const renewalMs = (this.ttlSeconds * 1000) / 2;

        this.renewalInterval = setInterval(() => {
            this.renewLock()
                .then(stillLeader => {
                    if (!stillLeader) {
                        console.warn(`[leader] ${this.workerId} lost leadership`);
                        this.stopRenewal();
                        const onLost = this.onLost;
                        this.onLost = null;
                        onLost?.();
                    }
                })
                .catch(error => console.error('[leader] lock renewal failed:', error));
        }, renewalMs);
    }

    private stopRenewal(): void {
        if (this.renewalInterval) {
            clearInterval(this.renewalInterval);
            this.renewalInterval = null;
        }
    }

    private async renewLock(): Promise<boolean> {
        const result = await this.redis.eval(RENEW_SCRIPT, 1, LEADER_KEY, this.workerId, this.ttlSeconds);
        return result === 1;
    }
}
