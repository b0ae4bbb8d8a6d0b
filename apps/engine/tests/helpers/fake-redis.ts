import { RedisLike } from '../../src/services/leaderelector';

/**
 * In-process stand-in for the few Redis commands the leader lock uses.
 * Lua scripts are recognised by the command they end with.
 */
export class FakeRedis implements RedisLike {
    readonly values = new Map<string, string>();
    readonly ttls = new Map<string, number>();
    readonly commands: string[] = [];

    async set(key: string, value: string, _expiryMode: 'EX', seconds: number, _mode: 'NX'): Promise<'OK' | null> {
        this.commands.push('set');
        if (this.values.has(key)) return null;
        this.values.set(key, value);
        this.ttls.set(key, seconds);
        return 'OK';
    }

    async get(key: string): Promise<string | null> {
        this.commands.push('get');
        return this.values.get(key) ?? null;
    }

    async eval(script: string, _numKeys: number, ...args: (string | number)[]): Promise<unknown> {
        const [key, owner, ttl] = args.map(String);
        const owned = key !== undefined && this.values.get(key) === owner;
        if (script.includes('"del"')) {
            this.commands.push('release');
            if (!owned) return 0;
            this.values.delete(key);
            this.ttls.delete(key);
            return 1;
        }
        this.commands.push('renew');
        if (!owned) return 0;
        this.ttls.set(key, Number(ttl));
        return 1;
    }
}
