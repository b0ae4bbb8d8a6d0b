import { LeaderElector } from '../../src/services/leaderelector';
import { FakeRedis } from '../helpers/fake-redis';

describe('LeaderElector', () => {
    const key = 'supplybook:worker:leader';
    let redis: FakeRedis;

    beforeEach(() => {
        redis = new FakeRedis();
    });

    afterEach(() => {
        jest.useRealTimers();
        jest.restoreAllMocks();
    });

    it('elects a leader when the key is empty', async () => {
        const elector = new LeaderElector(redis, 30, 'worker-1');
        expect(await elector.tryBecomeLeader()).toBe(true);

        expect(redis.values.get(key)).toBe('worker-1');
        expect(redis.ttls.get(key)).toBe(30);
        expect(await elector.isLeader()).toBe(true);

        await elector.releaseLeadership();
    });

    it('denies leadership while another worker holds the key', async () => {
        redis.values.set(key, 'other-worker');

        const elector = new LeaderElector(redis, 30, 'worker-1');
        expect(await elector.tryBecomeLeader()).toBe(false);
        expect(await elector.isLeader()).toBe(false);
    });

    it('keeps the lock across a restart with the same id', async () => {
        redis.values.set(key, 'worker-1');

        const elector = new LeaderElector(redis, 30, 'worker-1');
        expect(await elector.tryBecomeLeader()).toBe(true);

        await elector.releaseLeadership();
    });

    it('releases only its own lock', async () => {
        const holder = new LeaderElector(redis, 30, 'worker-1');
        const other = new LeaderElector(redis, 30, 'worker-2');
        await holder.tryBecomeLeader();

        await other.releaseLeadership();
        expect(redis.values.get(key)).toBe('worker-1');

        await holder.releaseLeadership();
        expect(redis.values.has(key)).toBe(false);
    });

    it('generates an id when none is given', () => {
        expect(new LeaderElector(redis, 30).id).toMatch(/^worker-\d+-\d+$/);
    });

    it('renews at half the TTL and reports a lost lock once', async () => {
        jest.useFakeTimers();
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const onLost = jest.fn();
        const elector = new LeaderElector(redis, 10, 'worker-1');
        await elector.tryBecomeLeader(onLost);

        await jest.advanceTimersByTimeAsync(5000);
        expect(redis.commands.filter(c => c === 'renew')).toHaveLength(1);
        expect(onLost).not.toHaveBeenCalled();

        redis.values.set(key, 'worker-2');
        await jest.advanceTimersByTimeAsync(5000);
        expect(onLost).toHaveBeenCalledTimes(1);

        await jest.advanceTimersByTimeAsync(10000);
        expect(redis.commands.filter(c => c === 'renew')).toHaveLength(2);
        expect(onLost).toHaveBeenCalledTimes(1);
    });
});
