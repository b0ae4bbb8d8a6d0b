import { RetentionReaper } from '../../src/services/reaper';

describe('RetentionReaper', () => {
    let purgeOlderThan: jest.Mock<Promise<number>, [number]>;

    beforeEach(() => {
        purgeOlderThan = jest.fn<Promise<number>, [number]>().mockResolvedValue(2);
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.useRealTimers();
        jest.restoreAllMocks();
    });

    it('purges with the configured retention', async () => {
        const reaper = new RetentionReaper({ purgeOlderThan }, 14);
        expect(await reaper.reap()).toBe(2);
        expect(purgeOlderThan).toHaveBeenCalledWith(14);
    });

    it('runs once on start and then on every interval', async () => {
        jest.useFakeTimers();
        const reaper = new RetentionReaper({ purgeOlderThan }, 30, 1000);

        reaper.start();
        expect(reaper.isRunning()).toBe(true);
        expect(purgeOlderThan).toHaveBeenCalledTimes(1);

        await jest.advanceTimersByTimeAsync(2000);
        expect(purgeOlderThan).toHaveBeenCalledTimes(3);

        reaper.stop();
        await jest.advanceTimersByTimeAsync(5000);
        expect(purgeOlderThan).toHaveBeenCalledTimes(3);
        expect(reaper.isRunning()).toBe(false);
    });

    it('ignores a second start', () => {
        jest.useFakeTimers();
        const reaper = new RetentionReaper({ purgeOlderThan }, 30, 1000);
        reaper.start();
        reaper.start();
        expect(purgeOlderThan).toHaveBeenCalledTimes(1);
        reaper.stop();
    });

    it('skips a cycle while the previous one is still running', async () => {
        let finish: (count: number) => void = () => undefined;
        purgeOlderThan.mockImplementationOnce(() => new Promise<number>(resolve => (finish = resolve)));
        const reaper = new RetentionReaper({ purgeOlderThan }, 30);

        const first = reaper.reap();
        expect(await reaper.reap()).toBe(0);
        finish(5);
        expect(await first).toBe(5);
        expect(purgeOlderThan).toHaveBeenCalledTimes(1);
    });

    it('keeps going after a failed cycle', async () => {
        purgeOlderThan.mockRejectedValueOnce(new Error('store offline'));
        const reaper = new RetentionReaper({ purgeOlderThan }, 30);

        expect(await reaper.reap()).toBe(0);
        expect(await reaper.reap()).toBe(2);
    });
});
