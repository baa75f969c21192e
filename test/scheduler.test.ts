import { HardDisconnectError } from '../src/errors';
import { TickScheduler } from '../src/scheduler';

describe('TickScheduler', () => {
    afterEach(() => {
        jest.useRealTimers();
    });

    test('rejects a non-positive rate', () => {
        expect(() => new TickScheduler({ hertz: 0, tick: async () => undefined })).toThrow(RangeError);
        expect(() => new TickScheduler({ hertz: Number.NaN, tick: async () => undefined })).toThrow(RangeError);
    });

    test('an aborted tick is counted and does not stop the loop', async () => {
        const tick = jest.fn()
            .mockRejectedValueOnce(new Error('decode blew up'))
            .mockResolvedValue(undefined);
        const scheduler = new TickScheduler({ hertz: 10, tick });

        await scheduler.runOnce();
        await scheduler.runOnce();

        expect(tick).toHaveBeenCalledTimes(2);
        expect(scheduler.stats).toEqual({ completed: 1, aborted: 1 });
        expect(scheduler.state).toBe('idle');
    });

    test('a hard disconnect stops the scheduler and reports once', async () => {
        const fatal = new HardDisconnectError(1200, 1000);
        const onFatal = jest.fn();
        const tick = jest.fn().mockRejectedValue(fatal);
        const scheduler = new TickScheduler({ hertz: 10, tick, onFatal });

        await scheduler.runOnce();
        await scheduler.runOnce();

        expect(scheduler.state).toBe('stopped');
        expect(onFatal).toHaveBeenCalledTimes(1);
        expect(onFatal).toHaveBeenCalledWith(fatal);
        expect(tick).toHaveBeenCalledTimes(1);
        expect(scheduler.stats).toEqual({ completed: 0, aborted: 0 });
    });

    test('ticks never overlap', async () => {
        let release: () => void = () => undefined;
        const tick = jest.fn(() => new Promise<void>(resolve => { release = resolve; }));
        const scheduler = new TickScheduler({ hertz: 10, tick });

        const first = scheduler.runOnce();
        await scheduler.runOnce();
        expect(tick).toHaveBeenCalledTimes(1);

        release();
        await first;
        expect(scheduler.stats.completed).toBe(1);
    });

    test('start runs the first tick one period later and stop ends the loop', async () => {
        jest.useFakeTimers();
        const tick = jest.fn().mockResolvedValue(undefined);
        const scheduler = new TickScheduler({ hertz: 10, tick });

        scheduler.start();
        expect(scheduler.state).toBe('running');
        await jest.advanceTimersByTimeAsync(99);
        expect(tick).not.toHaveBeenCalled();
        await jest.advanceTimersByTimeAsync(1);
        expect(tick).toHaveBeenCalledTimes(1);

        await scheduler.stop();
        await jest.advanceTimersByTimeAsync(1000);
        expect(tick).toHaveBeenCalledTimes(1);
        expect(scheduler.state).toBe('stopped');
    });

    test('stop waits for the tick in flight', async () => {
        let release: () => void = () => undefined;
        const tick = jest.fn(() => new Promise<void>(resolve => { release = resolve; }));
        const scheduler = new TickScheduler({ hertz: 10, tick });

        const running = scheduler.runOnce();
        let stopped = false;
        const stopping = scheduler.stop().then(() => {
            stopped = true;
        });
        await Promise.resolve();
        expect(stopped).toBe(false);

        release();
        await Promise.all([running, stopping]);
        expect(stopped).toBe(true);
    });
});
