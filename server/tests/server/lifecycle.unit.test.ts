import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { AddressInfo } from 'node:net';
import { SlidingWindowCounter } from '../../src/domain/sliding-window-counter.js';
import { StartupCorruptionError } from '../../src/errors.js';
import { createShutdownHandler, startServer, type RunningServer } from '../../src/lifecycle.js';
import { createLogger } from '../../src/utils/log.js';
import { MemoryStateStore } from '../fixtures.js';

const log = createLogger('silent');
const settings = { host: '127.0.0.1', port: 0, requestTimeoutMs: 10_000 };

describe('createShutdownHandler', () => {
    let store: MemoryStateStore;
    let counter: SlidingWindowCounter;

    beforeEach(() => {
        store = new MemoryStateStore();
        counter = new SlidingWindowCounter(store);
        counter.load();
    });

    it('stops the ticker, flushes and exits with 0', () => {
        const ticker = { stop: vi.fn() };
        const exit = vi.fn();
        for (let i = 0; i < 3; i++) counter.increment();
        counter.rotate();

        createShutdownHandler({ counter, ticker, log, exit })('SIGINT');

        expect(ticker.stop).toHaveBeenCalledTimes(1);
        expect(store.writes).toBe(1);
        expect(store.saved?.bucketHistory[0]).toBe(3);
        expect(store.saved?.cursor).toBe(1);
        expect(exit).toHaveBeenCalledTimes(1);
        expect(exit).toHaveBeenCalledWith(0);
    });

    it('exits with 1 when the final flush fails', () => {
        const ticker = { stop: vi.fn() };
        const exit = vi.fn();
        store.failWrites = true;

        createShutdownHandler({ counter, ticker, log, exit })('SIGTERM');

        expect(ticker.stop).toHaveBeenCalledTimes(1);
        expect(exit).toHaveBeenCalledTimes(1);
        expect(exit).toHaveBeenCalledWith(1);
    });
});

describe('startServer', () => {
    let running: RunningServer | undefined;

    afterEach(async () => {
        vi.useRealTimers();
        if (running) {
            running.ticker.stop();
            await running.app.close();
            running = undefined;
        }
    });

    it('refuses to start on a corrupt state file', async () => {
        vi.useFakeTimers();
        const write = vi.fn();
        const counter = new SlidingWindowCounter({
            read: () => {
                throw new StartupCorruptionError('bad file', 'request-file.txt');
            },
            write
        });
        const exit = vi.fn();

        await expect(startServer(counter, settings, log, exit)).rejects.toBeInstanceOf(StartupCorruptionError);

        vi.advanceTimersByTime(5000);
        expect(write).not.toHaveBeenCalled();
        expect(exit).not.toHaveBeenCalled();
    });

    it('serves the restored count and accepts large request heads', async () => {
        const store = new MemoryStateStore({
            cursor: 1,
            bucketHistory: [4, ...new Array<number>(59).fill(0)],
            windowTotal: 4
        });
        const counter = new SlidingWindowCounter(store);
        const exit = vi.fn();

        running = await startServer(counter, settings, log, exit);
        const { port } = running.app.server.address() as AddressInfo;

        const res = await fetch(`http://127.0.0.1:${port}/`, {
            headers: { 'x-padding': 'a'.repeat(20_000) }
        });

        expect(res.status).toBe(200);
        expect((await res.text()).split('\n')[0]).toBe('Served 5 requests in the last 1m0s');
        expect(exit).not.toHaveBeenCalled();
    });
});
