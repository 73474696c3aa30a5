import { describe, it, expect } from 'vitest';
import { BackendPacer, minIntervalMs } from '../llm/pacing.js';
import type { LlmBackend } from '../types/index.js';
import { FakeClock } from './helpers.js';

const PRO: LlmBackend = { model: 'pro', rpm: 10, rpd: 100 };
const FLASH: LlmBackend = { model: 'flash', rpm: 15, rpd: 2 };

describe('BackendPacer', () => {
    it('should select backends in priority order', () => {
        const pacer = new BackendPacer([PRO, FLASH], new FakeClock());
        expect(pacer.select()).toBe(PRO);
    });

    it('should skip excluded backends', () => {
        const pacer = new BackendPacer([PRO, FLASH], new FakeClock());
        expect(pacer.select(new Set(['pro']))).toBe(FLASH);
        expect(pacer.select(new Set(['pro', 'flash']))).toBeNull();
    });

    it('should not wait before the first call', async () => {
        const clock = new FakeClock();
        const pacer = new BackendPacer([PRO], clock);

        await pacer.acquire(PRO);

        expect(clock.sleeps).toEqual([]);
    });

    it('should space calls to the same backend by 60000 / rpm ms', async () => {
        const clock = new FakeClock();
        const pacer = new BackendPacer([PRO], clock);

        await pacer.acquire(PRO);
        await pacer.acquire(PRO);
        clock.advance(2000);
        await pacer.acquire(PRO);

        expect(clock.sleeps).toEqual([6000, 4000]);
        expect(pacer.snapshot()['pro']).toEqual({ lastCallAt: 12000, calls: 3, blockedUntil: 0 });
    });

    it('should not wait once the interval has passed', async () => {
        const clock = new FakeClock();
        const pacer = new BackendPacer([PRO], clock);

        await pacer.acquire(PRO);
        clock.advance(7000);
        await pacer.acquire(PRO);

        expect(clock.sleeps).toEqual([]);
    });

    it('should stop selecting a backend after its daily budget', async () => {
        const pacer = new BackendPacer([FLASH, PRO], new FakeClock());

        await pacer.acquire(FLASH);
        expect(pacer.select()).toBe(FLASH);
        await pacer.acquire(FLASH);

        expect(pacer.select()).toBe(PRO);
    });

    it('should leave a blocked backend alone until the cooldown ends', () => {
        const clock = new FakeClock();
        const pacer = new BackendPacer([PRO, FLASH], clock);

        pacer.block(PRO, 60_000);
        expect(pacer.select()).toBe(FLASH);

        clock.advance(59_999);
        expect(pacer.select()).toBe(FLASH);

        clock.advance(1);
        expect(pacer.select()).toBe(PRO);
    });
});

describe('minIntervalMs', () => {
    it('should round up to whole milliseconds', () => {
        expect(minIntervalMs({ model: 'x', rpm: 7, rpd: 1 })).toBe(8572);
        expect(minIntervalMs(PRO)).toBe(6000);
    });
});
