import { describe, it, expect } from 'vitest';
import { MAX_TIMER_SECONDS, timerDelayMs } from '../../src/utils/timer.js';

describe('timerDelayMs', () => {
    it('converts seconds to milliseconds', () => {
        expect(timerDelayMs(0.02)).toBe(20);
        expect(timerDelayMs(300)).toBe(300_000);
    });

    it('caps delays at the 32-bit timer limit', () => {
        expect(timerDelayMs(30 * 24 * 3600)).toBe(2_147_483_000);
        expect(timerDelayMs(MAX_TIMER_SECONDS * 1000)).toBeLessThanOrEqual(2 ** 31 - 1);
    });
});
