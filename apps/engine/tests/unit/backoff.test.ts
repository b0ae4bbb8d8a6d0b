import { calculateBackOff, parseRetryAfter } from '../../src/utils/backoff';

describe('calculateBackOff', () => {
    it('returns ~1000ms for attempt 1 (default)', () => {
        const delay = calculateBackOff(1);
        expect(delay).toBeGreaterThanOrEqual(900);
        expect(delay).toBeLessThanOrEqual(1100);
    });

    it('returns ~4000ms for attempt 2 (default base 4)', () => {
        const delay = calculateBackOff(2);
        expect(delay).toBeGreaterThanOrEqual(3600);
        expect(delay).toBeLessThanOrEqual(4400);
    });

    it('caps at maxInterval', () => {
        const delay = calculateBackOff(10, 1000, 4, 5000);
        expect(delay).toBeGreaterThanOrEqual(4500); // 5000 ± 10% jitter
        expect(delay).toBeLessThanOrEqual(5500);
    });

    it('is exact when the jitter source sits in the middle', () => {
        expect(calculateBackOff(3, 500, 2, 60000, () => 0.5)).toBe(2000);
    });
});

describe('parseRetryAfter', () => {
    const now = Date.parse('2026-11-01T08:00:00Z');

    it('reads seconds', () => {
        expect(parseRetryAfter({ 'Retry-After': '5' }, now)).toBe(5000);
    });

    it('reads an HTTP date', () => {
        expect(parseRetryAfter({ 'retry-after': 'Sun, 01 Nov 2026 08:00:30 GMT' }, now)).toBe(30000);
    });

    it('reads a relative reset header', () => {
        expect(parseRetryAfter({ 'x-ratelimit-reset': '12' }, now)).toBe(12000);
    });

    it('treats large reset values as epoch seconds', () => {
        expect(parseRetryAfter({ 'x-ratelimit-reset': String(now / 1000 + 8) }, now)).toBe(8000);
    });

    it('never returns less than a second', () => {
        expect(parseRetryAfter({ 'retry-after': '0' }, now)).toBe(1000);
    });

    it('returns null without a hint', () => {
        expect(parseRetryAfter({ 'content-type': 'application/json' }, now)).toBeNull();
    });
});
