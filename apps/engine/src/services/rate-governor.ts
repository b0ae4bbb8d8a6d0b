import { RateConfig } from '../config';
import { calculateBackOff } from '../utils/backoff';

const TAG = '[governor]';

/**
 * Shared pacing for all tasks.
 *
 * Draft creation goes through a single gate: a minimum interval between any
 * two draft calls, pushed further out by a cooldown after a draft 429.
 * Rate-limit waits for individual tasks grow with the number of consecutive
 * 429s seen across all calls; any other response resets that counter.
 */
export class RateGovernor {
    private nextDraftSlotAt = 0;
    private draftCooldownUntil = 0;
    private consecutiveHits = 0;

    constructor(
        private readonly config: RateConfig,
        private readonly now: () => number = Date.now,
        private readonly random: () => number = Math.random,
    ) { }

    get consecutiveRateLimits(): number {
        return this.consecutiveHits;
    }

    /** Claims the next draft slot. Returns 0 when claimed, otherwise how long to wait. */
    reserveDraftSlot(): number {
        const now = this.now();
        const gate = Math.max(this.nextDraftSlotAt, this.draftCooldownUntil);
        if (now < gate) {
            return gate - now;
        }
        this.nextDraftSlotAt = now + this.config.globalDraftIntervalMs;
        return 0;
    }

    coolDownDrafts(waitMs: number): void {
        const until = this.now() + waitMs;
        if (until > this.draftCooldownUntil) {
            this.draftCooldownUntil = until;
            console.warn(`${TAG} draft creation paused for ${Math.round(waitMs)}ms`);
        }
    }

    /** Fed with every remote status code. */
    observe(status: number): void {
        if (status === 429) {
            this.consecutiveHits += 1;
        } else if (status !== 0) {
            this.consecutiveHits = 0;
        }
    }

    /** Wait after a 429: the server's hint when it sent one, otherwise exponential with jitter. */
    rateLimitWait(hintMs: number | null): number {
        if (hintMs !== null) {
            return Math.min(hintMs, this.config.maxWaitMs);
        }
        const exponent = Math.max(this.consecutiveHits, 1) - 1;
        const base = Math.min(this.config.baseWaitMs * Math.pow(2, exponent), this.config.maxWaitMs);
        const jitter = this.random() * this.config.jitterMs;
        return Math.min(Math.round(base + jitter), this.config.maxWaitMs);
    }

    /** Backoff for 5xx and transport failures; attempt is 1-indexed. */
    transientBackoff(attempt: number, baseMs: number, maxMs: number = 120_000): number {
        return calculateBackOff(attempt, baseMs, 2, maxMs, this.random);
    }
}
