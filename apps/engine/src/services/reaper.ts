import { BookingService } from './booking.service';

const TAG = '[reaper]';

/** Periodically purges terminal tasks past the retention age. */
export class RetentionReaper {
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isReaping = false;

    constructor(
        private readonly bookings: Pick<BookingService, 'purgeOlderThan'>,
        private readonly retentionDays: number,
        private readonly intervalMs = 3_600_000,
    ) { }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (retention: ${this.retentionDays}d, interval: ${this.intervalMs}ms)`);

        // fire immediately, then on schedule
        void this.reap();
        this.intervalHandle = setInterval(() => void this.reap(), this.intervalMs);
    }

    stop(): void {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    async reap(): Promise<number> {
        if (this.isReaping) return 0;
        this.isReaping = true;
        try {
            return await this.bookings.purgeOlderThan(this.retentionDays);
        } catch (err) {
            console.error(`${TAG} error during reap cycle:`, err);
            return 0;
        } finally {
            this.isReaping = false;
        }
    }
}
