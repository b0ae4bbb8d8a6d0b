/** Thrown by a stage handler to ask for the same stage again after `delay` ms. */
export class StageRetryError extends Error {
    constructor(
        public delay: number,
        public reason: string,
        public originalError?: unknown,
    ) {
        super(`stage retry scheduled: ${reason}`);
        this.name = 'StageRetryError';
    }
}
