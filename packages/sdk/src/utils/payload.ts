const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

export class PayloadError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PayloadError';
    }
}

// JSON documents travel as bytes fields on the control surface.
export function encodePayload(value: unknown): Buffer {
    let text: string;
    try {
        text = JSON.stringify(value ?? null);
    } catch (err) {
        throw new PayloadError(`Failed to encode payload: ${err instanceof Error ? err.message : String(err)}`);
    }

    const size = Buffer.byteLength(text);
    if (size > MAX_PAYLOAD_SIZE) {
        throw new PayloadError(
            `Payload size exceeds maximum limit of 1MB. Current size: ${(size / 1024 / 1024).toFixed(2)}MB`,
        );
    }
    return Buffer.from(text, 'utf-8');
}

export function decodePayload(bytes: Buffer | Uint8Array | null | undefined): unknown {
    if (!bytes || bytes.length === 0) return undefined;

    const text = Buffer.from(bytes).toString('utf-8');
    if (text.trim() === '') return undefined;

    try {
        return JSON.parse(text);
    } catch (err) {
        throw new PayloadError(`Failed to decode payload: ${err instanceof Error ? err.message : String(err)}`);
    }
}
