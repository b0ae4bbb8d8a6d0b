import { RemoteConfig } from '../config';
import { calculateBackOff } from '../utils/backoff';
import { errorMessage } from '../utils/json';

const TAG = '[remote]';

export type HttpMethod = 'GET' | 'POST';

/** Status 0 stands for a transport failure: no HTTP response was received. */
export interface RemoteResponse {
    ok: boolean;
    status: number;
    body: unknown;
    rawText: string;
    headers: Record<string, string>;
}

export interface RemoteFileResponse {
    ok: boolean;
    status: number;
    data: Buffer;
    headers: Record<string, string>;
}

export interface RemoteCallOptions {
    /** Transport-level retries on 5xx and transport failures. On unless set to false. */
    autoRetry?: boolean;
}

export interface RemoteClient {
    call(method: HttpMethod, path: string, body?: unknown, options?: RemoteCallOptions): Promise<RemoteResponse>;
    fetchFile(path: string): Promise<RemoteFileResponse>;
}

export type SleepFn = (ms: number) => Promise<void>;

const defaultSleep: SleepFn = ms => new Promise(resolve => setTimeout(resolve, ms));

function headerRecord(headers: Headers): Record<string, string> {
    const out: Record<string, string> = {};
    headers.forEach((value, key) => {
        out[key.toLowerCase()] = value;
    });
    return out;
}

function parseBody(text: string): unknown {
    if (text.trim() === '') return null;
    try {
        return JSON.parse(text);
    } catch {
        return null;
    }
}

function isRetryable(status: number): boolean {
    return status === 0 || status >= 500;
}

export class HttpRemoteClient implements RemoteClient {
    constructor(
        private readonly config: RemoteConfig,
        private readonly sleep: SleepFn = defaultSleep,
    ) { }

    async call(method: HttpMethod, path: string, body?: unknown, options: RemoteCallOptions = {}): Promise<RemoteResponse> {
        const attempts = options.autoRetry === false ? 1 : this.config.transportRetries + 1;

        let response = await this.send(method, path, body);
        for (let attempt = 1; attempt < attempts && isRetryable(response.status); attempt++) {
            const delay = calculateBackOff(attempt, 500, 2, 5000);
            console.warn(`${TAG} ${method} ${path} -> ${response.status}, transport retry ${attempt} in ${delay}ms`);
            await this.sleep(delay);
            response = await this.send(method, path, body);
        }
        return response;
    }

    async fetchFile(path: string): Promise<RemoteFileResponse> {
        try {
            const res = await fetch(this.url(path), {
                method: 'GET',
                headers: this.headers(),
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });
            const data = Buffer.from(await res.arrayBuffer());
            return { ok: res.ok, status: res.status, data, headers: headerRecord(res.headers) };
        } catch (err) {
            console.error(`${TAG} GET ${path} transport error: ${errorMessage(err)}`);
            return { ok: false, status: 0, data: Buffer.alloc(0), headers: {} };
        }
    }

    private async send(method: HttpMethod, path: string, body: unknown): Promise<RemoteResponse> {
        try {
            const res = await fetch(this.url(path), {
                method,
                headers: { ...this.headers(), 'Content-Type': 'application/json' },
                body: method === 'GET' ? undefined : JSON.stringify(body ?? {}),
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });
            const rawText = await res.text();
            return {
                ok: res.ok,
                status: res.status,
                body: parseBody(rawText),
                rawText,
                headers: headerRecord(res.headers),
            };
        } catch (err) {
            const message = errorMessage(err);
            console.error(`${TAG} ${method} ${path} transport error: ${message}`);
            return { ok: false, status: 0, body: null, rawText: message, headers: {} };
        }
    }

    private url(path: string): string {
        return `${this.config.baseUrl.replace(/\/+$/, '')}${path}`;
    }

    private headers(): Record<string, string> {
        return {
            'Client-Id': this.config.clientId,
            'Api-Key': this.config.apiKey,
        };
    }
}
