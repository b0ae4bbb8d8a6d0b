import { ServerUnaryCall, ServerWritableStream, sendUnaryData } from '@grpc/grpc-js';

type ServingStatus = 'SERVING' | 'NOT_SERVING';

interface HealthCheckRequest {
    service: string;
}

interface HealthCheckResponse {
    status: ServingStatus;
}

/** A dependency check; rejects when the dependency is unusable. */
export type HealthProbe = () => Promise<unknown>;

/**
 * Standard gRPC health check service.
 * Serving only while every probe (task store, Redis when configured) answers.
 */
export class HealthService {
    constructor(private readonly probes: HealthProbe[]) { }

    async status(): Promise<ServingStatus> {
        try {
            await Promise.all(this.probes.map(probe => probe()));
            return 'SERVING';
        } catch (error) {
            console.error('[health] check failed:', error);
            return 'NOT_SERVING';
        }
    }

    async check(
        call: Pick<ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>, 'request'>,
        callback: sendUnaryData<HealthCheckResponse>,
    ) {
        callback(null, { status: await this.status() });
    }

    async watch(call: ServerWritableStream<HealthCheckRequest, HealthCheckResponse>) {
        call.write({ status: await this.status() });
        call.end();
    }
}
