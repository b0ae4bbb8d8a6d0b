export type StrategyPreference = 'direct' | 'crossdock';

export interface LineItemRequest {
    productId: string;
    quantity: number;
    boxes?: number;
}

export interface DestinationHint {
    warehouseName?: string;
    warehouseId?: number;
    dropOffWarehouseId?: number;
    strategyPreference?: StrategyPreference;
}

export interface BookingRequest {
    lineItems: LineItemRequest[];
    windowStart: string;
    windowEnd: string;
    destinationHint?: DestinationHint;
    recipient: string;
}

export interface SubmittedBooking {
    taskId: string;
    shortId: string;
}

export interface TaskSummary {
    taskId: string;
    shortId: string;
    status: string;
    lastError: string;
    nextAttemptAt: number;
}

export interface TaskSnapshot {
    status: string;
    task: Record<string, unknown>;
}

export interface PurgeOptions {
    olderThanDays?: number;
    all?: boolean;
}
