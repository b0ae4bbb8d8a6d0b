import { z } from 'zod';
import { BookingRequest } from './types';

const productIdSchema = z
    .union([z.string().trim().min(1), z.number().int().positive()])
    .transform(value => String(value));

export const lineItemSchema = z
    .object({
        productId: productIdSchema,
        quantity: z.number().int().positive(),
        boxes: z.number().int().positive().optional(),
    })
    .refine(item => item.boxes === undefined || item.quantity % item.boxes === 0, {
        message: 'quantity must split evenly into boxes',
        path: ['boxes'],
    });

export const destinationHintSchema = z.object({
    warehouseName: z.string().trim().min(1).optional(),
    warehouseId: z.number().int().positive().optional(),
    dropOffWarehouseId: z.number().int().positive().optional(),
    strategyPreference: z.enum(['direct', 'crossdock']).optional(),
});

export const bookingRequestSchema = z
    .object({
        lineItems: z.array(lineItemSchema).min(1),
        windowStart: z.string().datetime({ offset: true }),
        windowEnd: z.string().datetime({ offset: true }),
        destinationHint: destinationHintSchema.optional(),
        recipient: z.union([z.string().trim().min(1), z.number().int()]).transform(value => String(value)),
    })
    .refine(request => Date.parse(request.windowEnd) > Date.parse(request.windowStart), {
        message: 'windowEnd must be after windowStart',
        path: ['windowEnd'],
    });

export type BookingRequestInput = z.input<typeof bookingRequestSchema>;

export class BookingRequestError extends Error {
    constructor(public readonly issues: string[]) {
        super(`invalid booking request: ${issues.join('; ')}`);
        this.name = 'BookingRequestError';
    }
}

export function parseBookingRequest(input: unknown): BookingRequest {
    const result = bookingRequestSchema.safeParse(input);
    if (!result.success) {
        throw new BookingRequestError(
            result.error.issues.map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`),
        );
    }
    return result.data;
}
