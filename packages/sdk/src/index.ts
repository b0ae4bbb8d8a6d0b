// public api for @supplybook/sdk
// usage:
//   import { parseBookingRequest, createBookingClient } from '@supplybook/sdk';
//   const client = createBookingClient('localhost:50051');
//   const { taskId } = await client.submitBooking(request);

export * from './types';
export {
    bookingRequestSchema,
    lineItemSchema,
    destinationHintSchema,
    parseBookingRequest,
    BookingRequestError,
} from './booking-request';
export type { BookingRequestInput } from './booking-request';
export {
    BOOKING_PROTO,
    HEALTH_PROTO,
    BOOKING_SERVICE,
    HEALTH_SERVICE,
    protoOptions,
    protoPath,
    loadPackageDefinition,
    lookupService,
    loadService,
} from './proto';
export { encodePayload, decodePayload, PayloadError } from './utils/payload';
export { createBookingClient } from './grpc-client';
export type { BookingClient } from './grpc-client';
