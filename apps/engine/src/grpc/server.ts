import * as grpc from "@grpc/grpc-js";
import {
  BOOKING_PROTO,
  BOOKING_SERVICE,
  HEALTH_PROTO,
  HEALTH_SERVICE,
  loadService,
} from "@supplybook/sdk";
import { BookingService } from "../services/booking.service";
import { BookingGrpcService } from "./booking.service";
import { HealthProbe, HealthService } from "./health.service";

export function createGrpcServer(
  bookings: BookingService,
  probes: HealthProbe[],
): grpc.Server {
  const server = new grpc.Server({
    "grpc.max_receive_message_length": 4 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  const healthService = new HealthService(probes);
  server.addService(loadService(HEALTH_PROTO, HEALTH_SERVICE), {
    check: healthService.check.bind(healthService),
    watch: healthService.watch.bind(healthService),
  });

  const bookingService = new BookingGrpcService(bookings);
  server.addService(loadService(BOOKING_PROTO, BOOKING_SERVICE), {
    submitBooking: bookingService.submitBooking.bind(bookingService),
    getTask: bookingService.getTask.bind(bookingService),
    listTasks: bookingService.listTasks.bind(bookingService),
    cancelTask: bookingService.cancelTask.bind(bookingService),
    retryTask: bookingService.retryTask.bind(bookingService),
    deleteTask: bookingService.deleteTask.bind(bookingService),
    purgeTasks: bookingService.purgeTasks.bind(bookingService),
  });

  return server;
}

export function startGrpcServer(
  server: grpc.Server,
  port: number = 50051,
): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(
      `0.0.0.0:${port}`,
      grpc.ServerCredentials.createInsecure(),
      (err, boundPort) => {
        if (err) {
          reject(err);
        } else {
          console.log(`[supplybook] grpc server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
  return new Promise((resolve) => server.tryShutdown(() => resolve()));
}
