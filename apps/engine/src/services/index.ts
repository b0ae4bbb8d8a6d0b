export { BookingService } from './booking.service';
export { LabelStore } from './label-store';
export { LeaderElector } from './leaderelector';
export { ConsoleNotifier, SafeNotifier } from './notifier';
export type { Notification, Notifier } from './notifier';
export { RateGovernor } from './rate-governor';
export { RetentionReaper } from './reaper';
export { WorkerLoop } from './worker-loop';
export type { TickSummary, WorkerLoopConfig } from './worker-loop';
