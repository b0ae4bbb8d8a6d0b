import { EngineConfig } from '../config';
import { TaskRecord } from '../db/task.entity';
import { FulfillmentApi } from '../remote/fulfillment-api';
import { LabelStore } from '../services/label-store';
import { RateGovernor } from '../services/rate-governor';
import { DraftNegotiator } from './draft-negotiator';
import { OperationPoller } from './operation-poller';
import { TimeslotResolver } from './timeslot-resolver';

export interface StageServices {
    api: FulfillmentApi;
    governor: RateGovernor;
    negotiator: DraftNegotiator;
    poller: OperationPoller;
    resolver: TimeslotResolver;
    labels: LabelStore;
    config: EngineConfig;
}

/**
 * What a handler sees for one run. Notifications are queued and only sent
 * once the run's result has been stored.
 */
export interface StageContext extends StageServices {
    now: number;
    notify(text: string): void;
    notifyFile(filePath: string, caption: string): void;
}

/** Advances a task by at most one stage, mutating it in place. */
export type StageHandler = (task: TaskRecord, ctx: StageContext) => Promise<void>;
