import { taskStatus } from '../../db/task.entity';
import { StageHandler } from '../stage-context';
import { cargoCreating, cargoPrep, labelsCreating, pollingCargo, pollingLabels } from './cargo.handler';
import { draftCreating, pollingDraft, waitingWindow } from './draft.handler';
import { orderDataFilling, pollingSupply, supplyCreating } from './supply.handler';
import { timeslotSearch, timeslotSetting } from './timeslot.handler';

/** Stages a handler runs for; rate limiting and the terminal states are the runner's business. */
export type ActiveStage = Exclude<taskStatus, taskStatus.RATE_LIMITED | taskStatus.DONE | taskStatus.FAILED | taskStatus.CANCELED>;

export const STAGE_HANDLERS: Readonly<Record<ActiveStage, StageHandler>> = {
    [taskStatus.WAITING_WINDOW]: waitingWindow,
    [taskStatus.DRAFT_CREATING]: draftCreating,
    [taskStatus.POLLING_DRAFT]: pollingDraft,
    [taskStatus.TIMESLOT_SEARCH]: timeslotSearch,
    [taskStatus.TIMESLOT_SETTING]: timeslotSetting,
    [taskStatus.SUPPLY_CREATING]: supplyCreating,
    [taskStatus.POLLING_SUPPLY]: pollingSupply,
    [taskStatus.ORDER_DATA_FILLING]: orderDataFilling,
    [taskStatus.CARGO_PREP]: cargoPrep,
    [taskStatus.CARGO_CREATING]: cargoCreating,
    [taskStatus.POLLING_CARGO]: pollingCargo,
    [taskStatus.LABELS_CREATING]: labelsCreating,
    [taskStatus.POLLING_LABELS]: pollingLabels,
};

export function handlerFor(status: taskStatus): StageHandler | null {
    switch (status) {
        case taskStatus.RATE_LIMITED:
        case taskStatus.DONE:
        case taskStatus.FAILED:
        case taskStatus.CANCELED:
            return null;
        default:
            return STAGE_HANDLERS[status];
    }
}
