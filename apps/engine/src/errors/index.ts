export { StageRetryError } from './stage-retry.error';
export { IllegalTransitionError } from './illegal-transition.error';
export { InvalidTaskIdError } from './invalid-task-id.error';
