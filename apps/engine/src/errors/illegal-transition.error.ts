import { taskStatus } from '../db/task.entity';

export class IllegalTransitionError extends Error {
    constructor(
        public readonly taskId: string,
        public readonly from: taskStatus,
        public readonly to: taskStatus,
    ) {
        super(`task ${taskId}: transition ${from} -> ${to} is not allowed`);
        this.name = 'IllegalTransitionError';
    }
}
