export class InvalidTaskIdError extends Error {
    constructor(public readonly taskId: string) {
        super(`invalid task id: ${taskId}`);
        this.name = 'InvalidTaskIdError';
    }
}
