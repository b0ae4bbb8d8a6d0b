const TAG = '[notify]';

/** Outbound messages to whoever asked for the booking. */
export interface Notifier {
    notifyText(recipient: string, text: string): Promise<void>;
    notifyFile(recipient: string, filePath: string, caption: string): Promise<void>;
}

export type Notification =
    | { kind: 'text'; text: string }
    | { kind: 'file'; filePath: string; caption: string };

/** Delivery is fire-and-forget: a failed notification is logged and never reaches the task. */
export class SafeNotifier {
    constructor(private readonly inner: Notifier) { }

    async deliver(recipient: string, notification: Notification): Promise<void> {
        try {
            if (notification.kind === 'text') {
                await this.inner.notifyText(recipient, notification.text);
            } else {
                await this.inner.notifyFile(recipient, notification.filePath, notification.caption);
            }
        } catch (err) {
            console.error(`${TAG} delivery to ${recipient} failed:`, err);
        }
    }
}

/** Writes notifications to the log; used when no front end is attached. */
export class ConsoleNotifier implements Notifier {
    async notifyText(recipient: string, text: string): Promise<void> {
        console.log(`${TAG} -> ${recipient}: ${text}`);
    }

    async notifyFile(recipient: string, filePath: string, caption: string): Promise<void> {
        console.log(`${TAG} -> ${recipient}: ${caption} [${filePath}]`);
    }
}
