import fs from 'fs/promises';
import path from 'path';
import { shortId } from '../db/task.entity';

/** Label PDFs on local disk, written via a temp file and rename. */
export class LabelStore {
    constructor(private readonly dir: string) { }

    async save(taskId: string, data: Buffer): Promise<string> {
        await fs.mkdir(this.dir, { recursive: true });
        const target = path.join(this.dir, `labels-${shortId(taskId)}.pdf`);
        const temp = `${target}.${process.pid}.tmp`;
        await fs.writeFile(temp, data);
        await fs.rename(temp, target);
        return target;
    }
}
