import fs from 'fs';
import { z } from 'zod';
import defaultCatalog from '../../config/draft-strategies.json';
import { DraftStrategy, LineItemRecord, SupplyKind, draftStrategySchema } from '../db/task.entity';
import { toRemoteId } from '../utils/json';

const catalogSchema = z.array(draftStrategySchema).min(1);

export interface DraftItem {
    sku: string | number;
    quantity: number;
}

export interface StrategyHints {
    preference: SupplyKind | null;
    dropOffWarehouseId: number | null;
}

/** Loads the candidate payload shapes; the bundled catalog unless a file is given. */
export function loadStrategyCatalog(file: string | null = null): DraftStrategy[] {
    const raw: unknown = file ? JSON.parse(fs.readFileSync(file, 'utf-8')) : defaultCatalog;
    const result = catalogSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new Error(
            `invalid draft strategy catalog${file ? ` ${file}` : ''}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown'}`,
        );
    }
    return result.data;
}

/**
 * Orders the catalog for one task. With a drop-off point every crossdock
 * shape gets a `_drop` twin carrying it; a declared preference moves that
 * kind to the front, keeping catalog order inside each group.
 */
export function planStrategies(catalog: DraftStrategy[], hints: StrategyHints): DraftStrategy[] {
    const planned: DraftStrategy[] = [];
    const seen = new Set<string>();
    const add = (strategy: DraftStrategy) => {
        if (seen.has(strategy.name)) return;
        seen.add(strategy.name);
        planned.push(strategy);
    };

    for (const strategy of catalog) {
        if (strategy.useDropOff && hints.dropOffWarehouseId === null) continue;
        add(strategy);
    }
    if (hints.dropOffWarehouseId !== null) {
        for (const strategy of catalog) {
            if (strategy.kind === 'crossdock' && !strategy.useDropOff) {
                add({ ...strategy, name: `${strategy.name}_drop`, useDropOff: true });
            }
        }
    }

    if (!hints.preference) return planned;
    const preferred = planned.filter(s => s.kind === hints.preference);
    const rest = planned.filter(s => s.kind !== hints.preference);
    return [...preferred, ...rest];
}

export function buildDraftItems(lineItems: LineItemRecord[]): DraftItem[] {
    return lineItems
        .filter(item => Number.isInteger(item.quantity) && item.quantity > 0)
        .map(item => ({ sku: toRemoteId(item.product_id), quantity: item.quantity }));
}

export function buildDraftPayload(
    strategy: DraftStrategy,
    items: DraftItem[],
    dropOffWarehouseId: number | null,
): Record<string, unknown> {
    const payload: Record<string, unknown> = { items, ...strategy.fields };
    if (strategy.useDropOff && dropOffWarehouseId !== null) {
        payload.drop_off_point_warehouse_id = dropOffWarehouseId;
    }
    return payload;
}
