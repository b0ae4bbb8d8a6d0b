import { DestinationRecord } from '../db/task.entity';
import { dig, idString, pickValue, records } from '../utils/json';

export interface WarehouseCandidate {
    warehouseId: string;
    name: string | null;
    bundleId: string | null;
    available: boolean;
}

function text(value: unknown): string | null {
    return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

function toCandidate(entry: Record<string, unknown>): WarehouseCandidate | null {
    const supply = dig(entry, 'supply_warehouse');
    const warehouseId = idString(dig(supply, 'warehouse_id')) ?? idString(entry.warehouse_id);
    if (!warehouseId) return null;

    const bundle = records(entry.bundle_ids)[0];
    return {
        warehouseId,
        name: text(dig(supply, 'name')) ?? text(entry.name),
        bundleId: idString(bundle?.bundle_id) ?? idString(entry.bundle_id),
        available: dig(entry, 'status', 'is_available') !== false && entry.is_available !== false,
    };
}

/** Flattens `clusters[].warehouses[]` (or a flat `warehouses[]`) from a draft info response. */
export function normalizeDraftWarehouses(body: unknown): WarehouseCandidate[] {
    const entries = [
        ...records(pickValue(body, 'clusters')).flatMap(cluster => records(cluster.warehouses)),
        ...records(pickValue(body, 'warehouses')),
    ];
    const seen = new Set<string>();
    const out: WarehouseCandidate[] = [];
    for (const entry of entries) {
        const candidate = toCandidate(entry);
        if (candidate && !seen.has(candidate.warehouseId)) {
            seen.add(candidate.warehouseId);
            out.push(candidate);
        }
    }
    return out;
}

const normalize = (name: string) => name.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, ' ').trim();

/**
 * Picks the draft's warehouse: the explicitly requested id, else a name match,
 * else the first available one, else the first offered.
 */
export function selectWarehouse(candidates: WarehouseCandidate[], hint: DestinationRecord): WarehouseCandidate | null {
    if (hint.warehouse_id !== undefined) {
        const wanted = String(hint.warehouse_id);
        const exact = candidates.find(c => c.warehouseId === wanted);
        if (exact) return exact;
    }

    const available = candidates.filter(c => c.available);
    if (hint.warehouse_name) {
        const wanted = normalize(hint.warehouse_name);
        const byName = (pool: WarehouseCandidate[]) =>
            pool.find(c => c.name !== null && normalize(c.name) === wanted) ??
            pool.find(c => c.name !== null && normalize(c.name).includes(wanted));
        const named = byName(available) ?? byName(candidates);
        if (named) return named;
    }

    return available[0] ?? candidates[0] ?? null;
}
