import { dig, idString, isRecord, pickValue, records } from '../utils/json';

export interface OfferedSlot {
    slotId: string | null;
    from: string;
    to: string;
    fromAt: number;
    toAt: number;
    available: boolean;
    dropOffWarehouseId: string | null;
}

export interface SlotChoice {
    slotId: string | null;
    from: string;
    to: string;
    exact: boolean;
    dropOffWarehouseId: string | null;
}

export interface DesiredWindow {
    startAt: number;
    endAt: number;
}

function firstText(entry: Record<string, unknown>, keys: string[]): string | null {
    for (const key of keys) {
        const value = entry[key];
        if (typeof value === 'string' && value.trim() !== '') return value.trim();
    }
    return null;
}

function firstId(entry: Record<string, unknown>, keys: string[]): string | null {
    for (const key of keys) {
        const id = idString(entry[key]);
        if (id) return id;
    }
    return null;
}

function toSlot(entry: Record<string, unknown>, dropOffWarehouseId: string | null): OfferedSlot | null {
    const from = firstText(entry, ['from_in_timezone', 'from', 'from_utc']);
    const to = firstText(entry, ['to_in_timezone', 'to', 'to_utc']);
    if (!from || !to) return null;

    const fromAt = Date.parse(from);
    const toAt = Date.parse(to);
    if (Number.isNaN(fromAt) || Number.isNaN(toAt)) return null;

    return {
        slotId: firstId(entry, ['id', 'slot_id', 'value_id', 'timeslot_id']),
        from,
        to,
        fromAt,
        toAt,
        available: entry.is_available !== false && entry.available !== false,
        dropOffWarehouseId,
    };
}

/**
 * Offered slots arrive either as a flat `timeslots` list or grouped as
 * `drop_off_warehouse_timeslots[].days[].timeslots[]`. Both end up here in offered order.
 */
export function normalizeOfferedSlots(body: unknown): OfferedSlot[] {
    const out: OfferedSlot[] = [];

    for (const entry of records(pickValue(body, 'timeslots'))) {
        const slot = toSlot(entry, null);
        if (slot) out.push(slot);
    }

    for (const group of records(pickValue(body, 'drop_off_warehouse_timeslots'))) {
        const dropOff = idString(group.drop_off_warehouse_id);
        for (const day of records(group.days)) {
            for (const entry of records(day.timeslots)) {
                const slot = toSlot(entry, dropOff);
                if (slot) out.push(slot);
            }
        }
    }

    // some responses nest a single group object instead of a list
    const single = dig(body, 'result', 'drop_off_warehouse_timeslot');
    if (isRecord(single)) {
        out.push(...normalizeOfferedSlots({ drop_off_warehouse_timeslots: [single] }));
    }

    return out;
}

export class TimeslotResolver {
    constructor(private readonly allowFallback: boolean = true) { }

    /** Exact start/end match first; otherwise the first available slot, if fallback is on. */
    resolve(slots: OfferedSlot[], desired: DesiredWindow): SlotChoice | null {
        const exact = slots.find(s => s.available && s.fromAt === desired.startAt && s.toAt === desired.endAt);
        if (exact) return this.choice(exact, true);

        if (!this.allowFallback) return null;

        const first = slots.find(s => s.available);
        return first ? this.choice(first, false) : null;
    }

    private choice(slot: OfferedSlot, exact: boolean): SlotChoice {
        return {
            slotId: slot.slotId,
            from: slot.from,
            to: slot.to,
            exact,
            dropOffWarehouseId: slot.dropOffWarehouseId,
        };
    }
}
