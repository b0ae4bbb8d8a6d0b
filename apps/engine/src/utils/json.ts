export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asArray(value: unknown): unknown[] {
    return Array.isArray(value) ? value : [];
}

export function records(value: unknown): JsonRecord[] {
    return asArray(value).filter(isRecord);
}

/** Follows a key path through nested objects; undefined when any hop is missing. */
export function dig(value: unknown, ...path: string[]): unknown {
    let node = value;
    for (const key of path) {
        if (!isRecord(node)) return undefined;
        node = node[key];
    }
    return node;
}

/** Strings and finite numbers as a string id; anything else is null. */
export function idString(value: unknown): string | null {
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return null;
}

/**
 * Remote responses carry fields either at the top level or under `result`.
 * Returns the first id found for any key in either scope.
 */
export function pickId(body: unknown, ...keys: string[]): string | null {
    for (const scope of [body, dig(body, 'result')]) {
        if (!isRecord(scope)) continue;
        for (const key of keys) {
            const id = idString(scope[key]);
            if (id) return id;
        }
    }
    return null;
}

export function pickValue(body: unknown, key: string): unknown {
    const top = dig(body, key);
    return top !== undefined ? top : dig(body, 'result', key);
}

/** Digit-only ids go out as numbers, everything else as given. */
export function toRemoteId(id: string): string | number {
    return /^\d{1,15}$/.test(id) ? Number(id) : id;
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
