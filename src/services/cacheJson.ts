import { CacheEntryOptions, DistributedCache } from '../types';

export type TypeGuard<T> = (value: unknown) => value is T;

export function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Reads a JSON value from the cache. Returns undefined on a miss and for
 * entries that do not parse or fail the guard.
 */
export async function tryGetAsJson<T>(
    cache: DistributedCache,
    key: string,
    guard: TypeGuard<T>
): Promise<T | undefined> {
    const raw = await cache.get(key);
    if (raw === undefined) {
        return undefined;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return undefined;
    }
    return guard(parsed) ? parsed : undefined;
}

export async function setAsJson<T>(
    cache: DistributedCache,
    key: string,
    value: T,
    options: CacheEntryOptions
): Promise<void> {
    await cache.set(key, JSON.stringify(value), options);
}
