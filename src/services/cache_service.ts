export type CacheNamespace = 'states' | 'commissions' | 'cases';

export interface CacheEntry<T> {
    value: T;
    expiresAt: number;
}

export interface CacheOptions {
    /** TTL per namespace, in seconds. */
    ttlSeconds: Record<CacheNamespace, number>;
    now?: () => number;
}

export const DEFAULT_TTL_SECONDS: Record<CacheNamespace, number> = {
    states: 6 * 60 * 60,
    commissions: 60 * 60,
    cases: 5 * 60,
};

/**
 * In-memory TTL store keyed by (namespace, key). Values are frozen on write,
 * so a cached snapshot can be handed out without copying.
 */
export class CacheService {
    private entries: Map<string, CacheEntry<unknown>> = new Map();
    private readonly ttlSeconds: Record<CacheNamespace, number>;
    private readonly now: () => number;

    constructor(options: Partial<CacheOptions> = {}) {
        this.ttlSeconds = { ...DEFAULT_TTL_SECONDS, ...options.ttlSeconds };
        this.now = options.now ?? Date.now;
    }

    private static compose(namespace: CacheNamespace, key: string): string {
        return `${namespace}:${key}`;
    }

    /**
     * Returns the value while `now < expiresAt`. Expired entries are evicted
     * here, on access.
     */
    public get<T>(namespace: CacheNamespace, key: string, isValue: (value: unknown) => value is T): T | undefined {
        const cacheKey = CacheService.compose(namespace, key);
        const entry = this.entries.get(cacheKey);
        if (!entry) return undefined;

        if (this.now() >= entry.expiresAt) {
            this.entries.delete(cacheKey);
            return undefined;
        }

        return isValue(entry.value) ? entry.value : undefined;
    }

    public set<T>(namespace: CacheNamespace, key: string, value: T, ttlSeconds?: number): CacheEntry<T> {
        const ttl = ttlSeconds ?? this.ttlSeconds[namespace];
        const entry: CacheEntry<T> = {
            value: deepFreeze(value),
            expiresAt: this.now() + ttl * 1000,
        };
        this.entries.set(CacheService.compose(namespace, key), entry);
        return entry;
    }

    public delete(namespace: CacheNamespace, key: string): boolean {
        return this.entries.delete(CacheService.compose(namespace, key));
    }

    public clearNamespace(namespace: CacheNamespace): number {
        const prefix = `${namespace}:`;
        let removed = 0;
        for (const cacheKey of Array.from(this.entries.keys())) {
            if (cacheKey.startsWith(prefix)) {
                this.entries.delete(cacheKey);
                removed++;
            }
        }
        return removed;
    }

    public size(): number {
        return this.entries.size;
    }
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}
