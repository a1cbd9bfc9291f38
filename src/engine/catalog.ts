import { CacheService } from '../services/cache_service';
import { FallbackChain } from './fallback_chain';
import { CommissionNotFoundError, StateNotFoundError } from './errors';
import {
    Commission,
    ListCommissionsOperation,
    ListStatesOperation,
    State,
    isCommission,
    isState,
    listOf,
} from '../types/portal_types';
import { cleanText } from '../utils/normalization';
import { createLogger } from '../utils/logger';

const log = createLogger('Catalog');

const isStateList = listOf(isState);
const isCommissionList = listOf(isCommission);

const STATES_KEY = 'all';

export interface CatalogOptions {
    /** Upper bound on the names a NotFound error carries. */
    suggestionLimit: number;
}

/**
 * First match by precedence: each matcher is tried over the whole list
 * before the next one, so ties go to insertion order.
 */
function findByPrecedence<T>(items: readonly T[], matchers: Array<(item: T) => boolean>): T | undefined {
    for (const matches of matchers) {
        const hit = items.find(matches);
        if (hit) return hit;
    }
    return undefined;
}

const fold = (value: string) => cleanText(value).toUpperCase();

const contains = (a: string, b: string) => a.includes(b) || b.includes(a);

/**
 * The state -> commission hierarchy, loaded lazily through the fallback
 * chains and held in the cache. Snapshots are only cached when non-empty.
 */
export class Catalog {
    private inflight: Map<string, Promise<readonly unknown[]>> = new Map();

    constructor(
        private readonly cache: CacheService,
        private readonly stateChain: FallbackChain<ListStatesOperation, State>,
        private readonly commissionChain: FallbackChain<ListCommissionsOperation, Commission>,
        private readonly options: CatalogOptions
    ) {}

    async listStates(): Promise<readonly State[]> {
        const cached = this.cache.get('states', STATES_KEY, isStateList);
        if (cached) return cached;

        return this.load('states', STATES_KEY, isStateList, async () => {
            const result = await this.stateChain.run({ kind: 'listStates' });
            return result.records;
        });
    }

    async listCommissions(stateId: string): Promise<readonly Commission[]> {
        const cached = this.cache.get('commissions', stateId, isCommissionList);
        if (cached) return cached;

        const states = await this.listStates();
        if (!states.some((s) => s.id === stateId)) {
            throw new StateNotFoundError(stateId, this.suggestions(states.map((s) => s.displayName)));
        }

        return this.load('commissions', stateId, isCommissionList, async () => {
            const result = await this.commissionChain.run({ kind: 'listCommissions', stateId });
            return result.records;
        });
    }

    async resolveState(name: string): Promise<State> {
        const states = await this.listStates();
        const wanted = fold(name);

        const match = wanted
            ? findByPrecedence(states, [
                (s) => fold(s.canonicalName) === wanted,
                (s) => fold(s.displayName) === wanted,
                (s) => contains(fold(s.canonicalName), wanted) || contains(fold(s.displayName), wanted),
            ])
            : undefined;

        if (!match) {
            throw new StateNotFoundError(name, this.suggestions(states.map((s) => s.displayName)));
        }
        log.debug(`Resolved state '${name}' -> ${match.id} (${match.displayName})`);
        return match;
    }

    async resolveCommission(stateId: string, name: string): Promise<Commission> {
        const commissions = await this.listCommissions(stateId);
        const wanted = fold(name);

        const match = wanted
            ? findByPrecedence(commissions, [
                (c) => fold(c.displayName) === wanted,
                (c) => contains(fold(c.displayName), wanted),
            ])
            : undefined;

        if (!match) {
            throw new CommissionNotFoundError(name, stateId, this.suggestions(commissions.map((c) => c.displayName)));
        }
        log.debug(`Resolved commission '${name}' -> ${match.id} (${match.displayName})`);
        return match;
    }

    private suggestions(names: string[]): string[] {
        return names.slice(0, this.options.suggestionLimit);
    }

    /** Concurrent misses on the same key share one chain run. */
    private async load<T>(
        namespace: 'states' | 'commissions',
        key: string,
        isValue: (value: unknown) => value is readonly T[],
        fetchRecords: () => Promise<T[]>
    ): Promise<readonly T[]> {
        const flightKey = `${namespace}:${key}`;
        const pending = this.inflight.get(flightKey);
        if (pending) {
            const shared = await pending;
            return isValue(shared) ? shared : [];
        }

        const task = (async (): Promise<readonly T[]> => {
            const records = await fetchRecords();
            if (records.length === 0) {
                log.warn(`No ${namespace} for '${key}'; not caching an empty snapshot`);
                return Object.freeze(records);
            }
            return this.cache.set(namespace, key, records).value;
        })();

        this.inflight.set(flightKey, task);
        try {
            return await task;
        } finally {
            this.inflight.delete(flightKey);
        }
    }
}
