import { Env } from '../config/env';
import { CacheService } from '../services/cache_service';
import { BrowserService, PageProvider } from '../services/browser_service';
import { FetchLike, HttpTransport } from '../transport/http_transport';
import { DirectApiStrategy } from '../strategies/direct_api_strategy';
import { FormScrapeStrategy } from '../strategies/form_scrape_strategy';
import { BrowserAutomationStrategy } from '../strategies/browser_automation_strategy';
import { Strategy } from '../strategies/strategy';
import { Catalog } from './catalog';
import { FallbackChain } from './fallback_chain';
import { Normalizer } from './normalizer';
import { RequestValidationError, ValidationIssue } from './errors';
import {
    CaseRecord,
    Commission,
    ListCommissionsOperation,
    ListStatesOperation,
    NamedSearchRequest,
    SearchCasesOperation,
    SearchQuery,
    State,
    isCaseRecord,
    isRecord,
    listOf,
} from '../types/portal_types';
import { createLogger } from '../utils/logger';

const log = createLogger('PortalEngine');

export interface SearchOutcome {
    cases: readonly CaseRecord[];
    /** Tier that answered; undefined when the portal reported no records. */
    source?: string;
    cached: boolean;
}

interface CachedSearch {
    cases: readonly CaseRecord[];
    source?: string;
}

const isCaseList = listOf(isCaseRecord);

function isCachedSearch(value: unknown): value is CachedSearch {
    return isRecord(value)
        && isCaseList(value.cases)
        && (value.source === undefined || typeof value.source === 'string');
}

export function searchCacheKey(query: SearchQuery): string {
    return JSON.stringify([
        query.searchType,
        query.stateId,
        query.commissionId,
        query.caseType,
        query.searchValue.trim().toUpperCase(),
        query.dateRange ? [query.dateRange.basis, query.dateRange.from, query.dateRange.to] : null,
    ]);
}

function validateQuery(query: SearchQuery) {
    const issues: ValidationIssue[] = [];
    if (!query.searchValue.trim()) issues.push({ field: 'searchValue', message: 'must not be empty' });
    if (query.dateRange && query.dateRange.from > query.dateRange.to) {
        issues.push({ field: 'dateRange', message: 'from must not be after to' });
    }
    if (issues.length > 0) throw new RequestValidationError(issues);
}

export interface PortalEngineParts {
    transport: HttpTransport;
    cache: CacheService;
    catalog: Catalog;
    searchChain: FallbackChain<SearchCasesOperation, CaseRecord>;
    pages?: PageProvider;
}

/**
 * Entry point for callers: catalog lookups and case searches over one
 * shared transport, cache and set of fallback chains.
 */
export class PortalEngine {
    private readonly transport: HttpTransport;
    private readonly cache: CacheService;
    private readonly catalog: Catalog;
    private readonly searchChain: FallbackChain<SearchCasesOperation, CaseRecord>;
    private readonly pages?: PageProvider;

    constructor(parts: PortalEngineParts) {
        this.transport = parts.transport;
        this.cache = parts.cache;
        this.catalog = parts.catalog;
        this.searchChain = parts.searchChain;
        this.pages = parts.pages;
    }

    listStates(): Promise<readonly State[]> {
        return this.catalog.listStates();
    }

    listCommissions(stateId: string): Promise<readonly Commission[]> {
        return this.catalog.listCommissions(stateId);
    }

    resolveState(name: string): Promise<State> {
        return this.catalog.resolveState(name);
    }

    resolveCommission(stateId: string, name: string): Promise<Commission> {
        return this.catalog.resolveCommission(stateId, name);
    }

    async search(query: SearchQuery): Promise<SearchOutcome> {
        validateQuery(query);
        const key = searchCacheKey(query);

        const cached = this.cache.get('cases', key, isCachedSearch);
        if (cached) {
            log.debug(`Search cache hit (${cached.cases.length} case(s))`);
            return { ...cached, cached: true };
        }

        const result = await this.searchChain.run({ kind: 'searchCases', query });
        const entry: CachedSearch = { cases: result.records, source: result.source };
        if (result.records.length > 0) {
            this.cache.set('cases', key, entry);
        }
        return { ...entry, cached: false };
    }

    async searchCases(query: SearchQuery): Promise<readonly CaseRecord[]> {
        const outcome = await this.search(query);
        return outcome.cases;
    }

    /** Resolves the state and commission names, then searches. */
    async searchByNames(request: NamedSearchRequest): Promise<SearchOutcome & { query: SearchQuery }> {
        const state = await this.resolveState(request.state);
        const commission = await this.resolveCommission(state.id, request.commission);

        const query: SearchQuery = {
            searchType: request.searchType,
            stateId: state.id,
            commissionId: commission.id,
            searchValue: request.searchValue.trim(),
            caseType: request.caseType ?? 'DAILY_ORDER',
        };
        if (request.dateRange) query.dateRange = request.dateRange;

        const outcome = await this.search(query);
        return { ...outcome, query };
    }

    async close() {
        await this.transport.close();
        if (this.pages) await this.pages.close();
    }
}

export interface EngineOverrides {
    fetch?: FetchLike;
    sleep?: (ms: number) => Promise<void>;
    pages?: PageProvider;
}

/** Wires an engine from validated configuration. */
export function createPortalEngine(config: Env, overrides: EngineOverrides = {}): PortalEngine {
    const transport = new HttpTransport({
        baseUrl: config.PORTAL_BASE_URL,
        timeoutMs: config.REQUEST_TIMEOUT_MS,
        maxRetries: config.MAX_RETRIES,
        backoffBaseMs: config.BACKOFF_BASE_MS,
        minIntervalMs: config.MIN_REQUEST_INTERVAL_MS,
        rateLimitCooldownMs: config.RATE_LIMIT_COOLDOWN_MS,
        fetch: overrides.fetch,
        sleep: overrides.sleep,
    });
    const cache = new CacheService({
        ttlSeconds: {
            states: config.CACHE_TTL_STATES_S,
            commissions: config.CACHE_TTL_COMMISSIONS_S,
            cases: config.CACHE_TTL_SEARCH_S,
        },
    });
    const normalizer = new Normalizer(transport.baseUrl);
    const commissionType = config.PORTAL_COMMISSION_TYPE;

    const strategies: Strategy[] = [
        new DirectApiStrategy(transport, { commissionType }),
        new FormScrapeStrategy(transport, { commissionType }),
    ];

    let pages = overrides.pages;
    if (config.BROWSER_ENABLED) {
        pages ??= new BrowserService({ headless: config.BROWSER_HEADLESS, timeoutMs: config.BROWSER_TIMEOUT_MS });
        strategies.push(new BrowserAutomationStrategy(pages, {
            baseUrl: transport.baseUrl,
            commissionType,
            timeoutMs: config.BROWSER_TIMEOUT_MS,
        }));
    }

    const catalog = new Catalog(
        cache,
        new FallbackChain<ListStatesOperation, State>('states', strategies, (payload) => normalizer.states(payload)),
        new FallbackChain<ListCommissionsOperation, Commission>(
            'commissions',
            strategies,
            (payload, op) => normalizer.commissions(payload, op.stateId)
        ),
        { suggestionLimit: config.SUGGESTION_LIMIT }
    );
    const searchChain = new FallbackChain<SearchCasesOperation, CaseRecord>(
        'cases',
        strategies,
        (payload) => normalizer.cases(payload)
    );

    log.info(`Engine ready: ${strategies.map((s) => s.name).join(' -> ')} against ${transport.baseUrl}`);
    return new PortalEngine({ transport, cache, catalog, searchChain, pages });
}
