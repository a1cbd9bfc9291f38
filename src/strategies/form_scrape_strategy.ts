import { HttpTransport, RawResponse } from '../transport/http_transport';
import { PortalError, UpstreamError, errorMessage } from '../engine/errors';
import { Operation, SearchQuery } from '../types/portal_types';
import { extractItems, holdsEmptyList } from '../utils/normalization';
import { createLogger } from '../utils/logger';
import { Strategy, ProbeResult, RawPayload, buildSearchForm, failed, found } from './strategy';
import {
    extractCaseTable,
    extractScriptStates,
    extractSelectOptions,
    isCaptchaPage,
    isNoRecordsPage,
} from './html_extract';

const log = createLogger('FormScrape');

const STATE_PAGES = ['/advance-case-search', '/case-search', '/search'];
const COMMISSION_PAGE = '/advance-case-search';
const COMMISSION_AJAX = '/ajax/getCommissions';
const SEARCH_ENDPOINTS = ['/advance-case-search-result', '/advance-search', '/case-search', '/search-cases'];

const STATE_SELECT = /state/i;
const COMMISSION_SELECT = /commission|dist/i;

export interface FormScrapeOptions {
    commissionType: string;
}

/** Outcome of one page: a payload, a definitive "nothing", or no usable structure. */
type PageOutcome =
    | { kind: 'payload'; payload: RawPayload }
    | { kind: 'empty' }
    | { kind: 'unstructured' }
    // JSON that carries no record list, e.g. an error envelope.
    | { kind: 'unusable' };

/**
 * Tier 2: the portal's server-rendered pages, fetched through the shared
 * transport and read with cheerio.
 */
export class FormScrapeStrategy implements Strategy {
    public readonly name = 'FormScrape';
    public readonly kind = 'FORM_SCRAPE';

    constructor(private readonly transport: HttpTransport, private readonly options: FormScrapeOptions) {}

    public async probe(operation: Operation): Promise<ProbeResult> {
        switch (operation.kind) {
            case 'listStates':
                return this.run(STATE_PAGES.map((path) => ({
                    target: `GET ${path}`,
                    fetch: () => this.transport.get(path),
                    read: readStates,
                })));
            case 'listCommissions': {
                const { stateId } = operation;
                return this.run([
                    {
                        target: `GET ${COMMISSION_PAGE}`,
                        fetch: () => this.transport.get(COMMISSION_PAGE, { state_id: stateId }),
                        read: readCommissions,
                    },
                    {
                        target: `POST ${COMMISSION_AJAX}`,
                        fetch: () => this.transport.postForm(COMMISSION_AJAX, { state_id: stateId, state: stateId }),
                        read: readCommissions,
                    },
                ]);
            }
            case 'searchCases':
                return this.run(this.searchSteps(operation.query));
        }
    }

    private searchSteps(query: SearchQuery): PageStep[] {
        const form = buildSearchForm(query, this.options.commissionType);
        return SEARCH_ENDPOINTS.map((path) => ({
            target: `POST ${path}`,
            fetch: () => this.transport.postForm(path, form),
            read: readCases,
        }));
    }

    /**
     * Walks the pages in order. A payload wins at once and a "no records"
     * page ends the walk as EMPTY. CAPTCHA pages and failed requests (JSON
     * without a record list included) count towards UNREACHABLE; pages
     * without the expected structure towards EMPTY.
     */
    private async run(steps: PageStep[]): Promise<ProbeResult> {
        const errors: PortalError[] = [];
        let challenged = 0;
        let unstructured = 0;

        for (const step of steps) {
            let response: RawResponse;
            try {
                response = await step.fetch();
            } catch (error) {
                if (!(error instanceof PortalError)) throw error;
                log.debug(`${step.target} failed: ${errorMessage(error)}`);
                errors.push(error);
                continue;
            }

            const outcome = step.read(response, step.target);
            if (outcome.kind === 'payload') {
                log.info(`${step.target} yielded a ${outcome.payload.kind} payload`);
                return found(outcome.payload);
            }
            if (outcome.kind === 'empty') {
                return failed('EMPTY', `${step.target} reported no records`);
            }
            if (outcome.kind === 'unusable') {
                log.debug(`${step.target} answered JSON without a record list`);
                errors.push(new UpstreamError(step.target, response.status, 'no record list in answer'));
                continue;
            }
            if (isCaptchaPage(response.body)) {
                log.warn(`${step.target} answered with a CAPTCHA challenge`);
                challenged++;
                continue;
            }
            unstructured++;
        }

        if (unstructured > 0) {
            return failed('EMPTY', `no matching structure on ${unstructured} page(s)`);
        }

        const refusedOnly = errors.every((e) => e instanceof UpstreamError && e.refused);
        const blocked = (challenged > 0 || errors.length > 0) && refusedOnly;
        const detail = challenged > 0
            ? `${challenged} CAPTCHA page(s), ${errors.length} failed request(s)`
            : `all ${steps.length} request(s) failed`;
        return failed('UNREACHABLE', detail, blocked);
    }
}

interface PageStep {
    target: string;
    fetch: () => Promise<RawResponse>;
    read: (response: RawResponse, source: string) => PageOutcome;
}

function readJson(response: RawResponse): unknown {
    const text = response.body.trim();
    if (!response.contentType.includes('json') && !text.startsWith('{') && !text.startsWith('[')) return undefined;
    try {
        return JSON.parse(text);
    } catch (error) {
        log.debug(`Unparseable JSON from ${response.url}: ${errorMessage(error)}`);
        return undefined;
    }
}

function readJsonList(response: RawResponse, source: string): PageOutcome | undefined {
    const data = readJson(response);
    if (data === undefined) return undefined;
    const items = extractItems(data);
    if (items && items.length > 0) return { kind: 'payload', payload: { kind: 'json', source, data } };
    return holdsEmptyList(data) ? { kind: 'empty' } : { kind: 'unusable' };
}

function readStates(response: RawResponse, source: string): PageOutcome {
    const options = extractSelectOptions(response.body, STATE_SELECT, true);
    if (options && options.length > 0) return { kind: 'payload', payload: { kind: 'options', source, options } };

    const embedded = extractScriptStates(response.body);
    if (embedded) return { kind: 'payload', payload: { kind: 'json', source: `${source} (script)`, data: embedded } };

    return { kind: 'unstructured' };
}

function readCommissions(response: RawResponse, source: string): PageOutcome {
    const json = readJsonList(response, source);
    if (json) return json;

    // The search page often renders the commission select empty until a state is picked.
    const options = extractSelectOptions(response.body, COMMISSION_SELECT);
    if (!options || options.length === 0) return { kind: 'unstructured' };
    return { kind: 'payload', payload: { kind: 'options', source, options } };
}

function readCases(response: RawResponse, source: string): PageOutcome {
    const json = readJsonList(response, source);
    if (json) return json;

    const rows = extractCaseTable(response.body);
    if (rows) return { kind: 'payload', payload: { kind: 'table', source, rows } };

    return isNoRecordsPage(response.body) ? { kind: 'empty' } : { kind: 'unstructured' };
}
