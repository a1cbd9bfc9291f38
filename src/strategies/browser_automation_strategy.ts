import { PageProvider, PortalPage } from '../services/browser_service';
import { errorMessage } from '../engine/errors';
import { Operation, SearchQuery } from '../types/portal_types';
import { createLogger } from '../utils/logger';
import { Strategy, ProbeResult, buildSearchForm, failed, found } from './strategy';
import {
    extractCaseTable,
    extractScriptStates,
    extractSelectOptions,
    isCaptchaPage,
    isNoRecordsPage,
} from './html_extract';

const log = createLogger('BrowserAutomation');

const SEARCH_PAGE = '/advance-case-search';
const STATE_FIELDS = ['state_code', 'state_id', 'state'];
const COMMISSION_LOADED = 'select[name*="dist" i] option:nth-of-type(2), select[name*="commission" i] option:nth-of-type(2)';
const RESULTS_LOADED = 'table tr td';

export interface BrowserAutomationOptions {
    baseUrl: string;
    commissionType: string;
    /** Bound on each wait for dynamic content. */
    timeoutMs: number;
}

/**
 * Tier 3: renders the search page in headless Chromium and reads the DOM
 * with the same heuristics as FormScrape. Any browser failure fails only
 * this tier.
 */
export class BrowserAutomationStrategy implements Strategy {
    public readonly name = 'BrowserAutomation';
    public readonly kind = 'BROWSER_AUTOMATION';

    constructor(private readonly pages: PageProvider, private readonly options: BrowserAutomationOptions) {}

    public async probe(operation: Operation): Promise<ProbeResult> {
        try {
            return await this.pages.withPage(async (page) => {
                await page.open(new URL(SEARCH_PAGE, `${this.options.baseUrl}/`).toString());
                if (!(await page.waitFor('select', this.options.timeoutMs))) {
                    return this.missing(page, 'search form never rendered');
                }

                switch (operation.kind) {
                    case 'listStates':
                        return this.readStates(page);
                    case 'listCommissions':
                        return this.readCommissions(page, operation.stateId);
                    case 'searchCases':
                        return this.search(page, operation.query);
                }
            });
        } catch (error) {
            log.warn(`Browser probe failed: ${errorMessage(error)}`);
            return failed('UNREACHABLE', `browser error: ${errorMessage(error)}`);
        }
    }

    private async readStates(page: PortalPage): Promise<ProbeResult> {
        const html = await page.content();
        const options = extractSelectOptions(html, /state/i, true);
        if (options && options.length > 0) return found({ kind: 'options', source: 'browser', options });

        const embedded = extractScriptStates(html);
        if (embedded) return found({ kind: 'json', source: 'browser (script)', data: embedded });

        return failed('EMPTY', 'no state list in rendered page');
    }

    private async readCommissions(page: PortalPage, stateId: string): Promise<ProbeResult> {
        let selected = false;
        for (const field of STATE_FIELDS) {
            if (await page.setField(field, stateId)) {
                selected = true;
                break;
            }
        }
        if (!selected) return failed('EMPTY', 'no state field on rendered page');

        if (!(await page.waitFor(COMMISSION_LOADED, this.options.timeoutMs))) {
            return this.missing(page, 'commission list never loaded');
        }

        const options = extractSelectOptions(await page.content(), /commission|dist/i);
        return options && options.length > 0
            ? found({ kind: 'options', source: 'browser', options })
            : failed('EMPTY', 'commission list is empty');
    }

    private async search(page: PortalPage, query: SearchQuery): Promise<ProbeResult> {
        const form = buildSearchForm(query, this.options.commissionType);
        for (const [name, value] of Object.entries(form)) {
            if (!(await page.setField(name, value))) {
                log.debug(`No '${name}' field on rendered form`);
            }
        }
        await page.submit();

        if (!(await page.waitFor(RESULTS_LOADED, this.options.timeoutMs))) {
            const html = await page.content();
            if (isNoRecordsPage(html)) return failed('EMPTY', 'portal reported no records');
            return this.missing(page, 'result table never appeared', html);
        }

        const rows = extractCaseTable(await page.content());
        return rows ? found({ kind: 'table', source: 'browser', rows }) : failed('EMPTY', 'no case table in results');
    }

    private async missing(page: PortalPage, detail: string, html?: string): Promise<ProbeResult> {
        const content = html ?? await page.content();
        const challenged = isCaptchaPage(content);
        return failed('UNREACHABLE', challenged ? `${detail} (CAPTCHA challenge)` : detail, challenged);
    }
}
