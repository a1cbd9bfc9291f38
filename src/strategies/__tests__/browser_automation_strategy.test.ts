import { describe, it, expect } from 'vitest';
import { BrowserAutomationStrategy } from '../browser_automation_strategy';
import { PageProvider, PortalPage } from '../../services/browser_service';
import { SearchQuery } from '../../types/portal_types';

/** Scripted page: `content` changes as fields are set and the form is submitted. */
class FakePage implements PortalPage {
    public readonly opened: string[] = [];
    public readonly fields: Record<string, string> = {};
    public readonly waits: Array<[string, number]> = [];
    public submitted = false;

    constructor(
        private html: string,
        private readonly present: (selector: string, page: FakePage) => boolean,
        private readonly onChange: (page: FakePage) => string | undefined = () => undefined
    ) {}

    async open(url: string) {
        this.opened.push(url);
    }

    async waitFor(selector: string, timeoutMs: number) {
        this.waits.push([selector, timeoutMs]);
        return this.present(selector, this);
    }

    async setField(name: string, value: string) {
        if (!this.html.includes(`name="${name}"`)) return false;
        this.fields[name] = value;
        this.html = this.onChange(this) ?? this.html;
        return true;
    }

    async submit() {
        this.submitted = true;
        this.html = this.onChange(this) ?? this.html;
    }

    async content() {
        return this.html;
    }
}

class FakePages implements PageProvider {
    public closed = false;

    constructor(private readonly page: FakePage | Error) {}

    async withPage<T>(fn: (page: PortalPage) => Promise<T>): Promise<T> {
        if (this.page instanceof Error) throw this.page;
        return fn(this.page);
    }

    async close() {
        this.closed = true;
    }
}

const SEARCH_FORM = `
    <form>
        <select name="state_code"><option value="">Select</option><option value="29">KARNATAKA</option></select>
        <select name="dist_code"><option value="">Select</option></select>
        <input name="case_no"><button type="submit">Search</button>
    </form>`;

const OPTIONS = { baseUrl: 'https://portal.test', commissionType: 'DCDRC', timeoutMs: 2500 };

const QUERY: SearchQuery = {
    searchType: 'CASE_NUMBER',
    stateId: '29',
    commissionId: '2901',
    searchValue: 'CC/12/2023',
    caseType: 'DAILY_ORDER',
};

describe('BrowserAutomationStrategy', () => {
    it('reads states from the rendered search page', async () => {
        const page = new FakePage(SEARCH_FORM, () => true);
        const strategy = new BrowserAutomationStrategy(new FakePages(page), OPTIONS);

        const result = await strategy.probe({ kind: 'listStates' });

        expect(page.opened).toEqual(['https://portal.test/advance-case-search']);
        expect(page.waits).toEqual([['select', 2500]]);
        expect(result).toEqual({
            success: true,
            payload: { kind: 'options', source: 'browser', options: [{ value: '29', text: 'KARNATAKA' }] },
        });
    });

    it('picks the state and waits for the commission list to load', async () => {
        const loaded = SEARCH_FORM.replace(
            '<select name="dist_code"><option value="">Select</option></select>',
            '<select name="dist_code"><option value="">Select</option><option value="2901">Bengaluru Urban</option></select>'
        );
        const page = new FakePage(SEARCH_FORM, () => true, (p) => (p.fields.state_code ? loaded : undefined));
        const strategy = new BrowserAutomationStrategy(new FakePages(page), OPTIONS);

        const result = await strategy.probe({ kind: 'listCommissions', stateId: '29' });

        expect(page.fields.state_code).toBe('29');
        expect(result).toEqual({
            success: true,
            payload: { kind: 'options', source: 'browser', options: [{ value: '2901', text: 'Bengaluru Urban' }] },
        });
    });

    it('fills the search form, submits and reads the result table', async () => {
        const results = '<table><tr><td>CC/12/2023</td><td>Admitted</td><td>15/08/2023</td><td>A</td><td>B</td><td>C</td></tr></table>';
        const page = new FakePage(SEARCH_FORM, () => true, (p) => (p.submitted ? results : undefined));
        const strategy = new BrowserAutomationStrategy(new FakePages(page), OPTIONS);

        const result = await strategy.probe({ kind: 'searchCases', query: QUERY });

        expect(page.fields).toEqual({ state_code: '29', dist_code: '2901', case_no: 'CC/12/2023' });
        expect(result).toMatchObject({ success: true, payload: { kind: 'table', source: 'browser' } });
    });

    it('reports EMPTY when the portal answers "no records"', async () => {
        const page = new FakePage(
            SEARCH_FORM,
            (selector) => selector === 'select',
            (p) => (p.submitted ? '<p>No records found</p>' : undefined)
        );

        const result = await new BrowserAutomationStrategy(new FakePages(page), OPTIONS)
            .probe({ kind: 'searchCases', query: QUERY });

        expect(result).toMatchObject({ success: false, reason: 'EMPTY' });
    });

    it('reports UNREACHABLE when the form never renders', async () => {
        const page = new FakePage('<div id="loading"></div>', () => false);

        const result = await new BrowserAutomationStrategy(new FakePages(page), OPTIONS).probe({ kind: 'listStates' });

        expect(result).toEqual({ success: false, reason: 'UNREACHABLE', detail: 'search form never rendered', blocked: false });
    });

    it('flags a CAPTCHA wall as blocked', async () => {
        const page = new FakePage('<div class="h-captcha"></div>', () => false);

        const result = await new BrowserAutomationStrategy(new FakePages(page), OPTIONS).probe({ kind: 'listStates' });

        expect(result).toMatchObject({ success: false, reason: 'UNREACHABLE', blocked: true });
    });

    it('turns browser failures into an UNREACHABLE result', async () => {
        const pages = new FakePages(new Error('Executable doesn\'t exist'));

        const result = await new BrowserAutomationStrategy(pages, OPTIONS).probe({ kind: 'listStates' });

        expect(result).toEqual({
            success: false,
            reason: 'UNREACHABLE',
            detail: 'browser error: Executable doesn\'t exist',
            blocked: false,
        });
    });
});
