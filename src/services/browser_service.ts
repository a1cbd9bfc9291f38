import { chromium, errors, Browser, Page } from 'playwright';
import { createLogger } from '../utils/logger';

const log = createLogger('Browser');

const USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36';

/** The handful of page interactions the automation tier needs. */
export interface PortalPage {
    open(url: string): Promise<void>;
    /** Resolves false when the selector does not appear within `timeoutMs`. */
    waitFor(selector: string, timeoutMs: number): Promise<boolean>;
    /** Sets an input or select by its `name`; false when the page has no such field. */
    setField(name: string, value: string): Promise<boolean>;
    submit(): Promise<void>;
    content(): Promise<string>;
}

export interface PageProvider {
    withPage<T>(fn: (page: PortalPage) => Promise<T>): Promise<T>;
    close(): Promise<void>;
}

export interface BrowserOptions {
    headless: boolean;
    timeoutMs: number;
}

class PlaywrightPortalPage implements PortalPage {
    constructor(private readonly page: Page, private readonly timeoutMs: number) {}

    async open(url: string) {
        await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeoutMs });
    }

    async waitFor(selector: string, timeoutMs: number) {
        try {
            await this.page.waitForSelector(selector, { state: 'attached', timeout: timeoutMs });
            return true;
        } catch (error) {
            if (error instanceof errors.TimeoutError) return false;
            throw error;
        }
    }

    async setField(name: string, value: string) {
        const field = this.page.locator(`[name="${name}"]`).first();
        if (await field.count() === 0) return false;

        const tag = await field.evaluate((el) => el.tagName.toLowerCase());
        if (tag === 'select') {
            await field.selectOption(value);
        } else {
            await field.fill(value);
        }
        return true;
    }

    async submit() {
        await this.page.locator('button[type="submit"], input[type="submit"]').first().click();
    }

    async content() {
        return this.page.content();
    }
}

/**
 * Owns one headless Chromium, launched on first use and shared by every
 * page. Each `withPage` call gets a fresh context that is closed afterwards.
 */
export class BrowserService implements PageProvider {
    private browser: Browser | null = null;
    private launching: Promise<Browser> | null = null;

    constructor(private readonly options: BrowserOptions) {}

    private async launch(): Promise<Browser> {
        if (this.browser) return this.browser;
        if (!this.launching) {
            log.info(`Launching Chromium (headless: ${this.options.headless})...`);
            this.launching = chromium.launch({
                headless: this.options.headless,
                args: ['--no-sandbox', '--disable-setuid-sandbox'], // Required for some container environments
            });
        }

        try {
            this.browser = await this.launching;
            return this.browser;
        } finally {
            this.launching = null;
        }
    }

    async withPage<T>(fn: (page: PortalPage) => Promise<T>): Promise<T> {
        const browser = await this.launch();
        const context = await browser.newContext({ userAgent: USER_AGENT });

        try {
            const page = await context.newPage();
            page.setDefaultTimeout(this.options.timeoutMs);
            return await fn(new PlaywrightPortalPage(page, this.options.timeoutMs));
        } finally {
            await context.close();
        }
    }

    async close() {
        if (this.browser) {
            await this.browser.close();
            this.browser = null;
            log.info('Browser closed.');
        }
    }
}
