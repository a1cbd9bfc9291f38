import { CookieJar } from 'tough-cookie';
import { createLogger } from '../utils/logger';

const log = createLogger('Session');

const CSRF_PATTERNS: RegExp[] = [
    /<meta[^>]+name=["']csrf-token["'][^>]*content=["']([^"']+)["']/i,
    /<meta[^>]+content=["']([^"']+)["'][^>]*name=["']csrf-token["']/i,
    /<input[^>]+name=["'](?:csrf-token|_token|csrf_token|_csrf)["'][^>]*value=["']([^"']+)["']/i,
    /<input[^>]+value=["']([^"']+)["'][^>]*name=["'](?:csrf-token|_token|csrf_token|_csrf)["']/i,
    /csrf[_-]?token["']?\s*[:=]\s*["']([A-Za-z0-9._\-+/=]{8,})["']/i,
];

/**
 * Pulls a CSRF token out of an HTML body. Returns undefined when the page
 * carries none.
 */
export function extractCsrfToken(html: string): string | undefined {
    for (const pattern of CSRF_PATTERNS) {
        const match = html.match(pattern);
        if (match?.[1]) return match[1];
    }
    return undefined;
}

export function getSetCookieValues(headers: Headers): string[] {
    const values = headers.getSetCookie();
    if (values.length > 0) return values;
    const single = headers.get('set-cookie');
    return single ? [single] : [];
}

/**
 * Cookie / CSRF state shared by every request of one transport. Only the
 * transport mutates it, and only while holding its session lock.
 */
export class Session {
    private jar = new CookieJar();
    private established = false;
    public csrfToken: string | undefined;
    public lastRequestAt = 0;

    public get isEstablished(): boolean {
        return this.established;
    }

    public establish(csrfToken: string | undefined) {
        this.established = true;
        if (csrfToken) this.csrfToken = csrfToken;
    }

    /** Stores the response's cookies against the URL that set them. Returns how many were kept. */
    public async mergeSetCookies(headers: Headers, url: string): Promise<number> {
        let merged = 0;
        for (const raw of getSetCookieValues(headers)) {
            const cookie = await this.jar.setCookie(raw, url, { ignoreError: true });
            if (cookie) merged++;
            else log.debug(`Ignored unusable cookie from ${url}`);
        }
        return merged;
    }

    /** The Cookie header for a request to `url`; expired cookies are left out. */
    public async cookieHeader(url: string): Promise<string | undefined> {
        const header = await this.jar.getCookieString(url);
        return header || undefined;
    }

    public async cookie(name: string, url: string): Promise<string | undefined> {
        const cookies = await this.jar.getCookies(url);
        return cookies.find((c) => c.key === name)?.value;
    }

    /** Drops cookies and token; the next request bootstraps again. */
    public reset() {
        this.jar = new CookieJar();
        this.csrfToken = undefined;
        this.established = false;
    }
}
