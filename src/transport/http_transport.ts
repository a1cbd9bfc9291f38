import pLimit from 'p-limit';
import { RateGate } from './rate_gate';
import { Session, extractCsrfToken } from './session';
import { PortalError, RateLimitedError, TimeoutError, UpstreamError, errorMessage } from '../engine/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('Transport');

export type HttpMethod = 'GET' | 'POST';

export interface RequestOptions {
    params?: Record<string, string>;
    form?: Record<string, string>;
    json?: unknown;
    headers?: Record<string, string>;
}

export interface RawResponse {
    url: string;
    status: number;
    contentType: string;
    headers: Headers;
    body: string;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface TransportOptions {
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    backoffBaseMs: number;
    minIntervalMs: number;
    rateLimitCooldownMs: number;
    landingPath?: string;
    userAgent?: string;
    fetch?: FetchLike;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
}

const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36';

const BODY_EXCERPT_LIMIT = 2000;

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function isTimeout(error: unknown): boolean {
    return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Portal HTTP client. Requests carry the session cookies and CSRF token,
 * pass through the shared rate gate and recover per status code.
 */
export class HttpTransport {
    public readonly baseUrl: string;
    private readonly session = new Session();
    private readonly sessionLock = pLimit(1);
    private readonly gate: RateGate;
    private readonly fetchImpl: FetchLike;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly options: TransportOptions;

    constructor(options: TransportOptions) {
        this.options = options;
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
        this.sleep = options.sleep ?? sleep;
        this.gate = new RateGate(this.session, options.minIntervalMs, options.now ?? Date.now, this.sleep);
    }

    public get csrfToken(): string | undefined {
        return this.session.csrfToken;
    }

    public get hasSession(): boolean {
        return this.session.isEstablished;
    }

    /** Value of a session cookie the portal root would receive. */
    public cookie(name: string): Promise<string | undefined> {
        return this.session.cookie(name, `${this.baseUrl}/`);
    }

    public resolveUrl(path: string): string {
        return new URL(path, `${this.baseUrl}/`).toString();
    }

    /**
     * GETs the landing page once and records its cookies and CSRF token.
     * Concurrent callers wait on the same lock and find the session ready.
     */
    public async initializeSession(): Promise<void> {
        if (this.session.isEstablished) return;

        await this.sessionLock(async () => {
            if (this.session.isEstablished) return;

            const landing = this.options.landingPath ?? '/';
            log.info(`Bootstrapping portal session via ${landing}`);
            const response = await this.exchange('GET', landing, {});
            if (response.status >= 400) {
                throw new UpstreamError(`GET ${landing}`, response.status, response.body.slice(0, BODY_EXCERPT_LIMIT));
            }

            await this.session.mergeSetCookies(response.headers, response.url);
            const token = extractCsrfToken(response.body);
            this.session.establish(token);
            log.info(`Session established${token ? ' with CSRF token' : ''}`);
        });
    }

    public async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<RawResponse> {
        const target = `${method} ${path}`;
        let retries = 0;
        let cooldownUsed = false;
        let sessionRefreshed = false;

        for (;;) {
            let response: RawResponse;
            try {
                await this.initializeSession();
                response = await this.exchange(method, path, options);
            } catch (error) {
                if (!isTimeout(error)) throw this.wrapNetworkError(target, error);
                if (retries >= this.options.maxRetries) {
                    throw new TimeoutError(target, retries + 1);
                }
                const delay = this.options.backoffBaseMs * 2 ** retries;
                retries++;
                log.warn(`${target} timed out, retry ${retries}/${this.options.maxRetries} in ${delay}ms`);
                await this.sleep(delay);
                continue;
            }

            if (response.status === 429) {
                // Every caller waits out the cooldown at the gate, not only this one.
                this.gate.coolDown(this.options.rateLimitCooldownMs);
                // The first cooldown of a call is free; later ones spend the retry budget.
                if (!cooldownUsed) {
                    cooldownUsed = true;
                } else if (retries < this.options.maxRetries) {
                    retries++;
                } else {
                    throw new RateLimitedError(target);
                }
                log.warn(`${target} rate limited, cooling down ${this.options.rateLimitCooldownMs}ms`);
                continue;
            }

            if (response.status === 401 || response.status === 403) {
                if (!sessionRefreshed) {
                    sessionRefreshed = true;
                    log.warn(`${target} refused with ${response.status}, resetting session`);
                    await this.resetSession();
                    continue;
                }
                throw new UpstreamError(target, response.status, response.body.slice(0, BODY_EXCERPT_LIMIT));
            }

            if (response.status >= 400) {
                throw new UpstreamError(target, response.status, response.body.slice(0, BODY_EXCERPT_LIMIT));
            }

            await this.sessionLock(() => this.session.mergeSetCookies(response.headers, response.url));
            return response;
        }
    }

    public get(path: string, params?: Record<string, string>, headers?: Record<string, string>) {
        return this.request('GET', path, { params, headers });
    }

    public postForm(path: string, form: Record<string, string>, headers?: Record<string, string>) {
        return this.request('POST', path, { form, headers });
    }

    public postJson(path: string, json: unknown, headers?: Record<string, string>) {
        return this.request('POST', path, { json, headers });
    }

    public async resetSession(): Promise<void> {
        await this.sessionLock(async () => {
            this.session.reset();
        });
    }

    public async close(): Promise<void> {
        await this.resetSession();
        log.info('Transport closed');
    }

    private async exchange(method: HttpMethod, path: string, options: RequestOptions): Promise<RawResponse> {
        await this.gate.pass();

        const url = new URL(path, `${this.baseUrl}/`);
        for (const [key, value] of Object.entries(options.params ?? {})) {
            url.searchParams.set(key, value);
        }

        const headers: Record<string, string> = {
            'User-Agent': this.options.userAgent ?? DEFAULT_USER_AGENT,
            'Accept': options.json === undefined
                ? 'text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8'
                : 'application/json, text/plain, */*',
            'Accept-Language': 'en-US,en;q=0.5',
            'Referer': `${this.baseUrl}/`,
        };
        const cookies = await this.session.cookieHeader(url.toString());
        if (cookies) headers['Cookie'] = cookies;

        let body: string | undefined;
        if (method === 'POST') {
            const token = this.session.csrfToken;
            if (token) headers['X-CSRF-TOKEN'] = token;

            if (options.json !== undefined) {
                headers['Content-Type'] = 'application/json';
                body = JSON.stringify(options.json);
            } else {
                const form = new URLSearchParams(options.form ?? {});
                if (token && !form.has('csrf-token')) form.set('csrf-token', token);
                headers['Content-Type'] = 'application/x-www-form-urlencoded';
                body = form.toString();
            }
        }

        const response = await this.fetchImpl(url.toString(), {
            method,
            headers: { ...headers, ...options.headers },
            body,
            redirect: 'follow',
            signal: AbortSignal.timeout(this.options.timeoutMs),
        });
        const text = await response.text();

        log.debug(`${method} ${url.pathname} -> ${response.status} (${text.length} bytes)`);

        return {
            url: response.url || url.toString(),
            status: response.status,
            contentType: response.headers.get('content-type') ?? '',
            headers: response.headers,
            body: text,
        };
    }

    private wrapNetworkError(target: string, error: unknown): PortalError {
        if (error instanceof PortalError) return error;
        return new UpstreamError(target, 0, errorMessage(error));
    }
}
