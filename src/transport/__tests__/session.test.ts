import { describe, it, expect } from 'vitest';
import { Session, extractCsrfToken } from '../session';

describe('extractCsrfToken', () => {
    it('reads a csrf-token meta tag in either attribute order', () => {
        expect(extractCsrfToken('<meta name="csrf-token" content="test-token-a">')).toBe('test-token-a');
        expect(extractCsrfToken('<meta content="test-token-b" name="csrf-token">')).toBe('test-token-b');
    });

    it('reads hidden form inputs', () => {
        expect(extractCsrfToken('<input type="hidden" name="_token" value="test-token-c">')).toBe('test-token-c');
        expect(extractCsrfToken('<input value="test-token-d" type="hidden" name="csrf_token">')).toBe('test-token-d');
    });

    it('reads inline script assignments', () => {
        expect(extractCsrfToken('<script>window.csrfToken = "test-token-e";</script>')).toBe('test-token-e');
    });

    it('returns undefined when the page has no token', () => {
        expect(extractCsrfToken('<html><body>Welcome</body></html>')).toBeUndefined();
    });
});

describe('Session', () => {
    const ROOT = 'https://portal.test/';

    it('merges Set-Cookie values into one Cookie header', async () => {
        const session = new Session();
        const headers = new Headers();
        headers.append('set-cookie', 'A=1; Path=/');
        headers.append('set-cookie', 'B=2; HttpOnly');

        expect(await session.mergeSetCookies(headers, ROOT)).toBe(2);
        expect(await session.cookieHeader(ROOT)).toBe('A=1; B=2');
    });

    it('forgets a cookie the portal expires', async () => {
        const session = new Session();
        await session.mergeSetCookies(new Headers({ 'set-cookie': 'PORTALSESSID=test-session; Path=/' }), ROOT);

        await session.mergeSetCookies(
            new Headers({ 'set-cookie': 'PORTALSESSID=; Max-Age=0; Path=/' }),
            'https://portal.test/logout'
        );

        expect(await session.cookieHeader('https://portal.test/next')).toBeUndefined();
        expect(await session.cookie('PORTALSESSID', ROOT)).toBeUndefined();
    });

    it('only sends a cookie under its path', async () => {
        const session = new Session();
        await session.mergeSetCookies(new Headers({ 'set-cookie': 'SEARCH=test-search; Path=/search' }), ROOT);

        expect(await session.cookieHeader('https://portal.test/search/results')).toBe('SEARCH=test-search');
        expect(await session.cookieHeader('https://portal.test/api/states')).toBeUndefined();
    });

    it('reset() clears cookies, token and the established flag', async () => {
        const session = new Session();
        await session.mergeSetCookies(new Headers({ 'set-cookie': 'A=1' }), ROOT);
        session.establish('test-token');

        session.reset();

        expect(session.isEstablished).toBe(false);
        expect(session.csrfToken).toBeUndefined();
        expect(await session.cookieHeader(ROOT)).toBeUndefined();
    });
});
