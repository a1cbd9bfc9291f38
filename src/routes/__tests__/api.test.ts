import { describe, it, expect, afterEach } from 'vitest';
import { Server } from 'http';
import { createApp } from '../../app';
import { createPortalEngine } from '../../engine/portal_engine';
import { envSchema } from '../../config/env';
import { FakePortal, html, json } from '../../__tests__/support/fake_portal';

const config = envSchema.parse({
    NODE_ENV: 'test',
    PORTAL_BASE_URL: 'https://portal.test',
    MIN_REQUEST_INTERVAL_MS: '0',
    BROWSER_ENABLED: 'false',
});

const STATE_PAGE = html(`
    <select name="state_code">
        <option value="">Select State</option>
        <option value="29">KARNATAKA</option>
        <option value="7">DELHI</option>
        <option value="27">MAHARASHTRA</option>
        <option value="33">TAMIL NADU</option>
        <option value="19">WEST BENGAL</option>
    </select>`);

const CASE = {
    caseNumber: 'CC/12/2023',
    caseStage: 'Admitted',
    filingDate: '2023-08-15',
    complainant: 'Asha Rao',
    respondent: 'Acme Motors',
};

function portalWithCatalog() {
    return new FakePortal()
        .on('GET', '/advance-case-search', STATE_PAGE)
        .on('GET', '/api/commissions', json([{ id: '2901', name: 'Bengaluru Urban' }, { id: '2910', name: 'Mysuru' }]));
}

let server: Server | undefined;

afterEach(async () => {
    const running = server;
    server = undefined;
    if (running) await new Promise<void>((resolve) => running.close(() => resolve()));
});

async function start(portal: FakePortal): Promise<string> {
    const engine = createPortalEngine(config, { fetch: portal.fetch, sleep: portal.sleep });
    const app = createApp(engine, config);
    const listening = await new Promise<Server>((resolve) => {
        const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    server = listening;
    const address = listening.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    return `http://127.0.0.1:${address.port}`;
}

const post = (url: string, body: unknown) =>
    fetch(url, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) });

describe('HTTP API', () => {
    it('GET /health', async () => {
        const base = await start(new FakePortal());

        const res = await fetch(`${base}/health`);

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({ status: 'ok', env: 'test' });
    });

    it('GET /api/v1/states lists states and tags the response with a request id', async () => {
        const base = await start(portalWithCatalog());

        const res = await fetch(`${base}/api/v1/states`);
        const body = await res.json();

        expect(res.status).toBe(200);
        expect(res.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
        expect(body.total).toBe(5);
        expect(body.states[0]).toEqual({ id: '29', canonicalName: 'KARNATAKA', displayName: 'KARNATAKA' });
    });

    it('echoes a caller-supplied request id', async () => {
        const base = await start(portalWithCatalog());

        const res = await fetch(`${base}/api/v1/cases/health`, { headers: { 'X-Request-Id': 'test-req-1' } });

        expect(res.headers.get('x-request-id')).toBe('test-req-1');
        expect(await res.json()).toMatchObject({ status: 'ok', service: 'cases' });
    });

    it('GET /api/v1/commissions/:stateId', async () => {
        const base = await start(portalWithCatalog());

        const res = await fetch(`${base}/api/v1/commissions/29`);

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({
            commissions: [
                { id: '2901', displayName: 'Bengaluru Urban', stateId: '29' },
                { id: '2910', displayName: 'Mysuru', stateId: '29' },
            ],
            total: 2,
            stateId: '29',
        });
    });

    it('answers 404 with the available states for an unknown state id', async () => {
        const base = await start(portalWithCatalog());

        const res = await fetch(`${base}/api/v1/commissions/99`);
        const body = await res.json();

        expect(res.status).toBe(404);
        expect(body.code).toBe('STATE_NOT_FOUND');
        expect(body.available).toEqual(['KARNATAKA', 'DELHI', 'MAHARASHTRA', 'TAMIL NADU', 'WEST BENGAL']);
    });

    it('POST /api/v1/cases/by-complainant returns the case list', async () => {
        const portal = portalWithCatalog().on('POST', '/api/case/advance-search', json({ data: [CASE] }));
        const base = await start(portal);

        const res = await post(`${base}/api/v1/cases/by-complainant`, {
            state: 'Karnataka',
            commission: 'Bengaluru Urban',
            searchValue: 'Asha Rao',
        });

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual([CASE]);
        const sent = JSON.parse(portal.callsTo('POST', '/api/case/advance-search')[0].body ?? '{}');
        expect(sent).toMatchObject({ stateId: '29', commissionId: '2901', complainantName: 'Asha Rao' });
    });

    it('returns [] when the portal has no records', async () => {
        const portal = portalWithCatalog().on('POST', '/advance-case-search-result', html('<p>Record Not Found</p>'));
        const base = await start(portal);

        const res = await post(`${base}/api/v1/cases/by-judge`, {
            state: 'karnataka',
            commission: 'mysuru',
            searchValue: 'Justice Nobody',
        });

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual([]);
    });

    it('POST /api/v1/cases/advanced-search wraps results with the resolved query', async () => {
        const portal = portalWithCatalog().on('POST', '/api/case/advance-search', json({ data: [CASE] }));
        const base = await start(portal);

        const res = await post(`${base}/api/v1/cases/advanced-search`, {
            searchType: 'RESPONDENT',
            state: 'Karnataka',
            commission: 'Bengaluru',
            searchValue: 'Acme Motors',
            caseType: 'FINAL_ORDER',
            dateFilter: 'ORDER',
            fromDate: '2023-01-01',
            toDate: '2023-12-31',
        });

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({
            cases: [CASE],
            total: 1,
            page: 1,
            source: 'DirectAPI',
            query: {
                searchType: 'RESPONDENT',
                stateId: '29',
                commissionId: '2901',
                searchValue: 'Acme Motors',
                caseType: 'FINAL_ORDER',
                dateRange: { from: '2023-01-01', to: '2023-12-31', basis: 'ORDER' },
            },
        });
    });

    it('answers 404 listing the real commissions for an unknown one', async () => {
        const base = await start(portalWithCatalog());

        const res = await post(`${base}/api/v1/cases/advanced-search`, {
            searchType: 'COMPLAINANT',
            state: 'Karnataka',
            commission: 'Atlantis',
            searchValue: 'Asha Rao',
        });
        const body = await res.json();

        expect(res.status).toBe(404);
        expect(body).toMatchObject({ code: 'COMMISSION_NOT_FOUND', stateId: '29', available: ['Bengaluru Urban', 'Mysuru'] });
    });

    it('answers 400 for a missing search value', async () => {
        const portal = portalWithCatalog();
        const base = await start(portal);

        const res = await post(`${base}/api/v1/cases/by-case-number`, { state: 'Karnataka', commission: 'Mysuru' });
        const body = await res.json();

        expect(res.status).toBe(400);
        expect(body.code).toBe('VALIDATION_FAILED');
        expect(body.issues).toEqual([{ field: 'searchValue', message: 'is required' }]);
        expect(portal.calls).toHaveLength(0);
    });

    it('answers 400 when only one end of the date range is given', async () => {
        const base = await start(portalWithCatalog());

        const res = await post(`${base}/api/v1/cases/by-respondent`, {
            state: 'Karnataka',
            commission: 'Mysuru',
            searchValue: 'Acme',
            fromDate: '2023-01-01',
        });
        const body = await res.json();

        expect(res.status).toBe(400);
        expect(body.issues).toEqual([{ field: 'toDate', message: 'fromDate and toDate must be given together' }]);
    });

    it('answers 400 for malformed JSON', async () => {
        const base = await start(new FakePortal());

        const res = await fetch(`${base}/api/v1/cases/by-judge`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: '{"state": ',
        });

        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ code: 'VALIDATION_FAILED' });
    });

    it('answers 503 with per-tier reasons when every tier fails', async () => {
        const base = await start(new FakePortal());

        const res = await fetch(`${base}/api/v1/states`);
        const body = await res.json();

        expect(res.status).toBe(503);
        expect(body.code).toBe('ALL_STRATEGIES_EXHAUSTED');
        expect(body.attempts).toEqual([
            { strategy: 'DirectAPI', reason: 'UNREACHABLE', detail: 'all 9 endpoint(s) failed' },
            { strategy: 'FormScrape', reason: 'UNREACHABLE', detail: 'all 3 request(s) failed' },
        ]);
    });

    it('answers 404 for unknown routes', async () => {
        const base = await start(new FakePortal());

        const res = await fetch(`${base}/api/v1/nothing-here`);

        expect(res.status).toBe(404);
        expect(await res.json()).toMatchObject({ code: 'ROUTE_NOT_FOUND' });
    });
});
