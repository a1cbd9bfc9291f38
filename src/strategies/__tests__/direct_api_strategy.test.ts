import { describe, it, expect } from 'vitest';
import { DirectApiStrategy } from '../direct_api_strategy';
import { FakePortal, html, json } from '../../__tests__/support/fake_portal';
import { SearchQuery } from '../../types/portal_types';

const QUERY: SearchQuery = {
    searchType: 'COMPLAINANT',
    stateId: '29',
    commissionId: '2901',
    searchValue: 'Asha Rao',
    caseType: 'DAILY_ORDER',
    dateRange: { from: '2023-01-01', to: '2023-12-31', basis: 'FILING' },
};

function strategyFor(portal: FakePortal) {
    return new DirectApiStrategy(portal.transport(), { commissionType: 'DCDRC' });
}

describe('DirectApiStrategy', () => {
    it('returns the first candidate answering with a non-empty JSON list', async () => {
        const portal = new FakePortal()
            .on('GET', '/api/states', json({ data: [] }))
            .on('GET', '/api/master/states', json({ states: [{ id: '29', name: 'KARNATAKA' }] }))
            .on('GET', '/api/v1/states', json([{ id: '7', name: 'DELHI' }]));

        const result = await strategyFor(portal).probe({ kind: 'listStates' });

        expect(result).toEqual({
            success: true,
            payload: { kind: 'json', source: 'GET /api/master/states', data: { states: [{ id: '29', name: 'KARNATAKA' }] } },
        });
        expect(portal.callsTo('GET', '/api/v1/states')).toHaveLength(0);
    });

    it('falls through to the GraphQL states query', async () => {
        const portal = new FakePortal()
            .on('POST', '/graphql', json({ data: { states: [{ id: '1', name: 'GOA' }] } }));

        const result = await strategyFor(portal).probe({ kind: 'listStates' });

        expect(result.success).toBe(true);
        const call = portal.callsTo('POST', '/graphql')[0];
        expect(JSON.parse(call.body ?? '{}')).toEqual({ query: '{ states { id name displayName } }' });
    });

    it('skips HTML answers', async () => {
        const portal = new FakePortal()
            .on('GET', '/api/states', html('<html>portal home</html>'))
            .on('GET', '/api/v1/states', json([{ id: '7', name: 'DELHI' }]));

        const result = await strategyFor(portal).probe({ kind: 'listStates' });

        expect(result).toMatchObject({ success: true, payload: { source: 'GET /api/v1/states' } });
    });

    it('reports EMPTY when an endpoint answered with no data and none had data', async () => {
        const portal = new FakePortal().on('GET', '/api/commissions', json({ data: [] }));

        const result = await strategyFor(portal).probe({ kind: 'listCommissions', stateId: '29' });

        expect(result).toMatchObject({ success: false, reason: 'EMPTY' });
        expect(portal.callsTo('GET', '/api/commissions')[0].url.searchParams.get('state_id')).toBe('29');
    });

    it('treats a null record list as an empty answer', async () => {
        const portal = new FakePortal().on('GET', '/api/commissions', json({ data: null }));

        const result = await strategyFor(portal).probe({ kind: 'listCommissions', stateId: '29' });

        expect(result).toMatchObject({ success: false, reason: 'EMPTY' });
    });

    it('counts JSON without a record list as a failed request', async () => {
        const portal = new FakePortal();
        for (const path of ['/api/case/advance-search', '/api/v1/cases/search', '/api/cases/search']) {
            portal.on('POST', path, json({ status: false, message: 'Invalid session' }));
        }

        const result = await strategyFor(portal).probe({ kind: 'searchCases', query: QUERY });

        expect(result).toEqual({ success: false, reason: 'UNREACHABLE', detail: 'all 3 endpoint(s) failed', blocked: false });
    });

    it('reports UNREACHABLE when every candidate failed', async () => {
        const portal = new FakePortal();

        const result = await strategyFor(portal).probe({ kind: 'listStates' });

        expect(result).toEqual({ success: false, reason: 'UNREACHABLE', detail: 'all 9 endpoint(s) failed', blocked: false });
    });

    it('flags UNREACHABLE as blocked when every candidate was refused', async () => {
        const portal = new FakePortal();
        for (const path of ['/api/case/advance-search', '/api/v1/cases/search', '/api/cases/search']) {
            portal.on('POST', path, { status: 403, body: 'Forbidden' });
        }

        const result = await strategyFor(portal).probe({ kind: 'searchCases', query: QUERY });

        expect(result).toMatchObject({ success: false, reason: 'UNREACHABLE', blocked: true });
    });

    it('posts the search as camelCase JSON with portal dates', async () => {
        const portal = new FakePortal().on('POST', '/api/case/advance-search', json({ cases: [{ caseNumber: 'CC/1/2023' }] }));

        await strategyFor(portal).probe({ kind: 'searchCases', query: QUERY });

        const call = portal.callsTo('POST', '/api/case/advance-search')[0];
        expect(JSON.parse(call.body ?? '{}')).toEqual({
            commissionType: 'DCDRC',
            stateId: '29',
            commissionId: '2901',
            orderType: 'DAILY ORDER',
            searchType: 'COMPLAINANT',
            searchValue: 'Asha Rao',
            complainantName: 'Asha Rao',
            dateType: 'case_filing_date',
            fromDate: '01/01/2023',
            toDate: '31/12/2023',
        });
    });
});
