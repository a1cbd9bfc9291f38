import express from 'express';
import { PortalEngine } from '../engine/portal_engine';
import { SearchType } from '../types/portal_types';
import { advancedSearchSchema, caseSearchSchema, parseBody, toNamedRequest } from '../schemas/case_search';

// One endpoint per search type; all take the same body.
const SEARCH_ROUTES: Array<[string, SearchType]> = [
    ['/by-case-number', 'CASE_NUMBER'],
    ['/by-complainant', 'COMPLAINANT'],
    ['/by-respondent', 'RESPONDENT'],
    ['/by-complainant-advocate', 'COMPLAINANT_ADVOCATE'],
    ['/by-respondent-advocate', 'RESPONDENT_ADVOCATE'],
    ['/by-industry-type', 'INDUSTRY_TYPE'],
    ['/by-judge', 'JUDGE'],
];

export default function casesRoutes(engine: PortalEngine) {
    const router = express.Router();

    for (const [path, searchType] of SEARCH_ROUTES) {
        router.post(path, async (req, res, next) => {
            try {
                const body = parseBody(caseSearchSchema, req.body);
                const outcome = await engine.searchByNames(toNamedRequest(searchType, body));
                res.json(outcome.cases);
            } catch (error) {
                next(error);
            }
        });
    }

    router.post('/advanced-search', async (req, res, next) => {
        try {
            const body = parseBody(advancedSearchSchema, req.body);
            const outcome = await engine.searchByNames(toNamedRequest(body.searchType, body));
            res.json({
                cases: outcome.cases,
                total: outcome.cases.length,
                page: 1,
                source: outcome.source ?? null,
                query: outcome.query,
            });
        } catch (error) {
            next(error);
        }
    });

    router.get('/health', (req, res) => {
        res.json({ status: 'ok', service: 'cases', timestamp: new Date().toISOString() });
    });

    return router;
}
