import { HttpMethod, HttpTransport, RawResponse } from '../transport/http_transport';
import { PortalError, UpstreamError, errorMessage } from '../engine/errors';
import { Operation, isRecord } from '../types/portal_types';
import { extractItems, holdsEmptyList } from '../utils/normalization';
import { createLogger } from '../utils/logger';
import { Strategy, ProbeResult, buildSearchJson, failed, found } from './strategy';

const log = createLogger('DirectAPI');

interface ApiCandidate {
    method: HttpMethod;
    path: string;
    params?: Record<string, string>;
    json?: unknown;
}

const STATES_QUERY = '{ states { id name displayName } }';
const COMMISSIONS_QUERY = 'query ($stateId: String!) { commissions(stateId: $stateId) { id name stateId } }';

export interface DirectApiOptions {
    commissionType: string;
}

/**
 * Tier 1: guesses at the JSON endpoints the portal's own frontend calls.
 * Candidates are tried in a fixed order; the first JSON answer carrying a
 * non-empty list wins. JSON without any record list counts as a failed
 * request, not as an empty answer.
 */
export class DirectApiStrategy implements Strategy {
    public readonly name = 'DirectAPI';
    public readonly kind = 'DIRECT_API';

    constructor(private readonly transport: HttpTransport, private readonly options: DirectApiOptions) {}

    public candidatesFor(operation: Operation): ApiCandidate[] {
        switch (operation.kind) {
            case 'listStates':
                return [
                    ...[
                        '/api/states',
                        '/api/master/states',
                        '/api/v1/states',
                        '/api/public/states',
                        '/api/master/state-list',
                        '/api/dropdown/states',
                        '/services/states',
                        '/rest/states',
                    ].map((path): ApiCandidate => ({ method: 'GET', path })),
                    { method: 'POST', path: '/graphql', json: { query: STATES_QUERY } },
                ];
            case 'listCommissions': {
                const id = operation.stateId;
                return [
                    { method: 'GET', path: '/api/commissions', params: { state_id: id } },
                    { method: 'GET', path: `/api/master/commissions/${encodeURIComponent(id)}` },
                    { method: 'GET', path: '/api/v1/commissions', params: { stateId: id } },
                    { method: 'GET', path: '/api/public/commissions', params: { state: id } },
                    { method: 'GET', path: '/api/dropdown/commissions', params: { state_code: id } },
                    { method: 'POST', path: '/graphql', json: { query: COMMISSIONS_QUERY, variables: { stateId: id } } },
                ];
            }
            case 'searchCases': {
                const body = buildSearchJson(operation.query, this.options.commissionType);
                return ['/api/case/advance-search', '/api/v1/cases/search', '/api/cases/search']
                    .map((path): ApiCandidate => ({ method: 'POST', path, json: body }));
            }
        }
    }

    public async probe(operation: Operation): Promise<ProbeResult> {
        const candidates = this.candidatesFor(operation);
        const errors: PortalError[] = [];
        let emptyAnswers = 0;

        for (const candidate of candidates) {
            const target = `${candidate.method} ${candidate.path}`;
            let response: RawResponse;
            try {
                response = await this.transport.request(candidate.method, candidate.path, {
                    params: candidate.params,
                    json: candidate.json,
                });
            } catch (error) {
                if (!(error instanceof PortalError)) throw error;
                log.debug(`${target} failed: ${errorMessage(error)}`);
                errors.push(error);
                continue;
            }

            const data = parseJson(response);
            if (data === undefined) {
                log.debug(`${target} did not answer with JSON`);
                errors.push(new UpstreamError(target, response.status, 'non-JSON answer'));
                continue;
            }
            if (isRecord(data) && Array.isArray(data.errors) && extractItems(data) === undefined) {
                errors.push(new UpstreamError(target, response.status, 'GraphQL errors'));
                continue;
            }

            const items = extractItems(data);
            if (!items || items.length === 0) {
                if (holdsEmptyList(data)) {
                    emptyAnswers++;
                } else {
                    log.debug(`${target} answered without a record list`);
                    errors.push(new UpstreamError(target, response.status, 'no record list in answer'));
                }
                continue;
            }

            log.info(`${target} answered with ${items.length} item(s)`);
            return found({ kind: 'json', source: target, data });
        }

        if (emptyAnswers > 0) {
            return failed('EMPTY', `${emptyAnswers} endpoint(s) answered with no data`);
        }

        const blocked = errors.length > 0 && errors.every((e) => e instanceof UpstreamError && e.refused);
        return failed('UNREACHABLE', `all ${candidates.length} endpoint(s) failed`, blocked);
    }
}

function parseJson(response: RawResponse): unknown {
    const text = response.body.trim();
    const looksJson = response.contentType.includes('json') || text.startsWith('{') || text.startsWith('[');
    if (!looksJson || !text) return undefined;

    try {
        return JSON.parse(text);
    } catch (error) {
        log.debug(`Unparseable JSON from ${response.url}: ${errorMessage(error)}`);
        return undefined;
    }
}
