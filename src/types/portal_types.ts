export const SEARCH_TYPES = [
    'CASE_NUMBER',
    'COMPLAINANT',
    'RESPONDENT',
    'COMPLAINANT_ADVOCATE',
    'RESPONDENT_ADVOCATE',
    'INDUSTRY_TYPE',
    'JUDGE',
] as const;

export type SearchType = typeof SEARCH_TYPES[number];

export const CASE_TYPES = ['DAILY_ORDER', 'FINAL_ORDER'] as const;

export type CaseType = typeof CASE_TYPES[number];

export const DATE_BASES = ['FILING', 'ORDER'] as const;

export type DateBasis = typeof DATE_BASES[number];

export interface State {
    id: string;
    canonicalName: string;
    displayName: string;
}

export interface Commission {
    id: string;
    displayName: string;
    stateId: string;
}

export interface DateRange {
    from: string; // yyyy-MM-dd
    to: string;   // yyyy-MM-dd
    basis: DateBasis;
}

export interface SearchQuery {
    searchType: SearchType;
    stateId: string;
    commissionId: string;
    searchValue: string;
    dateRange?: DateRange;
    caseType: CaseType;
}

export interface CaseRecord {
    caseNumber: string;
    caseStage: string;
    filingDate: string; // yyyy-MM-dd
    complainant: string;
    complainantAdvocate?: string;
    respondent: string;
    respondentAdvocate?: string;
    documentLink?: string;
}

/**
 * Human-entered search: names instead of ids. Resolved against the catalog
 * before a SearchQuery is built.
 */
export interface NamedSearchRequest {
    searchType: SearchType;
    state: string;
    commission: string;
    searchValue: string;
    caseType?: CaseType;
    dateRange?: DateRange;
}

export type Operation =
    | { kind: 'listStates' }
    | { kind: 'listCommissions'; stateId: string }
    | { kind: 'searchCases'; query: SearchQuery };

export type OperationKind = Operation['kind'];

export type ListStatesOperation = Extract<Operation, { kind: 'listStates' }>;
export type ListCommissionsOperation = Extract<Operation, { kind: 'listCommissions' }>;
export type SearchCasesOperation = Extract<Operation, { kind: 'searchCases' }>;

export function describeOperation(op: Operation): string {
    switch (op.kind) {
        case 'listStates':
            return 'listStates';
        case 'listCommissions':
            return `listCommissions(${op.stateId})`;
        case 'searchCases':
            return `searchCases(${op.query.searchType}:${op.query.stateId}/${op.query.commissionId})`;
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isState(value: unknown): value is State {
    return isRecord(value)
        && typeof value.id === 'string'
        && typeof value.canonicalName === 'string'
        && typeof value.displayName === 'string';
}

export function isCommission(value: unknown): value is Commission {
    return isRecord(value)
        && typeof value.id === 'string'
        && typeof value.displayName === 'string'
        && typeof value.stateId === 'string';
}

export function isCaseRecord(value: unknown): value is CaseRecord {
    return isRecord(value)
        && typeof value.caseNumber === 'string'
        && typeof value.caseStage === 'string'
        && typeof value.filingDate === 'string'
        && typeof value.complainant === 'string'
        && typeof value.respondent === 'string';
}

export function listOf<T>(guard: (value: unknown) => value is T) {
    return (value: unknown): value is readonly T[] => Array.isArray(value) && value.every(guard);
}
