import { format, parseISO } from 'date-fns';
import { Operation, SearchQuery, SearchType } from '../types/portal_types';

export type StrategyKind = 'DIRECT_API' | 'FORM_SCRAPE' | 'BROWSER_AUTOMATION';

export interface OptionRow {
    value: string;
    text: string;
}

export interface TableRow {
    cells: string[];
    /** hrefs found in each cell, index-aligned with `cells`. */
    links: string[][];
}

/** What a tier hands the normalizer. Never interpreted by the tier itself. */
export type RawPayload =
    | { kind: 'json'; source: string; data: unknown }
    | { kind: 'options'; source: string; options: OptionRow[] }
    | { kind: 'table'; source: string; rows: TableRow[] };

export type ProbeFailureReason = 'NOT_SUPPORTED' | 'UNREACHABLE' | 'EMPTY';

export type ProbeResult =
    | { success: true; payload: RawPayload }
    | { success: false; reason: ProbeFailureReason; detail: string; blocked?: boolean };

/**
 * One way of getting data out of the portal. Implementations keep no
 * business data between probes.
 */
export interface Strategy {
    readonly name: string;
    readonly kind: StrategyKind;
    probe(operation: Operation): Promise<ProbeResult>;
}

export const found = (payload: RawPayload): ProbeResult => ({ success: true, payload });

export const failed = (reason: ProbeFailureReason, detail: string, blocked = false): ProbeResult =>
    ({ success: false, reason, detail, blocked });

/** Field names used by the portal's HTML search form. */
export const FORM_SEARCH_FIELDS: Record<SearchType, string> = {
    CASE_NUMBER: 'case_no',
    COMPLAINANT: 'pet_name',
    RESPONDENT: 'res_name',
    COMPLAINANT_ADVOCATE: 'pet_adv',
    RESPONDENT_ADVOCATE: 'res_adv',
    INDUSTRY_TYPE: 'business_cat',
    JUDGE: 'judge_name',
};

/** Field names used by the portal's JSON search endpoints. */
export const JSON_SEARCH_FIELDS: Record<SearchType, string> = {
    CASE_NUMBER: 'caseNumber',
    COMPLAINANT: 'complainantName',
    RESPONDENT: 'respondentName',
    COMPLAINANT_ADVOCATE: 'complainantAdvocate',
    RESPONDENT_ADVOCATE: 'respondentAdvocate',
    INDUSTRY_TYPE: 'industryType',
    JUDGE: 'judgeName',
};

const ORDER_TYPES = {
    DAILY_ORDER: 'DAILY ORDER',
    FINAL_ORDER: 'FINAL ORDER',
} as const;

const DATE_TYPES = {
    FILING: 'case_filing_date',
    ORDER: 'order_date',
} as const;

/** The portal takes dd/MM/yyyy. */
export function toPortalDate(isoDate: string): string {
    return format(parseISO(isoDate), 'dd/MM/yyyy');
}

export function buildSearchForm(query: SearchQuery, commissionType: string): Record<string, string> {
    const form: Record<string, string> = {
        state_code: query.stateId,
        dist_code: query.commissionId,
        court_code: commissionType,
        case_type: ORDER_TYPES[query.caseType],
        [FORM_SEARCH_FIELDS[query.searchType]]: query.searchValue,
    };

    if (query.dateRange) {
        form.date_type = DATE_TYPES[query.dateRange.basis];
        form.from_date = toPortalDate(query.dateRange.from);
        form.to_date = toPortalDate(query.dateRange.to);
    }

    return form;
}

export function buildSearchJson(query: SearchQuery, commissionType: string): Record<string, string> {
    const body: Record<string, string> = {
        commissionType,
        stateId: query.stateId,
        commissionId: query.commissionId,
        orderType: ORDER_TYPES[query.caseType],
        searchType: query.searchType,
        searchValue: query.searchValue,
        [JSON_SEARCH_FIELDS[query.searchType]]: query.searchValue,
    };

    if (query.dateRange) {
        body.dateType = DATE_TYPES[query.dateRange.basis];
        body.fromDate = toPortalDate(query.dateRange.from);
        body.toDate = toPortalDate(query.dateRange.to);
    }

    return body;
}
