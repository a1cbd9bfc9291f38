import { ParseFailureError } from './errors';
import { CaseRecord, Commission, State, isRecord } from '../types/portal_types';
import { RawPayload, TableRow } from '../strategies/strategy';
import { MIN_CASE_CELLS } from '../strategies/html_extract';
import { cleanText, extractItems, isPlaceholderOption, normalizeDate, pickString } from '../utils/normalization';

export interface Normalized<T> {
    records: T[];
    /** Items the payload carried before any were dropped. */
    itemCount: number;
}

const STATE_KEYS = {
    id: ['id', 'stateId', 'state_id', 'stateCode', 'state_code', 'code', 'value'],
    name: ['name', 'stateName', 'state_name', 'text', 'label'],
    display: ['displayName', 'display_name'],
};

const COMMISSION_KEYS = {
    id: ['id', 'commissionId', 'commission_id', 'districtId', 'district_id', 'distCode', 'dist_code', 'code', 'value'],
    name: [
        'displayName', 'display_name', 'name', 'commissionName', 'commission_name',
        'districtName', 'district_name', 'text', 'label',
    ],
};

const CASE_KEYS = {
    caseNumber: ['caseNumber', 'case_number', 'caseNo', 'case_no', 'fileNo', 'file_no'],
    caseStage: ['caseStage', 'case_stage', 'stage', 'caseStatus', 'case_status', 'status'],
    filingDate: ['filingDate', 'filing_date', 'caseFilingDate', 'case_filing_date', 'dateOfFiling', 'date_of_filing', 'filedOn'],
    complainant: ['complainant', 'complainantName', 'complainant_name', 'petitioner', 'petitionerName', 'pet_name'],
    complainantAdvocate: [
        'complainantAdvocate', 'complainant_advocate', 'complainantAdvocateName', 'petitionerAdvocate', 'pet_adv',
    ],
    respondent: ['respondent', 'respondentName', 'respondent_name', 'oppositeParty', 'res_name'],
    respondentAdvocate: ['respondentAdvocate', 'respondent_advocate', 'respondentAdvocateName', 'res_adv'],
    documentLink: ['documentLink', 'document_link', 'orderLink', 'order_link', 'pdfUrl', 'pdf_url', 'link'],
};

const NARROW_ROW_MAX_CELLS = 7;

function itemsOf(payload: Extract<RawPayload, { kind: 'json' }>): unknown[] {
    const items = extractItems(payload.data);
    if (!items) throw new ParseFailureError(`No record list in JSON from ${payload.source}`);
    return items;
}

/** De-duplicates by identity, first occurrence wins. */
function collect<T>(itemCount: number, records: T[], identity: (record: T) => string): Normalized<T> {
    const seen = new Set<string>();
    const unique = records.filter((record) => {
        const key = identity(record);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
    });
    return { records: unique, itemCount };
}

/**
 * Turns whatever a tier brought back into canonical records. Items missing
 * a mandatory field are dropped; a payload that cannot be read at all
 * raises ParseFailureError.
 */
export class Normalizer {
    constructor(private readonly baseUrl: string) {}

    states(payload: RawPayload): Normalized<State> {
        switch (payload.kind) {
            case 'options':
                return collect(payload.options.length, payload.options
                    .filter((o) => !isPlaceholderOption(o.value, o.text))
                    .map((o) => toState(o.value, o.text)), (s) => s.id);
            case 'json': {
                const items = itemsOf(payload);
                return collect(items.length, items.flatMap((item) => {
                    if (typeof item === 'string') {
                        const name = cleanText(item);
                        return name ? [toState(name, name)] : [];
                    }
                    if (!isRecord(item)) return [];
                    const id = pickString(item, STATE_KEYS.id);
                    const name = pickString(item, STATE_KEYS.name) ?? pickString(item, STATE_KEYS.display);
                    if (!id || !name || isPlaceholderOption(id, name)) return [];
                    return [toState(id, name, pickString(item, STATE_KEYS.display))];
                }), (s) => s.id);
            }
            case 'table':
                throw new ParseFailureError(`Cannot read states from a table (${payload.source})`);
        }
    }

    commissions(payload: RawPayload, stateId: string): Normalized<Commission> {
        switch (payload.kind) {
            case 'options':
                return collect(payload.options.length, payload.options
                    .filter((o) => !isPlaceholderOption(o.value, o.text))
                    .map((o): Commission => ({ id: o.value, displayName: o.text, stateId })), (c) => c.id);
            case 'json': {
                const items = itemsOf(payload);
                return collect(items.length, items.flatMap((item): Commission[] => {
                    if (!isRecord(item)) return [];
                    const id = pickString(item, COMMISSION_KEYS.id);
                    const displayName = pickString(item, COMMISSION_KEYS.name);
                    if (!id || !displayName || isPlaceholderOption(id, displayName)) return [];
                    return [{ id, displayName, stateId }];
                }), (c) => c.id);
            }
            case 'table':
                throw new ParseFailureError(`Cannot read commissions from a table (${payload.source})`);
        }
    }

    cases(payload: RawPayload): Normalized<CaseRecord> {
        switch (payload.kind) {
            case 'table':
                return collect(payload.rows.length, payload.rows.flatMap((row) => {
                    const record = this.caseFromRow(row);
                    return record ? [record] : [];
                }), (c) => c.caseNumber);
            case 'json': {
                const items = itemsOf(payload);
                return collect(items.length, items.flatMap((item) => {
                    const record = isRecord(item) ? this.caseFromJson(item) : undefined;
                    return record ? [record] : [];
                }), (c) => c.caseNumber);
            }
            case 'options':
                throw new ParseFailureError(`Cannot read cases from select options (${payload.source})`);
        }
    }

    private caseFromJson(item: Record<string, unknown>): CaseRecord | undefined {
        return this.buildCase({
            caseNumber: pickString(item, CASE_KEYS.caseNumber),
            caseStage: pickString(item, CASE_KEYS.caseStage),
            filingDate: pickString(item, CASE_KEYS.filingDate),
            complainant: pickString(item, CASE_KEYS.complainant),
            complainantAdvocate: pickString(item, CASE_KEYS.complainantAdvocate),
            respondent: pickString(item, CASE_KEYS.respondent),
            respondentAdvocate: pickString(item, CASE_KEYS.respondentAdvocate),
            documentLink: pickString(item, CASE_KEYS.documentLink),
        });
    }

    // Column order of the portal's result table.
    private caseFromRow(row: TableRow): CaseRecord | undefined {
        if (row.cells.length < MIN_CASE_CELLS) return undefined;
        const [caseNumber, caseStage, filingDate, complainant, complainantAdvocate, respondent, respondentAdvocate] =
            row.cells;
        return this.buildCase({
            caseNumber,
            caseStage,
            filingDate,
            complainant,
            complainantAdvocate,
            respondent,
            respondentAdvocate,
            documentLink: documentCell(row)?.[0],
        });
    }

    private buildCase(fields: Partial<Record<keyof CaseRecord, string>>): CaseRecord | undefined {
        const caseNumber = cleanText(fields.caseNumber);
        const caseStage = cleanText(fields.caseStage);
        const complainant = cleanText(fields.complainant);
        const respondent = cleanText(fields.respondent);
        const filingDate = normalizeDate(fields.filingDate);
        if (!caseNumber || !caseStage || !complainant || !respondent || !filingDate) return undefined;

        const record: CaseRecord = { caseNumber, caseStage, filingDate, complainant, respondent };
        const complainantAdvocate = cleanText(fields.complainantAdvocate);
        const respondentAdvocate = cleanText(fields.respondentAdvocate);
        const documentLink = this.resolveLink(fields.documentLink);
        if (complainantAdvocate) record.complainantAdvocate = complainantAdvocate;
        if (respondentAdvocate) record.respondentAdvocate = respondentAdvocate;
        if (documentLink) record.documentLink = documentLink;
        return record;
    }

    /** Absolute http(s) URL against the portal base, or undefined. */
    resolveLink(link: string | undefined): string | undefined {
        const href = cleanText(link);
        if (!href || href === '#') return undefined;
        let url: URL;
        try {
            url = new URL(href, `${this.baseUrl}/`);
        } catch {
            return undefined;
        }
        return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : undefined;
    }
}

// Wide result tables put the order document in their last column; narrow
// ones link it from the case number.
function documentCell(row: TableRow): string[] | undefined {
    return row.cells.length > NARROW_ROW_MAX_CELLS ? row.links.at(-1) : row.links.at(0);
}

function toState(id: string, label: string, displayName?: string): State {
    const name = cleanText(label);
    return {
        id: cleanText(id),
        canonicalName: name.toUpperCase(),
        displayName: displayName ? cleanText(displayName) : name,
    };
}
