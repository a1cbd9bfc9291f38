import { parse, format, isValid, parseISO } from 'date-fns';
import { isRecord } from '../types/portal_types';

const DATE_FORMATS = [
    'dd/MM/yyyy',
    'd/M/yyyy',
    'dd-MM-yyyy',
    'dd.MM.yyyy',
    'yyyy-MM-dd',
    'yyyy/MM/dd',
    'dd MMM yyyy',
    'dd-MMM-yyyy',
    'MMM d, yyyy',
    'MMMM d, yyyy',
];

/**
 * Normalizes the date strings the portal emits to ISO 8601 (yyyy-MM-dd).
 * Day-first formats win over month-first ones.
 */
export function normalizeDate(dateStr: string | null | undefined): string | null {
    const input = dateStr?.trim();
    if (!input) return null;

    for (const f of DATE_FORMATS) {
        const parsedDate = parse(input, f, new Date());
        if (isValid(parsedDate) && parsedDate.getFullYear() >= 1900) {
            return format(parsedDate, 'yyyy-MM-dd');
        }
    }

    // Full ISO timestamps, e.g. 2024-08-15T00:00:00.000Z
    if (/^\d{4}-\d{2}-\d{2}T/.test(input)) {
        const parsedDate = parseISO(input);
        if (isValid(parsedDate)) return input.slice(0, 10);
    }

    return null;
}

/** Collapses whitespace (including non-breaking spaces) and trims. */
export function cleanText(value: string | null | undefined): string {
    return (value ?? '').replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim();
}

const PLACEHOLDER_VALUES = new Set(['', '-1', '0', 'select', 'null', 'undefined']);
const PLACEHOLDER_TEXT = /^(--.*|select\b.*|choose\b.*|-+)$/i;

/** `<option value="">Select State</option>` and friends. */
export function isPlaceholderOption(value: string, text: string): boolean {
    return PLACEHOLDER_VALUES.has(value.trim().toLowerCase()) || PLACEHOLDER_TEXT.test(text.trim());
}

const LIST_KEYS = ['data', 'cases', 'results', 'items', 'records', 'states', 'commissions', 'list'];

/**
 * Finds the record list inside a JSON answer: a bare array, or an array
 * under one of the usual wrapper keys, at most two levels deep (covers
 * GraphQL's `data.<field>`). Returns undefined when there is no list.
 */
export function extractItems(data: unknown, depth = 0): unknown[] | undefined {
    if (Array.isArray(data)) return data;
    if (!isRecord(data) || depth > 1) return undefined;

    for (const key of LIST_KEYS) {
        const candidate = data[key];
        if (Array.isArray(candidate)) return candidate;
    }
    for (const key of LIST_KEYS) {
        const nested = extractItems(data[key], depth + 1);
        if (nested) return nested;
    }
    return undefined;
}

/**
 * True when the answer carries a record list that is present but empty or
 * null, as opposed to carrying no list at all (an error envelope, say).
 */
export function holdsEmptyList(data: unknown, depth = 0): boolean {
    if (Array.isArray(data)) return data.length === 0;
    if (!isRecord(data) || depth > 1) return false;
    return LIST_KEYS.some((key) => key in data && (data[key] === null || holdsEmptyList(data[key], depth + 1)));
}

/** First key among `keys` holding a non-empty string or a number, as a string. */
export function pickString(source: Record<string, unknown>, keys: readonly string[]): string | undefined {
    for (const key of keys) {
        const value = source[key];
        if (typeof value === 'number' && Number.isFinite(value)) return String(value);
        if (typeof value === 'string') {
            const cleaned = cleanText(value);
            if (cleaned) return cleaned;
        }
    }
    return undefined;
}
