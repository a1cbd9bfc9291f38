import * as cheerio from 'cheerio';
import { cleanText, isPlaceholderOption } from '../utils/normalization';
import { OptionRow, TableRow } from './strategy';

/** A select with more options than this is taken as the state list when none is named. */
export const UNNAMED_SELECT_MIN_OPTIONS = 10;

/** Case tables have at least this many cells per data row. */
export const MIN_CASE_CELLS = 6;

const CAPTCHA_PATTERN = /captcha|g-recaptcha|h-captcha|verify (?:that )?you are (?:a )?human|are you a robot/i;
const NO_RECORDS_PATTERN = /records?\s+not\s+found|no\s+records?\s+found|no\s+data\s+found|no\s+cases?\s+found/i;

function readOptions($: cheerio.CheerioAPI, selectIndex: number): OptionRow[] {
    const options: OptionRow[] = [];
    $('select').eq(selectIndex).find('option').each((_, el) => {
        const text = cleanText($(el).text());
        const value = cleanText($(el).attr('value') ?? text);
        if (isPlaceholderOption(value, text)) return;
        options.push({ value, text });
    });
    return options;
}

/**
 * Options of the first `<select>` whose name, id or class matches
 * `pattern`. With `fallbackToLargest`, a page with no such select falls
 * back to the first select carrying more than UNNAMED_SELECT_MIN_OPTIONS options.
 * Placeholder options are dropped.
 */
export function extractSelectOptions(html: string, pattern: RegExp, fallbackToLargest = false): OptionRow[] | undefined {
    const $ = cheerio.load(html);
    const selects = $('select').toArray();

    const named = selects.findIndex((el) => {
        const $el = $(el);
        const label = [$el.attr('name'), $el.attr('id'), $el.attr('class')].filter(Boolean).join(' ');
        return pattern.test(label);
    });
    if (named >= 0) return readOptions($, named);

    if (!fallbackToLargest) return undefined;

    const large = selects.findIndex((el) => $(el).find('option').length > UNNAMED_SELECT_MIN_OPTIONS);
    return large >= 0 ? readOptions($, large) : undefined;
}

const SCRIPT_ARRAY_PATTERNS: RegExp[] = [
    /\b(?:var|let|const)\s+states\s*=\s*(\[[\s\S]*?\])\s*;/,
    /\bstates\s*[:=]\s*(\[[\s\S]*?\])/,
    /\bstateList\s*[:=]\s*(\[[\s\S]*?\])/,
    /\bSTATE_OPTIONS\s*[:=]\s*(\[[\s\S]*?\])/,
];

/**
 * State arrays the portal's bundle sometimes inlines into a page, e.g.
 * `var states = [{"id":"1","name":"DELHI"}];`. Accepts JSON and the
 * single-quoted / bare-key object literals scripts tend to use.
 */
export function extractScriptStates(html: string): unknown[] | undefined {
    const $ = cheerio.load(html);
    const scripts = $('script:not([src])').map((_, el) => $(el).text()).get();

    for (const script of scripts) {
        for (const pattern of SCRIPT_ARRAY_PATTERNS) {
            const match = script.match(pattern);
            if (!match?.[1]) continue;
            const parsed = parseLooseArray(match[1]);
            if (parsed && parsed.length > 0) return parsed;
        }
    }
    return undefined;
}

export function parseLooseArray(literal: string): unknown[] | undefined {
    const attempts = [
        literal,
        literal
            .replace(/'/g, '"')
            .replace(/([{,]\s*)([A-Za-z_$][\w$]*)\s*:/g, '$1"$2":')
            .replace(/,\s*([\]}])/g, '$1'),
    ];
    for (const candidate of attempts) {
        let parsed: unknown;
        try {
            parsed = JSON.parse(candidate);
        } catch {
            continue;
        }
        if (Array.isArray(parsed)) return parsed;
    }
    return undefined;
}

/**
 * Rows of the first table whose data rows carry at least MIN_CASE_CELLS
 * cells. Header rows (`th` only) are skipped. Returns undefined when the
 * page has no such table.
 */
export function extractCaseTable(html: string): TableRow[] | undefined {
    const $ = cheerio.load(html);

    for (const table of $('table').toArray()) {
        const rows: TableRow[] = [];
        $(table).find('tr').each((_, tr) => {
            const tds = $(tr).find('td');
            if (tds.length === 0) return;
            const cells: string[] = [];
            const links: string[][] = [];
            tds.each((__, td) => {
                cells.push(cleanText($(td).text()));
                links.push($(td).find('a[href]').toArray().map((a) => $(a).attr('href') ?? '').filter(Boolean));
            });
            rows.push({ cells, links });
        });
        if (rows.some((row) => row.cells.length >= MIN_CASE_CELLS)) return rows;
    }
    return undefined;
}

export function isCaptchaPage(html: string): boolean {
    return CAPTCHA_PATTERN.test(html);
}

export function isNoRecordsPage(html: string): boolean {
    return NO_RECORDS_PATTERN.test(cheerio.load(html).root().text());
}
