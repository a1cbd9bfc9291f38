import { z } from 'zod';
import { isValid, parseISO } from 'date-fns';
import { RequestValidationError } from '../engine/errors';
import { CASE_TYPES, DATE_BASES, NamedSearchRequest, SEARCH_TYPES, SearchType } from '../types/portal_types';

const requiredText = z.string({ required_error: 'is required' }).trim().min(1, 'must not be empty');

const isoDate = z
    .string()
    .trim()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a yyyy-MM-dd date')
    .refine((value) => isValid(parseISO(value)), 'is not a calendar date');

const searchFields = {
    state: requiredText,
    commission: requiredText,
    searchValue: requiredText,
    caseType: z.enum(CASE_TYPES).default('DAILY_ORDER'),
    dateFilter: z.enum(DATE_BASES).default('FILING'),
    fromDate: isoDate.optional(),
    toDate: isoDate.optional(),
};

type DateFields = { fromDate?: string; toDate?: string };

function checkDateRange(value: DateFields, ctx: z.RefinementCtx) {
    if ((value.fromDate === undefined) !== (value.toDate === undefined)) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [value.fromDate === undefined ? 'fromDate' : 'toDate'],
            message: 'fromDate and toDate must be given together',
        });
        return;
    }
    if (value.fromDate && value.toDate && value.fromDate > value.toDate) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['fromDate'], message: 'must not be after toDate' });
    }
}

export const caseSearchSchema = z.object(searchFields).superRefine(checkDateRange);

export const advancedSearchSchema = z
    .object({ ...searchFields, searchType: z.enum(SEARCH_TYPES) })
    .superRefine(checkDateRange);

export type CaseSearchBody = z.infer<typeof caseSearchSchema>;
export type AdvancedSearchBody = z.infer<typeof advancedSearchSchema>;

/** Parses a request body, turning zod issues into a RequestValidationError. */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
    const result = schema.safeParse(body ?? {});
    if (!result.success) {
        throw new RequestValidationError(result.error.issues.map((issue) => ({
            field: issue.path.join('.') || 'body',
            message: issue.message,
        })));
    }
    return result.data;
}

export function toNamedRequest(searchType: SearchType, body: CaseSearchBody): NamedSearchRequest {
    const request: NamedSearchRequest = {
        searchType,
        state: body.state,
        commission: body.commission,
        searchValue: body.searchValue,
        caseType: body.caseType,
    };
    if (body.fromDate && body.toDate) {
        request.dateRange = { from: body.fromDate, to: body.toDate, basis: body.dateFilter };
    }
    return request;
}
