export type PortalErrorCode =
    | 'STATE_NOT_FOUND'
    | 'COMMISSION_NOT_FOUND'
    | 'VALIDATION_FAILED'
    | 'TIMEOUT'
    | 'RATE_LIMITED'
    | 'UPSTREAM_ERROR'
    | 'UPSTREAM_BLOCKED'
    | 'ALL_STRATEGIES_EXHAUSTED'
    | 'PARSE_FAILURE';

/**
 * Base class for every failure the engine reports. `status` is the HTTP
 * status the API layer answers with.
 */
export abstract class PortalError extends Error {
    abstract readonly code: PortalErrorCode;
    abstract readonly status: number;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }

    toJSON(): Record<string, unknown> {
        return { error: this.message, code: this.code };
    }
}

export class StateNotFoundError extends PortalError {
    readonly code = 'STATE_NOT_FOUND';
    readonly status = 404;

    constructor(public readonly requested: string, public readonly available: string[]) {
        super(`State '${requested}' not found`);
    }

    toJSON() {
        return { ...super.toJSON(), available: this.available };
    }
}

export class CommissionNotFoundError extends PortalError {
    readonly code = 'COMMISSION_NOT_FOUND';
    readonly status = 404;

    constructor(
        public readonly requested: string,
        public readonly stateId: string,
        public readonly available: string[]
    ) {
        super(`Commission '${requested}' not found for state ${stateId}`);
    }

    toJSON() {
        return { ...super.toJSON(), stateId: this.stateId, available: this.available };
    }
}

export interface ValidationIssue {
    field: string;
    message: string;
}

export class RequestValidationError extends PortalError {
    readonly code = 'VALIDATION_FAILED';
    readonly status = 400;

    constructor(public readonly issues: ValidationIssue[]) {
        super(`Invalid request: ${issues.map((i) => `${i.field}: ${i.message}`).join('; ')}`);
    }

    toJSON() {
        return { ...super.toJSON(), issues: this.issues };
    }
}

export class TimeoutError extends PortalError {
    readonly code = 'TIMEOUT';
    readonly status = 504;

    constructor(public readonly target: string, public readonly attempts: number) {
        super(`Upstream request to ${target} timed out after ${attempts} attempt(s)`);
    }
}

export class RateLimitedError extends PortalError {
    readonly code = 'RATE_LIMITED';
    readonly status = 429;

    constructor(public readonly target: string) {
        super(`Upstream kept rate limiting ${target} after cooldown`);
    }
}

export class UpstreamError extends PortalError {
    readonly code = 'UPSTREAM_ERROR';
    readonly status = 502;

    constructor(
        public readonly target: string,
        public readonly statusCode: number,
        public readonly body: string
    ) {
        super(`Upstream ${target} answered HTTP ${statusCode}`);
    }

    get refused(): boolean {
        return this.statusCode === 401 || this.statusCode === 403;
    }
}

export class ParseFailureError extends PortalError {
    readonly code = 'PARSE_FAILURE';
    readonly status = 502;
}

export type AttemptReason = 'NOT_SUPPORTED' | 'UNREACHABLE' | 'EMPTY' | 'PARSE_FAILURE';

export interface StrategyAttempt {
    strategy: string;
    reason: AttemptReason;
    detail: string;
    blocked: boolean;
}

export class AllStrategiesExhaustedError extends PortalError {
    readonly code: PortalErrorCode = 'ALL_STRATEGIES_EXHAUSTED';
    readonly status: number = 503;

    constructor(public readonly operation: string, public readonly attempts: StrategyAttempt[]) {
        super(`Every access strategy failed for ${operation}`);
    }

    toJSON() {
        return {
            ...super.toJSON(),
            operation: this.operation,
            attempts: this.attempts.map(({ strategy, reason, detail }) => ({ strategy, reason, detail })),
        };
    }
}

/**
 * Exhaustion where every tier that reached the portal was refused
 * (401/403 or a challenge page).
 */
export class UpstreamBlockedError extends AllStrategiesExhaustedError {
    readonly code: PortalErrorCode = 'UPSTREAM_BLOCKED';
    readonly status: number = 502;

    constructor(operation: string, attempts: StrategyAttempt[]) {
        super(operation, attempts);
        this.message = `Portal refused automated access for ${operation}`;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
