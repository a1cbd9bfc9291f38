import { v4 as uuidv4 } from 'uuid';
import { Operation, describeOperation } from '../types/portal_types';
import { Strategy, RawPayload } from '../strategies/strategy';
import { Normalized } from './normalizer';
import {
    AllStrategiesExhaustedError,
    ParseFailureError,
    StrategyAttempt,
    UpstreamBlockedError,
    errorMessage,
} from './errors';
import { createLogger } from '../utils/logger';

const log = createLogger('FallbackChain');

export interface ChainResult<T> {
    records: T[];
    /** Name of the tier that produced the records; undefined for an empty success. */
    source?: string;
    attempts: StrategyAttempt[];
}

export type NormalizeFn<O extends Operation, T> = (payload: RawPayload, operation: O) => Normalized<T>;

/**
 * Runs a fixed, ordered list of strategies for one kind of operation and
 * returns the first tier whose payload normalizes to at least one record.
 */
export class FallbackChain<O extends Operation, T> {
    constructor(
        public readonly name: string,
        private readonly strategies: readonly Strategy[],
        private readonly normalize: NormalizeFn<O, T>
    ) {}

    public get order(): string[] {
        return this.strategies.map((s) => s.name);
    }

    async run(operation: O): Promise<ChainResult<T>> {
        const runId = uuidv4().substring(0, 8);
        const label = describeOperation(operation);
        const attempts: StrategyAttempt[] = [];

        log.info(`[${runId}] ${label}: trying ${this.order.join(' -> ')}`);

        for (const strategy of this.strategies) {
            const result = await strategy.probe(operation);

            if (!result.success) {
                attempts.push({
                    strategy: strategy.name,
                    reason: result.reason,
                    detail: result.detail,
                    blocked: result.blocked ?? false,
                });
                log.warn(`[${runId}] ${strategy.name} failed (${result.reason}): ${result.detail}`);
                continue;
            }

            let normalized: Normalized<T>;
            try {
                normalized = this.normalize(result.payload, operation);
            } catch (error) {
                if (!(error instanceof ParseFailureError)) throw error;
                attempts.push({ strategy: strategy.name, reason: 'PARSE_FAILURE', detail: error.message, blocked: false });
                log.warn(`[${runId}] ${strategy.name} payload unreadable: ${errorMessage(error)}`);
                continue;
            }

            if (normalized.records.length === 0) {
                const reason = normalized.itemCount === 0 ? 'EMPTY' : 'PARSE_FAILURE';
                const detail = normalized.itemCount === 0
                    ? `no items in ${result.payload.source}`
                    : `none of ${normalized.itemCount} item(s) from ${result.payload.source} normalized`;
                attempts.push({ strategy: strategy.name, reason, detail, blocked: false });
                log.warn(`[${runId}] ${strategy.name} yielded nothing (${reason}): ${detail}`);
                continue;
            }

            log.info(`[${runId}] ${label}: ${normalized.records.length} record(s) via ${strategy.name}`);
            return { records: normalized.records, source: strategy.name, attempts };
        }

        if (attempts.some((a) => a.reason === 'EMPTY')) {
            log.info(`[${runId}] ${label}: portal answered with no records`);
            return { records: [], attempts };
        }

        // Tiers that never reached the portal (NOT_SUPPORTED) do not count against a block.
        const reached = attempts.filter((a) => a.reason !== 'NOT_SUPPORTED');
        if (reached.length > 0 && reached.every((a) => a.blocked)) {
            log.error(`[${runId}] ${label}: portal refused every tier`);
            throw new UpstreamBlockedError(label, attempts);
        }

        log.error(`[${runId}] ${label}: all ${attempts.length} tier(s) exhausted`);
        throw new AllStrategiesExhaustedError(label, attempts);
    }
}
