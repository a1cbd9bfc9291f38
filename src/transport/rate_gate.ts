import pLimit from 'p-limit';
import { Session } from './session';

/**
 * Serialized minimum-interval gate. Callers queue on a single slot, so two
 * requests never start within `minIntervalMs` of each other no matter how
 * many operations run concurrently above the transport. After a 429 the
 * gate stays shut for everyone until the cooldown ends.
 */
export class RateGate {
    private readonly slot = pLimit(1);
    private cooldownUntil = 0;

    constructor(
        private readonly session: Session,
        private readonly minIntervalMs: number,
        private readonly now: () => number,
        private readonly sleep: (ms: number) => Promise<void>
    ) { }

    /** Resolves once the caller may send. Returns how long it waited. */
    public pass(): Promise<number> {
        return this.slot(async () => {
            const openAt = Math.max(this.session.lastRequestAt + this.minIntervalMs, this.cooldownUntil);
            const waitMs = Math.max(0, openAt - this.now());
            if (waitMs > 0) {
                await this.sleep(waitMs);
            }
            this.session.lastRequestAt = this.now();
            return waitMs;
        });
    }

    /** Holds every caller back for `ms` from now. A longer pending cooldown wins. */
    public coolDown(ms: number) {
        this.cooldownUntil = Math.max(this.cooldownUntil, this.now() + ms);
    }

    public get pending(): number {
        return this.slot.pendingCount + this.slot.activeCount;
    }
}
