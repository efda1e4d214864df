/**
 * Cooperative cancellation.
 * One token per session, handed to every component that can suspend.
 * The caller's predicate is polled, never pushed; `cancel()` is the programmatic path.
 */
import { IngestionErrors } from './errors';

export type StopPredicate = () => boolean;

export class CancellationToken {
    private cancelled = false;
    private cancelReason = 'Stopped by user';

    constructor(private readonly shouldStop: StopPredicate = () => false) {}

    /**
     * Sticky: once the predicate has been observed true the token stays cancelled.
     */
    get isCancelled(): boolean {
        if (!this.cancelled && this.shouldStop()) {
            this.cancelled = true;
        }
        return this.cancelled;
    }

    get reason(): string {
        return this.cancelReason;
    }

    cancel(reason?: string): void {
        this.cancelled = true;
        if (reason) {
            this.cancelReason = reason;
        }
    }

    throwIfCancelled(where?: string): void {
        if (this.isCancelled) {
            throw IngestionErrors.cancelled(this.cancelReason, where ? { operation: where } : undefined);
        }
    }
}

export function createCancellationToken(shouldStop?: StopPredicate): CancellationToken {
    return new CancellationToken(shouldStop);
}
