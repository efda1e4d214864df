/**
 * Retry/Backoff Policy
 *
 * Wraps one upstream operation and decides per failure class:
 *   auth_expired       -> ask the caller for fresh credentials, re-attempt or fail
 *   network            -> progressive delays, bounded attempts
 *   rate_limited       -> one long wait, not counted as an attempt
 *   pagination_glitch  -> short retries, then "end of results"
 *   unknown            -> fail immediately
 * Every wait polls the cancellation token once per second.
 */

import {
    MAX_NETWORK_ATTEMPTS,
    NETWORK_DEGRADED_AFTER_ATTEMPTS,
    NETWORK_RETRY_DELAYS,
    PAGINATION_GLITCH_RETRY,
    RATE_LIMIT_WAIT_SECONDS,
    WAIT_PROGRESS_INTERVAL_SECONDS,
} from '../config/constants';
import { FailureClass, classifyFailure } from './error-classifier';
import { IngestionError, IngestionErrors } from './errors';
import { SessionEventBus } from './event-bus';
import { CancellationToken } from './stop-signal';
import { createModuleLogger } from '../utils/logger';
import { formatCountdown, interruptibleSleep, sleep } from '../utils/retry';
import type { Sleeper } from '../utils/retry';

const logger = createModuleLogger('RetryPolicy');

export type CredentialsExpiredHandler = (message: string) => Promise<boolean> | boolean;
export type NetworkDegradedHandler = (message: string) => void;

export interface RetryPolicyConfig {
    networkDelays: readonly number[];
    maxNetworkAttempts: number;
    networkDegradedAfter: number;
    rateLimitWaitSeconds: number;
    progressIntervalSeconds: number;
    glitchRetries: number;
    glitchDelaySeconds: number;
}

export const DEFAULT_RETRY_CONFIG: RetryPolicyConfig = {
    networkDelays: NETWORK_RETRY_DELAYS,
    maxNetworkAttempts: MAX_NETWORK_ATTEMPTS,
    networkDegradedAfter: NETWORK_DEGRADED_AFTER_ATTEMPTS,
    rateLimitWaitSeconds: RATE_LIMIT_WAIT_SECONDS,
    progressIntervalSeconds: WAIT_PROGRESS_INTERVAL_SECONDS,
    glitchRetries: PAGINATION_GLITCH_RETRY.maxRetries,
    glitchDelaySeconds: PAGINATION_GLITCH_RETRY.delaySeconds,
};

export interface RetryPolicyOptions {
    token: CancellationToken;
    events?: SessionEventBus;
    sleeper?: Sleeper;
    onCredentialsExpired?: CredentialsExpiredHandler;
    onNetworkDegraded?: NetworkDegradedHandler;
    config?: Partial<RetryPolicyConfig>;
}

/**
 * Per-operation bookkeeping; discarded when the operation returns.
 */
export interface RetryContext {
    operation: string;
    networkAttempts: number;
    glitchRetries: number;
    failureClass?: FailureClass;
    nextDelaySeconds?: number;
}

export type RetryOutcome<T> =
    | { kind: 'ok'; value: T }
    /** Pagination glitch persisted past its retries */
    | { kind: 'end'; reason: string };

export interface ExecuteOptions {
    /** Re-establishes the upstream session after the caller refreshed credentials */
    reauthenticate?: () => Promise<void>;
}

export class RetryPolicy {
    private readonly token: CancellationToken;
    private readonly events?: SessionEventBus;
    private readonly sleeper: Sleeper;
    private readonly onCredentialsExpired?: CredentialsExpiredHandler;
    private readonly onNetworkDegraded?: NetworkDegradedHandler;
    private readonly config: RetryPolicyConfig;

    constructor(options: RetryPolicyOptions) {
        this.token = options.token;
        this.events = options.events;
        this.sleeper = options.sleeper ?? sleep;
        this.onCredentialsExpired = options.onCredentialsExpired;
        this.onNetworkDegraded = options.onNetworkDegraded;
        this.config = { ...DEFAULT_RETRY_CONFIG, ...options.config };
    }

    async execute<T>(operation: string, fn: () => Promise<T>, options: ExecuteOptions = {}): Promise<RetryOutcome<T>> {
        const context: RetryContext = { operation, networkAttempts: 0, glitchRetries: 0 };
        let needsReauth = false;

        while (true) {
            this.token.throwIfCancelled(operation);
            try {
                if (needsReauth) {
                    if (options.reauthenticate) {
                        await options.reauthenticate();
                    }
                    needsReauth = false;
                }
                return { kind: 'ok', value: await fn() };
            } catch (error) {
                if (IngestionError.isCancellation(error)) {
                    throw error;
                }

                const { failureClass, message } = classifyFailure(error);
                context.failureClass = failureClass;

                switch (failureClass) {
                    case FailureClass.AUTH_EXPIRED:
                        await this.handleAuthExpired(context, message, error);
                        needsReauth = true;
                        break;
                    case FailureClass.RATE_LIMITED:
                        await this.handleRateLimit(context, message);
                        break;
                    case FailureClass.NETWORK:
                        await this.handleNetwork(context, message, error);
                        break;
                    case FailureClass.PAGINATION_GLITCH: {
                        const exhausted = await this.handleGlitch(context, message);
                        if (exhausted) {
                            return { kind: 'end', reason: message };
                        }
                        break;
                    }
                    case FailureClass.UNKNOWN:
                        this.log(`Unrecoverable error during ${operation}: ${message}`, 'error', error);
                        throw error instanceof IngestionError
                            ? error
                            : IngestionErrors.unknown(message, { operation }, error instanceof Error ? error : undefined);
                }
            }
        }
    }

    private async handleAuthExpired(context: RetryContext, message: string, error: unknown): Promise<void> {
        const notice = `Authentication failed during ${context.operation}: ${message}`;
        this.log(notice, 'warn');
        this.events?.emitCredentialsExpired(notice);

        const refreshed = this.onCredentialsExpired ? await this.onCredentialsExpired(notice) : false;
        this.token.throwIfCancelled(context.operation);

        if (!refreshed) {
            throw IngestionErrors.authExpired(
                `Credentials expired: ${message}`,
                { operation: context.operation },
                error instanceof Error ? error : undefined
            );
        }
        this.log('Credentials updated, retrying operation...');
    }

    private async handleRateLimit(context: RetryContext, message: string): Promise<void> {
        const waitSeconds = this.config.rateLimitWaitSeconds;
        this.log(`Rate limit hit during ${context.operation}. Waiting ${Math.round(waitSeconds / 60)} minutes...`, 'warn');
        context.nextDelaySeconds = waitSeconds;
        this.events?.emitBackoff({
            operation: context.operation,
            failureClass: FailureClass.RATE_LIMITED,
            attempt: context.networkAttempts,
            delaySeconds: waitSeconds,
            message,
        });
        await this.wait(waitSeconds, context.operation);
        this.log('Rate limit wait over, resuming...');
    }

    private async handleNetwork(context: RetryContext, message: string, error: unknown): Promise<void> {
        context.networkAttempts += 1;
        const attempt = context.networkAttempts;
        const delays = this.config.networkDelays;
        const delaySeconds = delays[Math.min(attempt - 1, delays.length - 1)];
        context.nextDelaySeconds = delaySeconds;

        const notice =
            `Network error during ${context.operation} (attempt ${attempt}/${this.config.maxNetworkAttempts}): ${message}. ` +
            `Retrying in ${delaySeconds}s...`;
        this.log(notice, 'warn');

        if (attempt >= this.config.networkDegradedAfter) {
            this.events?.emitNetworkDegraded(notice);
            this.onNetworkDegraded?.(notice);
        }

        this.events?.emitBackoff({
            operation: context.operation,
            failureClass: FailureClass.NETWORK,
            attempt,
            delaySeconds,
            message,
        });
        await this.wait(delaySeconds, context.operation);

        if (attempt >= this.config.maxNetworkAttempts) {
            throw IngestionErrors.networkUnavailable(
                `Network unavailable after ${attempt} attempts: ${message}`,
                { operation: context.operation, attempts: attempt },
                error instanceof Error ? error : undefined
            );
        }
    }

    /**
     * Returns true once the glitch retries are used up.
     */
    private async handleGlitch(context: RetryContext, message: string): Promise<boolean> {
        if (context.glitchRetries >= this.config.glitchRetries) {
            this.log(`Still failing after ${context.glitchRetries} retries during ${context.operation}; treating as end of results`, 'warn');
            return true;
        }
        context.glitchRetries += 1;
        const delaySeconds = this.config.glitchDelaySeconds;
        context.nextDelaySeconds = delaySeconds;
        this.log(`Transient pagination error (${context.glitchRetries}/${this.config.glitchRetries}): ${message}. Retrying in ${delaySeconds}s...`, 'warn');
        this.events?.emitBackoff({
            operation: context.operation,
            failureClass: FailureClass.PAGINATION_GLITCH,
            attempt: context.glitchRetries,
            delaySeconds,
            message,
        });
        await this.wait(delaySeconds, context.operation);
        return false;
    }

    private async wait(seconds: number, operation: string): Promise<void> {
        await interruptibleSleep(seconds, {
            shouldStop: () => this.token.isCancelled,
            sleeper: this.sleeper,
            notifyEverySeconds: this.config.progressIntervalSeconds,
            onTick: (remaining) => this.events?.emitStatus(`Resuming in ${formatCountdown(remaining)}`),
            operation,
        });
    }

    private log(message: string, level: 'info' | 'warn' | 'error' = 'info', error?: unknown): void {
        if (level === 'error') {
            logger.error(message, error instanceof Error ? error : undefined);
        } else if (level === 'warn') {
            logger.warn(message);
        } else {
            logger.info(message);
        }
        this.events?.emitLog(message, level);
    }
}
