/**
 * Shared lifecycle of the two upstream runners (paginated search, direct links):
 * authenticate, run, then always flush the sink and save a final checkpoint.
 *
 * AuthExpired and NetworkUnavailable leave the runner after the final save;
 * cancellation and every other failure end it as ABORTED.
 */

import { ErrorClassifier, IngestionError } from './errors';
import { SessionEventBus } from './event-bus';
import { RetryPolicy } from './retry-policy';
import { CancellationToken } from './stop-signal';
import type { UpstreamClient, UpstreamSession } from '../types/upstream';
import type { ExportSink } from '../utils/export';
import { createModuleLogger } from '../utils/logger';
import type { ModuleLogger } from '../utils/logger';

export type EngineState =
    | 'AUTHENTICATING'
    | 'SEARCHING'
    | 'CONSUMING_PAGE'
    | 'ADVANCING_PAGE'
    | 'PROMPT_NEEDED'
    | 'DONE'
    | 'ABORTED';

export type TerminalState = 'DONE' | 'ABORTED';

export interface RunnerBaseOptions {
    client: UpstreamClient;
    sink: ExportSink;
    retryPolicy: RetryPolicy;
    token: CancellationToken;
    events: SessionEventBus;
}

export abstract class SessionRunner<TResult> {
    protected readonly logger: ModuleLogger;
    protected state: EngineState | null = null;
    protected terminal: TerminalState = 'ABORTED';
    protected stopReason = '';
    protected cancelled = false;
    protected error?: string;
    protected session: UpstreamSession | null = null;

    protected constructor(protected readonly base: RunnerBaseOptions, moduleName: string) {
        this.logger = createModuleLogger(moduleName);
    }

    /**
     * Runs to a terminal state. Resolves for DONE / ABORTED; rejects only
     * with session-fatal IngestionErrors.
     */
    public async run(): Promise<TResult> {
        let fatal: IngestionError | null = null;

        try {
            this.transition('AUTHENTICATING');
            await this.authenticate();
            await this.execute();
        } catch (error) {
            if (IngestionError.isCancellation(error)) {
                this.cancelled = true;
                this.finish('ABORTED', error.message);
            } else if (IngestionError.isSessionFatal(error)) {
                fatal = error;
                this.finish('ABORTED', error.message);
            } else {
                const classified = ErrorClassifier.classify(error);
                this.error = classified.message;
                this.logger.error(`Run aborted: ${classified.message}`, classified);
                this.finish('ABORTED', `Error: ${classified.message}`);
            }
        }

        await this.finalize();
        await this.closeSession();

        if (fatal) {
            throw fatal.withContext(this.resumeContext());
        }
        return this.buildResult();
    }

    /** Main loop; returns after calling finish() or throws */
    protected abstract execute(): Promise<void>;

    /** Flushes the sink and persists progress */
    protected abstract checkpoint(completed: boolean): Promise<void>;

    protected abstract buildResult(): TResult;

    protected abstract resumeContext(): Record<string, unknown>;

    protected get hasMore(): boolean {
        return this.terminal === 'ABORTED';
    }

    protected transition(to: EngineState): void {
        const from = this.state;
        if (from === to) return;
        this.state = to;
        this.logger.debug(`State ${from ?? '-'} -> ${to}`);
        this.base.events.emitState({ from, to });
    }

    protected finish(state: TerminalState, reason: string): void {
        this.terminal = state;
        this.stopReason = reason;
        this.transition(state);
    }

    protected async authenticate(): Promise<void> {
        const outcome = await this.base.retryPolicy.execute('authenticate', () => this.base.client.authenticate());
        if (outcome.kind === 'end') {
            throw ErrorClassifier.classify(new Error(`Authentication returned no session: ${outcome.reason}`));
        }
        this.session = outcome.value;
        this.log('Authenticated with upstream');
    }

    /**
     * Handed to the retry policy: replaces the handle after the caller
     * refreshed credentials.
     */
    protected readonly reauthenticate = async (): Promise<void> => {
        const previous = this.session;
        this.session = null;
        if (previous) {
            await this.closeHandle(previous);
        }
        this.session = await this.base.client.authenticate();
        this.log('Re-authenticated with refreshed credentials');
    };

    protected requireSession(): UpstreamSession {
        if (!this.session) {
            throw ErrorClassifier.classify(new Error('Upstream session not initialized'));
        }
        return this.session;
    }

    protected log(message: string, level: 'info' | 'warn' | 'error' = 'info'): void {
        if (level === 'warn') {
            this.logger.warn(message);
        } else if (level === 'error') {
            this.logger.error(message);
        } else {
            this.logger.info(message);
        }
        this.base.events.emitLog(message, level);
    }

    private async finalize(): Promise<void> {
        try {
            await this.checkpoint(this.terminal === 'DONE');
        } catch (error) {
            const classified = ErrorClassifier.classify(error);
            this.logger.error('Final flush/save failed', classified);
            this.error = this.error ?? `Final save failed: ${classified.message}`;
        }
    }

    private async closeSession(): Promise<void> {
        if (!this.session) return;
        await this.closeHandle(this.session);
        this.session = null;
    }

    private async closeHandle(session: UpstreamSession): Promise<void> {
        try {
            await session.close();
        } catch (error) {
            this.logger.warn('Failed to close upstream session', {
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }
}
