/**
 * Link Runner
 *
 * Fetches direct tweet links one by one (no pagination). Links already in the
 * processed set are skipped, so a resumed run never revisits them.
 */

import { Cooldown } from './cooldown';
import { ErrorClassifier, IngestionError, IngestionErrors } from './errors';
import type { CheckpointWriter } from './pagination-engine';
import { SessionRunner } from './session-runner';
import type { RunnerBaseOptions, TerminalState } from './session-runner';
import { normalizeErrorMeta } from '../utils/logger';
import { interruptibleSleep, sleep } from '../utils/retry';
import type { Sleeper } from '../utils/retry';
import { normalizeTweet } from '../utils/tweet-normalizer';
import { parseTweetLink } from '../utils/validation';

export interface LinkCheckpoint {
    count: number;
    /** Processed links, in processing order */
    processed: string[];
    failed: number;
    skipped: number;
    outputRows: number;
    outputBytes?: number;
    completed: boolean;
}

export interface LinkRunnerOptions extends RunnerBaseOptions {
    /** Validated, de-duplicated links */
    links: string[];
    saveInterval: number;
    delaySeconds: number;
    onCheckpoint: CheckpointWriter<LinkCheckpoint>;
    processed?: Iterable<string>;
    initialCount?: number;
    failed?: number;
    skipped?: number;
    cooldown?: Cooldown;
    sleeper?: Sleeper;
}

export interface LinkRunResult {
    state: TerminalState;
    outputPath: string;
    count: number;
    accepted: number;
    failed: number;
    skipped: number;
    processed: string[];
    hasMore: boolean;
    cancelled: boolean;
    stopReason: string;
    error?: string;
}

export class LinkRunner extends SessionRunner<LinkRunResult> {
    private readonly processed: Set<string>;
    private count: number;
    private accepted = 0;
    private failed: number;
    private skipped: number;
    private lastCheckpointCount: number;

    constructor(private readonly options: LinkRunnerOptions) {
        super(options, 'LinkRunner');
        this.processed = new Set(options.processed ?? []);
        this.count = options.initialCount ?? 0;
        this.failed = options.failed ?? 0;
        this.skipped = options.skipped ?? 0;
        this.lastCheckpointCount = this.count;
        options.cooldown?.resetAt(this.count);
    }

    protected async execute(): Promise<void> {
        const { links, token, events, saveInterval, cooldown } = this.options;
        const remaining = links.filter((link) => !this.processed.has(link));
        this.log(`Fetching ${remaining.length} of ${links.length} links`);

        for (let i = 0; i < remaining.length; i++) {
            const link = remaining[i];
            token.throwIfCancelled('link');
            events.emitStatus(`Link ${this.processed.size + 1}/${links.length}`);

            await this.fetchLink(link);
            this.processed.add(link);

            if (this.count - this.lastCheckpointCount >= saveInterval) {
                await this.checkpoint(false);
            }
            if (cooldown) {
                await cooldown.maybeRest(this.count);
            }
            if (i < remaining.length - 1 && this.options.delaySeconds > 0) {
                await interruptibleSleep(this.options.delaySeconds, {
                    shouldStop: () => token.isCancelled,
                    sleeper: this.options.sleeper ?? sleep,
                    operation: 'link-delay',
                });
            }
        }

        this.finish('DONE', `Processed ${this.processed.size} links`);
    }

    private async fetchLink(link: string): Promise<void> {
        const id = parseTweetLink(link);
        if (!id) {
            this.skipped += 1;
            this.log(`Skipping malformed link: ${link}`, 'warn');
            return;
        }

        try {
            const outcome = await this.options.retryPolicy.execute('fetch-by-id', () => this.requireSession().fetchById(id), {
                reauthenticate: this.reauthenticate,
            });
            const raw = outcome.kind === 'ok' ? outcome.value : null;
            if (raw === null || raw === undefined) {
                this.skipped += 1;
                this.log(`Tweet ${id} not found, skipping`, 'warn');
                return;
            }

            const tweet = normalizeTweet(raw);
            if (!tweet) {
                this.skipped += 1;
                const skipped = IngestionErrors.unusableRecord(`Tweet ${id} has no usable content, skipping`, { tweetId: id, link });
                this.logger.warn(skipped.message, normalizeErrorMeta(skipped, {}));
                this.base.events.emitLog(skipped.message, 'warn');
                return;
            }

            this.options.sink.append(tweet);
            this.count += 1;
            this.accepted += 1;
            this.options.events.emitProgress({ current: this.count, target: this.options.links.length, action: 'fetching' });
        } catch (error) {
            if (IngestionError.isCancellation(error) || IngestionError.isSessionFatal(error)) {
                throw error;
            }
            this.failed += 1;
            const classified = ErrorClassifier.classify(error);
            this.logger.error(`Failed to fetch ${link}`, classified);
            this.base.events.emitLog(`Failed to fetch ${link}: ${classified.message}`, 'error');
        }
    }

    protected async checkpoint(completed: boolean): Promise<void> {
        const marker = await this.options.sink.flush();
        this.lastCheckpointCount = this.count;
        await this.options.onCheckpoint({
            count: this.count,
            processed: Array.from(this.processed),
            failed: this.failed,
            skipped: this.skipped,
            outputRows: marker.rows,
            outputBytes: marker.bytes,
            completed,
        });
    }

    protected resumeContext(): Record<string, unknown> {
        return { count: this.count, outputPath: this.options.sink.outputPath };
    }

    protected buildResult(): LinkRunResult {
        this.options.events.emitComplete({
            mode: 'links',
            count: this.count,
            outputPath: this.options.sink.outputPath,
            stopReason: this.stopReason,
        });

        return {
            state: this.terminal,
            outputPath: this.options.sink.outputPath,
            count: this.count,
            accepted: this.accepted,
            failed: this.failed,
            skipped: this.skipped,
            processed: Array.from(this.processed),
            hasMore: this.hasMore,
            cancelled: this.cancelled,
            stopReason: this.stopReason,
            error: this.error,
        };
    }
}
