/**
 * Pagination Engine
 *
 * AUTHENTICATING -> SEARCHING -> CONSUMING_PAGE -> ADVANCING_PAGE
 *   -> { CONSUMING_PAGE | PROMPT_NEEDED | DONE | ABORTED }
 *
 * Per record: normalize, dedupe, keyword filter, append, periodic checkpoint,
 * cooldown. Every upstream call goes through the retry policy.
 */

import { EMPTY_PAGE_THRESHOLDS } from '../config/constants';
import type { EmptyPageThresholds } from '../config/constants';
import { Cooldown } from './cooldown';
import { Deduplicator } from './deduplicator';
import { IngestionErrors } from './errors';
import type { EmptyPagePromptData } from './event-bus';
import { SessionRunner } from './session-runner';
import type { RunnerBaseOptions, TerminalState } from './session-runner';
import type { UpstreamPage } from '../types/upstream';
import { DateUtils } from '../utils/date-utils';
import { normalizeErrorMeta } from '../utils/logger';
import { matchesKeywords } from '../utils/query';
import type { KeywordOperator } from '../utils/query';
import { normalizeTweet } from '../utils/tweet-normalizer';

export type PromptDecision = 'continue' | 'stop';

export type EmptyPagePromptHandler = (
    info: EmptyPagePromptData
) => Promise<PromptDecision | undefined> | PromptDecision | undefined;

export interface EngineCheckpoint {
    count: number;
    seenIds: string[];
    cursor?: string;
    outputRows: number;
    outputBytes?: number;
    completed: boolean;
}

export type CheckpointWriter<T> = (checkpoint: T) => Promise<void>;

export interface PaginationEngineOptions extends RunnerBaseOptions {
    query: string;
    saveInterval: number;
    onCheckpoint: CheckpointWriter<EngineCheckpoint>;
    deduplicator?: Deduplicator;
    keywords?: string[];
    operator?: KeywordOperator;
    /** Start of the requested date range; older records end the run */
    since?: Date;
    maxRecords?: number;
    /** Accepted count restored from a checkpoint */
    initialCount?: number;
    /** Next-page token restored from a checkpoint */
    cursor?: string;
    cooldown?: Cooldown;
    onEmptyPagePrompt?: EmptyPagePromptHandler;
    thresholds?: Partial<EmptyPageThresholds>;
}

export interface DateRangeSummary {
    oldest?: string;
    newest?: string;
    reachedStart: boolean;
}

export interface PaginationResult {
    state: TerminalState;
    outputPath: string;
    /** Total accepted, including records restored from a checkpoint */
    count: number;
    /** Accepted during this run */
    accepted: number;
    seenIds: string[];
    hasMore: boolean;
    cancelled: boolean;
    stopReason: string;
    error?: string;
    cursor?: string;
    pages: number;
    duplicates: number;
    unusable: number;
    filtered: number;
    unparsedDates: number;
    promptsEmitted: number;
    dateRange: DateRangeSummary;
    dateRangeComplete: boolean;
}

type PageOutcome = number | 'limit' | 'reached-start';

export class PaginationEngine extends SessionRunner<PaginationResult> {
    private readonly dedupe: Deduplicator;
    private readonly thresholds: EmptyPageThresholds;
    private count: number;
    private accepted = 0;
    private lastCheckpointCount: number;
    private cursor?: string;
    private pages = 0;
    private duplicates = 0;
    private unusable = 0;
    private filtered = 0;
    private unparsedDates = 0;
    private consecutiveEmpty = 0;
    private totalEmpty = 0;
    private promptedThisStreak = false;
    private promptsEmitted = 0;
    private oldest: Date | null = null;
    private newest: Date | null = null;
    private reachedStart = false;
    private exhausted = false;

    constructor(private readonly options: PaginationEngineOptions) {
        super(options, 'PaginationEngine');
        this.dedupe = options.deduplicator ?? new Deduplicator();
        this.thresholds = { ...EMPTY_PAGE_THRESHOLDS, ...options.thresholds };
        this.count = options.initialCount ?? 0;
        this.lastCheckpointCount = this.count;
        this.cursor = options.cursor;
        options.cooldown?.resetAt(this.count);
    }

    protected async execute(): Promise<void> {
        const { query, retryPolicy, token } = this.options;

        this.transition('SEARCHING');
        this.log(this.cursor ? `Resuming search "${query}" from saved cursor` : `Searching "${query}"`);
        const searchOptions = this.cursor ? { cursor: this.cursor } : undefined;
        const first = await retryPolicy.execute('search', () => this.requireSession().search(query, searchOptions), {
            reauthenticate: this.reauthenticate,
        });
        if (first.kind === 'end') {
            this.exhausted = true;
            this.finish('DONE', `No results (${first.reason})`);
            return;
        }

        let page: UpstreamPage = first.value;
        if (page.cursor) this.cursor = page.cursor;

        while (true) {
            this.transition('CONSUMING_PAGE');
            token.throwIfCancelled('page');
            this.pages += 1;

            const outcome = await this.consumePage(page);
            if (outcome === 'limit' || this.limitReached()) {
                this.finish('DONE', `Reached target of ${this.options.maxRecords} tweets`);
                return;
            }
            if (outcome === 'reached-start') {
                this.reachedStart = true;
                this.finish('DONE', 'Reached start date');
                return;
            }

            if (outcome === 0) {
                const stop = await this.handleEmptyPage();
                if (stop) {
                    this.finish('DONE', stop);
                    return;
                }
            } else {
                this.consecutiveEmpty = 0;
                this.promptedThisStreak = false;
            }

            this.transition('ADVANCING_PAGE');
            token.throwIfCancelled('advance');
            const current = page;
            const next = await retryPolicy.execute('next-page', () => current.next(), {
                reauthenticate: this.reauthenticate,
            });
            if (next.kind === 'end' || next.value === null) {
                this.exhausted = true;
                this.finish('DONE', 'End of results');
                return;
            }
            page = next.value;
            if (page.cursor) this.cursor = page.cursor;
        }
    }

    private limitReached(): boolean {
        const max = this.options.maxRecords;
        return max !== undefined && this.count >= max;
    }

    private async consumePage(page: UpstreamPage): Promise<PageOutcome> {
        const { sink, token, events, keywords, operator, since, saveInterval, cooldown, maxRecords } = this.options;
        let acceptedOnPage = 0;
        let oldestOnPage: Date | null = null;

        for (const raw of page.records()) {
            token.throwIfCancelled('record');
            if (this.limitReached()) {
                return 'limit';
            }

            const tweet = normalizeTweet(raw);
            if (!tweet) {
                this.unusable += 1;
                const skipped = IngestionErrors.unusableRecord('Skipping unusable record', { query: this.options.query });
                this.logger.debug(skipped.message, normalizeErrorMeta(skipped, {}));
                continue;
            }
            if (!this.dedupe.markSeen(tweet.id)) {
                this.duplicates += 1;
                continue;
            }
            if (tweet.parsedDate && (!oldestOnPage || tweet.parsedDate < oldestOnPage)) {
                oldestOnPage = tweet.parsedDate;
            }
            if (!matchesKeywords(tweet.text, keywords, operator)) {
                this.filtered += 1;
                continue;
            }

            sink.append(tweet);
            this.count += 1;
            this.accepted += 1;
            acceptedOnPage += 1;
            this.trackDate(tweet.parsedDate);
            events.emitProgress({ current: this.count, target: maxRecords, action: 'collecting' });

            if (this.count - this.lastCheckpointCount >= saveInterval) {
                await this.checkpoint(false);
            }
            if (cooldown) {
                await cooldown.maybeRest(this.count);
            }
        }

        if (since && oldestOnPage && oldestOnPage.getTime() < since.getTime()) {
            return 'reached-start';
        }
        return acceptedOnPage;
    }

    /**
     * Returns a stop reason when the empty streak ends the run.
     */
    private async handleEmptyPage(): Promise<string | null> {
        const { noResults, prompt, ceiling, noticeEvery } = this.thresholds;
        this.consecutiveEmpty += 1;
        this.totalEmpty += 1;

        if (this.consecutiveEmpty % noticeEvery === 0) {
            this.options.events.emitStatus(
                `No new tweets on the last ${this.consecutiveEmpty} pages (${this.totalEmpty} empty pages in total)`
            );
        }

        if (this.count === 0) {
            return this.consecutiveEmpty >= noResults ? 'No matching tweets found' : null;
        }

        if (this.consecutiveEmpty >= ceiling) {
            return `No new tweets after ${this.consecutiveEmpty} consecutive empty pages`;
        }

        if (this.consecutiveEmpty >= prompt && !this.promptedThisStreak) {
            this.promptedThisStreak = true;
            this.transition('PROMPT_NEEDED');
            const info: EmptyPagePromptData = {
                consecutiveEmptyPages: this.consecutiveEmpty,
                totalEmptyPages: this.totalEmpty,
                count: this.count,
                oldestDate: this.oldest ? DateUtils.formatTimestamp(this.oldest) : undefined,
            };
            this.promptsEmitted += 1;
            this.options.events.emitPrompt(info);
            this.log(`${this.consecutiveEmpty} consecutive empty pages; waiting for a decision`, 'warn');

            const decision = this.options.onEmptyPagePrompt ? await this.options.onEmptyPagePrompt(info) : undefined;
            this.options.token.throwIfCancelled('prompt');
            if (decision === 'stop') {
                return 'Stopped at empty-page prompt';
            }
        }
        return null;
    }

    private trackDate(date: Date | null): void {
        if (!date) {
            this.unparsedDates += 1;
            return;
        }
        if (!this.oldest || date < this.oldest) this.oldest = date;
        if (!this.newest || date > this.newest) this.newest = date;
    }

    protected async checkpoint(completed: boolean): Promise<void> {
        const marker = await this.options.sink.flush();
        this.lastCheckpointCount = this.count;
        await this.options.onCheckpoint({
            count: this.count,
            seenIds: this.dedupe.snapshot(),
            cursor: this.cursor,
            outputRows: marker.rows,
            outputBytes: marker.bytes,
            completed,
        });
    }

    protected resumeContext(): Record<string, unknown> {
        return { count: this.count, cursor: this.cursor, outputPath: this.options.sink.outputPath };
    }

    protected buildResult(): PaginationResult {
        const dateRange: DateRangeSummary = {
            oldest: this.oldest ? DateUtils.formatTimestamp(this.oldest) : undefined,
            newest: this.newest ? DateUtils.formatTimestamp(this.newest) : undefined,
            reachedStart: this.reachedStart,
        };

        this.options.events.emitComplete({
            mode: 'search',
            count: this.count,
            outputPath: this.options.sink.outputPath,
            stopReason: this.stopReason,
        });

        return {
            state: this.terminal,
            outputPath: this.options.sink.outputPath,
            count: this.count,
            accepted: this.accepted,
            seenIds: this.dedupe.snapshot(),
            hasMore: this.hasMore,
            cancelled: this.cancelled,
            stopReason: this.stopReason,
            error: this.error,
            cursor: this.cursor,
            pages: this.pages,
            duplicates: this.duplicates,
            unusable: this.unusable,
            filtered: this.filtered,
            unparsedDates: this.unparsedDates,
            promptsEmitted: this.promptsEmitted,
            dateRange,
            dateRangeComplete: this.reachedStart || (this.terminal === 'DONE' && this.exhausted),
        };
    }
}
