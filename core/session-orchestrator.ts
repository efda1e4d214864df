/**
 * Session Orchestrator
 *
 * Composes the runners into the three run modes:
 *   single  one author or keyword query
 *   batch   author queries in sequence, one output file each
 *   links   direct tweet links fetched one by one
 *
 * All input is validated before authentication. Each flow can resume from a
 * saved session state.
 */

import type { EmptyPageThresholds } from '../config/constants';
import { CheckpointStore } from './checkpoint-store';
import { Cooldown } from './cooldown';
import { Deduplicator } from './deduplicator';
import { IngestionError, IngestionErrors } from './errors';
import { SessionEventBus } from './event-bus';
import type { ProgressData, StatusData } from './event-bus';
import { LinkRunner } from './link-runner';
import type { LinkCheckpoint, LinkRunResult } from './link-runner';
import { PaginationEngine } from './pagination-engine';
import type { EmptyPagePromptHandler, EngineCheckpoint, PaginationResult } from './pagination-engine';
import { RetryPolicy } from './retry-policy';
import type { CredentialsExpiredHandler, NetworkDegradedHandler, RetryPolicyConfig } from './retry-policy';
import { CancellationToken } from './stop-signal';
import { batchSettingsSchema, linksSettingsSchema, singleQuerySettingsSchema } from '../types/config';
import type {
    BatchRequest,
    BatchSettings,
    CooldownSettings,
    LinksRequest,
    LinksSettings,
    SingleQueryRequest,
    SingleQuerySettings,
} from '../types/config';
import type {
    BatchOutcome,
    BatchSessionState,
    LinksSessionState,
    SessionState,
    SingleSessionState,
} from '../types/session';
import type { UpstreamClient } from '../types/upstream';
import { createExportSink } from '../utils/export';
import type { ExportSink } from '../utils/export';
import { buildOutputPath } from '../utils/fileutils';
import { loadLinksFile } from '../utils/links-file';
import { createModuleLogger } from '../utils/logger';
import { buildSearchQuery } from '../utils/query';
import type { Sleeper } from '../utils/retry';
import { parseTweetLink, validateDateRange, validateTwitterUsername } from '../utils/validation';
import type { DateRange } from '../utils/validation';
import type { ZodError } from 'zod';

const logger = createModuleLogger('SessionOrchestrator');

/**
 * Caller-facing hooks shared by every flow.
 */
export interface SessionControls {
    /** Running count (number) or status text (string) */
    onProgress?: (update: number | string) => void;
    /** Polled; never pushed */
    shouldStop?: () => boolean;
    /** Resolve true once credentials were refreshed */
    onCredentialsExpired?: CredentialsExpiredHandler;
    onNetworkDegraded?: NetworkDegradedHandler;
    onEmptyPagePrompt?: EmptyPagePromptHandler;
    /** Programmatic cancellation; takes precedence over `shouldStop` */
    token?: CancellationToken;
}

export interface OrchestratorDeps {
    client: UpstreamClient;
    store: CheckpointStore;
    events?: SessionEventBus;
    sleeper?: Sleeper;
    random?: () => number;
    now?: () => Date;
    retryConfig?: Partial<RetryPolicyConfig>;
    thresholds?: Partial<EmptyPageThresholds>;
}

export interface SingleRunResult extends PaginationResult {
    mode: 'single';
    query: string;
}

export interface BatchRunResult {
    mode: 'batch';
    outcomes: BatchOutcome[];
    totalCount: number;
    succeeded: number;
    hasMore: boolean;
    cancelled: boolean;
    stopReason: string;
}

export interface LinksRunResult extends LinkRunResult {
    mode: 'links';
    /** Entries that did not look like tweet links */
    invalid: string[];
    /** Links dropped up front as repeats of an earlier link */
    duplicates: number;
}

export type SessionRunResult = SingleRunResult | BatchRunResult | LinksRunResult;

interface SessionContext {
    token: CancellationToken;
    events: SessionEventBus;
    retryPolicy: RetryPolicy;
    dispose: () => void;
}

export interface PreparedLinks {
    valid: string[];
    invalid: string[];
    duplicates: number;
}

function formatIssues(error: ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ');
}

/**
 * Keeps well-formed links, first occurrence per tweet id.
 */
export function prepareLinks(entries: string[]): PreparedLinks {
    const seen = new Deduplicator();
    const valid: string[] = [];
    const invalid: string[] = [];
    let duplicates = 0;

    for (const entry of entries) {
        const link = entry.trim();
        if (!link) continue;
        const id = parseTweetLink(link);
        if (!id) {
            invalid.push(link);
        } else if (!seen.markSeen(id)) {
            duplicates += 1;
        } else {
            valid.push(link);
        }
    }
    return { valid, invalid, duplicates };
}

export class SessionOrchestrator {
    private readonly now: () => Date;

    constructor(private readonly deps: OrchestratorDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    // ==================== single ====================

    async runSingle(request: SingleQueryRequest, controls: SessionControls = {}, resumeFrom?: SessionState): Promise<SingleRunResult> {
        const parsed = singleQuerySettingsSchema.safeParse(request);
        if (!parsed.success) {
            throw IngestionErrors.malformedInput(formatIssues(parsed.error));
        }
        let resume: SingleSessionState | undefined;
        if (resumeFrom) {
            if (resumeFrom.mode !== 'single') {
                throw IngestionErrors.malformedInput(`Cannot resume a ${resumeFrom.mode} session as single`);
            }
            resume = resumeFrom;
        }
        return this.startSingle(parsed.data, controls, resume);
    }

    private async startSingle(
        settings: SingleQuerySettings,
        controls: SessionControls,
        resume?: SingleSessionState
    ): Promise<SingleRunResult> {
        const range = this.resolveDateRange(settings, resume);
        const query = buildSearchQuery({
            username: settings.username,
            keywords: settings.keywords,
            operator: settings.operator,
            since: range.since,
            until: range.until,
        });

        if (resume) {
            await this.assertResumable(resume);
            if (resume.query !== query) {
                throw IngestionErrors.malformedInput(`Saved session is for "${resume.query}", not "${query}"`);
            }
        }

        const outputPath =
            resume?.outputPath ??
            buildOutputPath(settings.outputDir, settings.username ?? 'keywords', settings.format, this.now());
        const sink = createExportSink(settings.format, {
            outputPath,
            sheetTitle: settings.username ?? settings.keywords.join(' '),
            resumeFrom: resume ? { rows: resume.outputRows, bytes: resume.outputBytes } : undefined,
            now: this.now,
        });
        await sink.open();

        const writeState = async (checkpoint: EngineCheckpoint): Promise<void> => {
            const state: SingleSessionState = {
                mode: 'single',
                version: 0,
                timestamp: '',
                query,
                settings,
                outputPath,
                dateRange: { since: range.since, until: range.until },
                ...checkpoint,
            };
            await this.persist(state);
        };
        if (!resume) {
            await this.saveInitial(sink, writeState);
        }

        const context = this.createContext(controls);
        try {
            context.events.emitStatus(resume ? `Resuming "${query}" at ${resume.count} tweets` : `Starting "${query}"`);
            const engine = new PaginationEngine({
                client: this.deps.client,
                sink,
                retryPolicy: context.retryPolicy,
                token: context.token,
                events: context.events,
                query,
                saveInterval: settings.saveInterval,
                onCheckpoint: writeState,
                deduplicator: new Deduplicator(resume?.seenIds ?? []),
                keywords: settings.keywords,
                operator: settings.operator,
                since: range.sinceDate,
                maxRecords: settings.maxRecords,
                initialCount: resume?.count,
                cursor: resume?.cursor,
                cooldown: this.createCooldown(settings.cooldown, context),
                onEmptyPagePrompt: controls.onEmptyPagePrompt,
                thresholds: this.deps.thresholds,
            });
            const result = await engine.run();
            context.events.emitStatus(`${result.stopReason}. ${result.count} tweets saved to ${result.outputPath}`);
            return { ...result, mode: 'single', query };
        } catch (error) {
            throw this.annotate(error);
        } finally {
            context.dispose();
        }
    }

    // ==================== batch ====================

    async runBatch(request: BatchRequest, controls: SessionControls = {}, resumeFrom?: SessionState): Promise<BatchRunResult> {
        const parsed = batchSettingsSchema.safeParse(request);
        if (!parsed.success) {
            throw IngestionErrors.malformedInput(formatIssues(parsed.error));
        }
        let resume: BatchSessionState | undefined;
        if (resumeFrom) {
            if (resumeFrom.mode !== 'batch') {
                throw IngestionErrors.malformedInput(`Cannot resume a ${resumeFrom.mode} session as batch`);
            }
            resume = resumeFrom;
        }
        return this.startBatch(parsed.data, controls, resume);
    }

    private async startBatch(settings: BatchSettings, controls: SessionControls, resume?: BatchSessionState): Promise<BatchRunResult> {
        const range = this.resolveDateRange(settings, resume);
        const queries = resume ? resume.queries : settings.usernames;
        if (!queries.some((username) => validateTwitterUsername(username).valid)) {
            throw IngestionErrors.malformedInput('No valid usernames in batch');
        }
        if (resume) {
            await this.assertResumable(resume);
        }

        const outcomes: BatchOutcome[] = resume ? [...resume.results] : [];
        const startIndex = resume?.currentIndex ?? 0;
        let lastOutputPath = resume?.outputPath;
        let cancelled = false;

        const context = this.createContext(controls);
        try {
            for (let index = startIndex; index < queries.length; index++) {
                if (context.token.isCancelled) {
                    cancelled = true;
                    break;
                }

                const username = queries[index];
                const authorResume = resume && resume.inProgress && index === startIndex ? resume : undefined;
                context.events.emitStatus(`Author ${index + 1}/${queries.length}: @${username}`);

                let outcome: BatchOutcome;
                try {
                    const result = await this.runBatchAuthor(settings, range, queries, index, outcomes, context, controls, authorResume);
                    lastOutputPath = result.outputPath;
                    if (result.cancelled) {
                        cancelled = true;
                        break;
                    }
                    outcome = result.error
                        ? { username, status: 'failed', count: result.count, outputPath: result.outputPath, error: result.error }
                        : { username, status: 'success', count: result.count, outputPath: result.outputPath };
                } catch (error) {
                    if (IngestionError.isSessionFatal(error)) {
                        throw error;
                    }
                    if (IngestionError.isCancellation(error)) {
                        cancelled = true;
                        break;
                    }
                    const message = error instanceof Error ? error.message : String(error);
                    logger.warn(`Author @${username} failed: ${message}`);
                    outcome = { username, status: 'failed', count: 0, error: message };
                }

                outcomes.push(outcome);
                if (lastOutputPath) {
                    await this.persist({
                        mode: 'batch',
                        version: 0,
                        timestamp: '',
                        queries,
                        currentIndex: index + 1,
                        inProgress: false,
                        results: outcomes,
                        count: 0,
                        seenIds: [],
                        outputPath: lastOutputPath,
                        outputRows: 0,
                        dateRange: { since: range.since, until: range.until },
                        completed: index + 1 === queries.length,
                        settings,
                    });
                }
            }

            const succeeded = outcomes.filter((outcome) => outcome.status === 'success').length;
            const totalCount = outcomes.reduce((sum, outcome) => sum + outcome.count, 0);
            const stopReason = cancelled ? 'Stopped by user' : `${succeeded}/${queries.length} authors completed`;
            context.events.emitStatus(`${stopReason}, ${totalCount} tweets in total`);

            return {
                mode: 'batch',
                outcomes,
                totalCount,
                succeeded,
                hasMore: cancelled,
                cancelled,
                stopReason,
            };
        } catch (error) {
            throw this.annotate(error);
        } finally {
            context.dispose();
        }
    }

    private async runBatchAuthor(
        settings: BatchSettings,
        range: DateRange,
        queries: string[],
        index: number,
        outcomes: BatchOutcome[],
        context: SessionContext,
        controls: SessionControls,
        resume?: BatchSessionState
    ): Promise<PaginationResult> {
        const username = queries[index];
        const query = buildSearchQuery({
            username,
            keywords: settings.keywords,
            operator: settings.operator,
            since: range.since,
            until: range.until,
        });

        const outputPath = resume?.outputPath ?? buildOutputPath(settings.outputDir, username, settings.format, this.now());
        const sink = createExportSink(settings.format, {
            outputPath,
            sheetTitle: username,
            resumeFrom: resume ? { rows: resume.outputRows, bytes: resume.outputBytes } : undefined,
            now: this.now,
        });
        await sink.open();

        const writeState = async (checkpoint: EngineCheckpoint): Promise<void> => {
            const state: BatchSessionState = {
                mode: 'batch',
                version: 0,
                timestamp: '',
                queries,
                currentIndex: index,
                inProgress: true,
                results: outcomes,
                settings,
                outputPath,
                dateRange: { since: range.since, until: range.until },
                ...checkpoint,
                // The batch is complete only once every author is done
                completed: false,
            };
            await this.persist(state);
        };
        if (!resume) {
            await this.saveInitial(sink, writeState);
        }

        const engine = new PaginationEngine({
            client: this.deps.client,
            sink,
            retryPolicy: context.retryPolicy,
            token: context.token,
            events: context.events,
            query,
            saveInterval: settings.saveInterval,
            onCheckpoint: writeState,
            deduplicator: new Deduplicator(resume?.seenIds ?? []),
            keywords: settings.keywords,
            operator: settings.operator,
            since: range.sinceDate,
            maxRecords: settings.maxRecords,
            initialCount: resume?.count,
            cursor: resume?.cursor,
            cooldown: this.createCooldown(settings.cooldown, context),
            onEmptyPagePrompt: controls.onEmptyPagePrompt,
            thresholds: this.deps.thresholds,
        });
        return engine.run();
    }

    // ==================== links ====================

    async runLinks(request: LinksRequest, controls: SessionControls = {}, resumeFrom?: SessionState): Promise<LinksRunResult> {
        const parsed = linksSettingsSchema.safeParse(request);
        if (!parsed.success) {
            throw IngestionErrors.malformedInput(formatIssues(parsed.error));
        }
        let resume: LinksSessionState | undefined;
        if (resumeFrom) {
            if (resumeFrom.mode !== 'links') {
                throw IngestionErrors.malformedInput(`Cannot resume a ${resumeFrom.mode} session as links`);
            }
            resume = resumeFrom;
        }
        return this.startLinks(parsed.data, controls, resume);
    }

    private async startLinks(settings: LinksSettings, controls: SessionControls, resume?: LinksSessionState): Promise<LinksRunResult> {
        const entries = resume
            ? resume.links
            : [...settings.links, ...(settings.linksFile ? await loadLinksFile(settings.linksFile) : [])];
        const { valid, invalid, duplicates } = prepareLinks(entries);
        for (const link of invalid) {
            logger.warn(`Skipping malformed link: ${link}`);
        }
        if (valid.length === 0) {
            throw IngestionErrors.malformedInput('No valid tweet links found');
        }
        if (resume) {
            await this.assertResumable(resume);
        }

        const outputPath = resume?.outputPath ?? buildOutputPath(settings.outputDir, 'tweet_links', settings.format, this.now());
        const sink = createExportSink(settings.format, {
            outputPath,
            sheetTitle: 'tweet_links',
            resumeFrom: resume ? { rows: resume.outputRows, bytes: resume.outputBytes } : undefined,
            now: this.now,
        });
        await sink.open();

        const writeState = async (checkpoint: LinkCheckpoint): Promise<void> => {
            await this.persist({
                mode: 'links',
                version: 0,
                timestamp: '',
                links: valid,
                currentIndex: checkpoint.processed.length,
                failed: checkpoint.failed,
                skipped: checkpoint.skipped,
                count: checkpoint.count,
                seenIds: checkpoint.processed,
                outputPath,
                outputRows: checkpoint.outputRows,
                outputBytes: checkpoint.outputBytes,
                completed: checkpoint.completed,
                settings,
            });
        };
        if (!resume) {
            const marker = await sink.flush();
            await writeState({
                count: 0,
                processed: [],
                failed: 0,
                skipped: 0,
                outputRows: marker.rows,
                outputBytes: marker.bytes,
                completed: false,
            });
        }

        const context = this.createContext(controls);
        try {
            for (const link of invalid) {
                context.events.emitStatus(`Skipping malformed link: ${link}`);
            }
            const runner = new LinkRunner({
                client: this.deps.client,
                sink,
                retryPolicy: context.retryPolicy,
                token: context.token,
                events: context.events,
                links: valid,
                saveInterval: settings.saveInterval,
                delaySeconds: settings.delaySeconds,
                onCheckpoint: writeState,
                processed: resume?.seenIds,
                initialCount: resume?.count,
                failed: resume?.failed,
                skipped: resume?.skipped,
                cooldown: this.createCooldown(settings.cooldown, context),
                sleeper: this.deps.sleeper,
            });
            const result = await runner.run();
            context.events.emitStatus(
                `${result.stopReason}. ${result.count} tweets saved, ${result.failed} failed, ${result.skipped} skipped`
            );
            return { ...result, mode: 'links', invalid, duplicates };
        } catch (error) {
            throw this.annotate(error);
        } finally {
            context.dispose();
        }
    }

    // ==================== resume ====================

    /**
     * Re-runs a saved session with the settings it was started with.
     */
    async resume(state: SessionState, controls: SessionControls = {}): Promise<SessionRunResult> {
        switch (state.mode) {
            case 'single':
                return this.startSingle(this.settingsOf(singleQuerySettingsSchema.safeParse(state.settings)), controls, state);
            case 'batch':
                return this.startBatch(this.settingsOf(batchSettingsSchema.safeParse(state.settings)), controls, state);
            case 'links':
                return this.startLinks(this.settingsOf(linksSettingsSchema.safeParse(state.settings)), controls, state);
        }
    }

    // ==================== helpers ====================

    private settingsOf<T>(parsed: { success: true; data: T } | { success: false; error: ZodError }): T {
        if (!parsed.success) {
            throw IngestionErrors.malformedInput(`Saved settings are invalid: ${formatIssues(parsed.error)}`);
        }
        return parsed.data;
    }

    /**
     * A future end date is clamped to today when a session starts. Resumes take
     * the range saved with the session, so the query does not move past midnight.
     */
    private resolveDateRange(
        settings: { since?: string; until?: string },
        resume?: SingleSessionState | BatchSessionState
    ): DateRange {
        const pinned = resume?.dateRange;
        return pinned
            ? validateDateRange(pinned.since, pinned.until, this.now())
            : validateDateRange(settings.since, settings.until, this.now());
    }

    private createContext(controls: SessionControls): SessionContext {
        const token = controls.token ?? new CancellationToken(controls.shouldStop);
        const events = this.deps.events ?? new SessionEventBus();
        const retryPolicy = new RetryPolicy({
            token,
            events,
            sleeper: this.deps.sleeper,
            onCredentialsExpired: controls.onCredentialsExpired,
            onNetworkDegraded: controls.onNetworkDegraded,
            config: this.deps.retryConfig,
        });

        const onProgress = (data: ProgressData): void => controls.onProgress?.(data.current);
        const onStatus = (data: StatusData): void => controls.onProgress?.(data.message);
        events.on(events.events.PROGRESS, onProgress);
        events.on(events.events.STATUS, onStatus);

        return {
            token,
            events,
            retryPolicy,
            dispose: () => {
                events.off(events.events.PROGRESS, onProgress);
                events.off(events.events.STATUS, onStatus);
            },
        };
    }

    private createCooldown(settings: CooldownSettings, context: SessionContext): Cooldown | undefined {
        if (!settings.enabled) return undefined;
        return new Cooldown(settings, {
            token: context.token,
            events: context.events,
            sleeper: this.deps.sleeper,
            random: this.deps.random,
        });
    }

    private async saveInitial(sink: ExportSink, writeState: (checkpoint: EngineCheckpoint) => Promise<void>): Promise<void> {
        const marker = await sink.flush();
        await writeState({
            count: 0,
            seenIds: [],
            outputRows: marker.rows,
            outputBytes: marker.bytes,
            completed: false,
        });
    }

    private async assertResumable(state: SessionState): Promise<void> {
        const integrity = await this.deps.store.validateIntegrity(state);
        if (!integrity.success) {
            throw IngestionErrors.malformedInput(`Cannot resume: ${integrity.error}`);
        }
    }

    private async persist(state: SessionState): Promise<void> {
        const saved = await this.deps.store.save(state);
        if (!saved.success) {
            logger.warn(`Checkpoint not saved: ${saved.error}`);
        }
    }

    private annotate(error: unknown): unknown {
        if (IngestionError.isSessionFatal(error)) {
            error.withContext({ checkpointPath: this.deps.store.filePath });
            logger.error(error.getUserMessage(), error);
        }
        return error;
    }
}
