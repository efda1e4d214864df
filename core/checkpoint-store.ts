/**
 * Checkpoint Store
 *
 * Durable session state on disk. Single writer; one store per session.
 * Every method returns a Result and never throws.
 *
 * save(): previous primary -> `.backup`, then tmp file + rename.
 * load(): primary, falling back to the backup when the primary is not valid JSON.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CHECKPOINT_BACKUP_SUFFIX, CHECKPOINT_SCHEMA_VERSION } from '../config/constants';
import { env } from './env';
import { SessionEventBus } from './event-bus';
import { sessionStateSchema } from '../types/session';
import type { SessionState } from '../types/session';
import { createModuleLogger } from '../utils/logger';
import { fail, ok } from '../utils/result';
import type { Result } from '../utils/result';

const logger = createModuleLogger('CheckpointStore');

type ReadOutcome =
    | { kind: 'ok'; value: unknown }
    | { kind: 'missing' }
    | { kind: 'corrupt'; error: string };

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class CheckpointStore {
    public readonly filePath: string;
    public readonly backupPath: string;

    constructor(filePath: string = env.CHECKPOINT_PATH, private readonly events?: SessionEventBus) {
        this.filePath = path.resolve(filePath);
        this.backupPath = `${this.filePath}${CHECKPOINT_BACKUP_SUFFIX}`;
    }

    /**
     * Persists `state`, stamping version and timestamp.
     */
    public async save(state: SessionState): Promise<Result<SessionState>> {
        const stamped: SessionState = {
            ...state,
            version: CHECKPOINT_SCHEMA_VERSION,
            timestamp: new Date().toISOString(),
        };

        try {
            await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });

            if (fs.existsSync(this.filePath)) {
                await fs.promises.copyFile(this.filePath, this.backupPath);
            }

            const tmpPath = `${this.filePath}.tmp`;
            await fs.promises.writeFile(tmpPath, JSON.stringify(stamped, null, 2), 'utf-8');
            await fs.promises.rename(tmpPath, this.filePath);

            logger.debug('Session state saved', { mode: stamped.mode, count: stamped.count });
            return ok(stamped, `Saved ${stamped.mode} session (${stamped.count} tweets)`);
        } catch (error) {
            const message = `Failed to save session state: ${errorMessage(error)}`;
            this.log(message, 'error', error);
            return fail(message);
        }
    }

    public async load(): Promise<Result<SessionState>> {
        const primary = await this.readJson(this.filePath);
        if (primary.kind === 'ok') {
            return this.validate(primary.value, 'primary');
        }

        if (primary.kind === 'corrupt') {
            this.log(`Primary checkpoint is corrupt (${primary.error}); trying backup`, 'warn');
        }

        const backup = await this.readJson(this.backupPath);
        if (backup.kind === 'ok') {
            const result = this.validate(backup.value, 'backup');
            if (result.success) {
                this.log('Loaded session state from backup', 'warn');
            }
            return result;
        }

        if (primary.kind === 'missing' && backup.kind === 'missing') {
            return fail('No saved session found');
        }
        return fail(
            primary.kind === 'corrupt'
                ? `Session state is corrupt and no usable backup exists: ${primary.error}`
                : 'Session state is missing and the backup is unreadable'
        );
    }

    /**
     * Removes both primary and backup files.
     */
    public async clear(): Promise<Result<void>> {
        try {
            await fs.promises.rm(this.filePath, { force: true });
            await fs.promises.rm(this.backupPath, { force: true });
            await fs.promises.rm(`${this.filePath}.tmp`, { force: true });
            logger.info('Session state cleared', { path: this.filePath });
            return ok(undefined, 'Session state cleared');
        } catch (error) {
            const message = `Failed to clear session state: ${errorMessage(error)}`;
            this.log(message, 'error', error);
            return fail(message);
        }
    }

    /**
     * Confirms a loaded state can still be resumed: the output file exists and
     * the cursor has not run past the end of its list.
     */
    public async validateIntegrity(state?: SessionState): Promise<Result<SessionState>> {
        let target = state;
        if (!target) {
            const loaded = await this.load();
            if (!loaded.success) return loaded;
            target = loaded.data;
        }

        try {
            const stat = await fs.promises.stat(target.outputPath);
            if (!stat.isFile()) {
                return fail(`Output path is not a file: ${target.outputPath}`);
            }
        } catch {
            return fail(`Output file no longer exists: ${target.outputPath}`);
        }

        if (target.completed) {
            return fail('Session already completed; nothing to resume');
        }

        switch (target.mode) {
            case 'batch':
                if (target.currentIndex >= target.queries.length) {
                    return fail(`Batch already finished (${target.currentIndex}/${target.queries.length} authors)`);
                }
                break;
            case 'links':
                if (target.currentIndex >= target.links.length) {
                    return fail(`All ${target.links.length} links already processed`);
                }
                break;
            case 'single':
                break;
        }

        return ok(target, 'Session state is resumable');
    }

    /**
     * Human-readable summary of the stored state.
     */
    public async describe(): Promise<Result<string>> {
        const loaded = await this.load();
        if (!loaded.success) return loaded;

        const state = loaded.data;
        const lines = [`Mode: ${state.mode}`];
        switch (state.mode) {
            case 'single':
                lines.push(`Query: ${state.query}`);
                break;
            case 'batch': {
                const current = state.queries[state.currentIndex];
                lines.push(
                    current !== undefined
                        ? `Progress: author ${state.currentIndex + 1} of ${state.queries.length} (@${current})`
                        : `Progress: ${state.queries.length} of ${state.queries.length} authors done`
                );
                break;
            }
            case 'links':
                lines.push(`Progress: ${state.currentIndex}/${state.links.length} links`);
                lines.push(`Failed: ${state.failed}, skipped: ${state.skipped}`);
                break;
        }
        lines.push(`Tweets collected: ${state.count}`);
        lines.push(`Output: ${state.outputPath}`);
        lines.push(`Last saved: ${state.timestamp}`);
        if (state.completed) lines.push('Status: completed');

        return ok(lines.join('\n'));
    }

    /**
     * True when a non-empty primary checkpoint exists.
     */
    public exists(): boolean {
        try {
            return fs.existsSync(this.filePath) && fs.statSync(this.filePath).size > 0;
        } catch {
            return false;
        }
    }

    private async readJson(filePath: string): Promise<ReadOutcome> {
        let content: string;
        try {
            content = await fs.promises.readFile(filePath, 'utf-8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return { kind: 'missing' };
            }
            return { kind: 'corrupt', error: errorMessage(error) };
        }

        try {
            const value: unknown = JSON.parse(content);
            return { kind: 'ok', value };
        } catch (error) {
            return { kind: 'corrupt', error: errorMessage(error) };
        }
    }

    private validate(value: unknown, source: 'primary' | 'backup'): Result<SessionState> {
        const parsed = sessionStateSchema.safeParse(value);
        if (!parsed.success) {
            const issues = parsed.error.issues
                .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('; ');
            const message = `Invalid session state (${source}): ${issues}`;
            this.log(message, 'warn');
            return fail(message);
        }
        return ok(parsed.data, `Loaded ${parsed.data.mode} session from ${source}`);
    }

    private log(message: string, level: 'info' | 'warn' | 'error' = 'info', error?: unknown): void {
        if (level === 'error') {
            logger.error(message, error instanceof Error ? error : undefined);
        } else if (level === 'warn') {
            logger.warn(message);
        } else {
            logger.info(message);
        }
        this.events?.emitLog(`[CheckpointStore] ${message}`, level);
    }
}
