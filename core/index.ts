/**
 * Core Module Exports
 * 统一导出核心模块，建立清晰的模块边界
 */

// Errors
export { ErrorClassifier, ErrorCode, type ErrorContext, IngestionError, IngestionErrors } from './errors';
export { classifyFailure, type ClassifiedFailure, FailureClass } from './error-classifier';

// Events & cancellation
export * from './event-bus';
export { CancellationToken, createCancellationToken } from './stop-signal';

// Retry & pacing
export * from './retry-policy';
export { Cooldown, type CooldownDeps } from './cooldown';

// State
export { CheckpointStore } from './checkpoint-store';
export { Deduplicator } from './deduplicator';
export { env, type Env } from './env';

// Runners
export { type EngineState, type RunnerBaseOptions, SessionRunner, type TerminalState } from './session-runner';
export * from './pagination-engine';
export * from './link-runner';
export * from './session-orchestrator';
