/**
 * tweet-ingest
 *
 * Resumable tweet collection: paginated search, author batches and direct
 * links, exported to CSV or XLSX with crash-safe checkpoints.
 */

export * from './config/constants';
export * from './core';
export * from './types';
export * from './utils';
