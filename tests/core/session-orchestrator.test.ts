/**
 * SessionOrchestrator 集成测试（进程内假上游）
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { CheckpointStore } from '../../core/checkpoint-store';
import { ErrorCode, IngestionError } from '../../core/errors';
import { prepareLinks, SessionOrchestrator } from '../../core/session-orchestrator';
import { CancellationToken } from '../../core/stop-signal';
import type { LinksSessionState, SessionState } from '../../types/session';
import { FakeUpstream, httpError, instantSleeper, rawTweet, tweetRange } from '../helpers/fake-upstream';

const link = (id: number) => `https://x.com/alice/status/${id}`;
const ALICE = '(from:alice) -filter:replies';
const BOB = '(from:bob) -filter:replies';
const CAROL = '(from:carol) -filter:replies';

describe('SessionOrchestrator', () => {
  let dir: string;
  let store: CheckpointStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'test-orchestrator-'));
    store = new CheckpointStore(path.join(dir, 'state.json'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function createOrchestrator(upstream: FakeUpstream): SessionOrchestrator {
    return new SessionOrchestrator({
      client: upstream,
      store,
      sleeper: instantSleeper(),
      now: () => new Date(2024, 5, 1, 10, 0, 0),
    });
  }

  async function loadState(): Promise<SessionState> {
    const loaded = await store.load();
    if (!loaded.success) throw new Error(loaded.error);
    return loaded.data;
  }

  function lineCount(file: string): number {
    return fs.readFileSync(file, 'utf-8').trimEnd().split('\n').length;
  }

  describe('single', () => {
    test('runs one author query and saves a completed state', async () => {
      const upstream = new FakeUpstream({ pagesByQuery: { [ALICE]: [tweetRange(1, 3)] } });
      const updates: Array<number | string> = [];
      const outputPath = path.resolve(dir, 'alice_20240601_100000.csv');

      const result = await createOrchestrator(upstream).runSingle(
        { username: 'alice', format: 'csv', outputDir: dir },
        { onProgress: (update) => updates.push(update) }
      );

      expect(result.mode).toBe('single');
      expect(result.query).toBe(ALICE);
      expect(result.count).toBe(3);
      expect(result.outputPath).toBe(outputPath);
      expect(lineCount(outputPath)).toBe(4);
      expect(updates).toEqual([
        `Starting "${ALICE}"`,
        1,
        2,
        3,
        `End of results. 3 tweets saved to ${outputPath}`,
      ]);

      const state = await loadState();
      expect(state).toEqual(expect.objectContaining({ mode: 'single', count: 3, completed: true, outputRows: 3 }));
    });

    test('rejects malformed input before authenticating', async () => {
      const upstream = new FakeUpstream();
      const orchestrator = createOrchestrator(upstream);

      const noQuery = await orchestrator.runSingle({ outputDir: dir }).catch((caught: unknown) => caught);
      expect(noQuery instanceof IngestionError && noQuery.code).toBe(ErrorCode.MALFORMED_INPUT);
      expect(noQuery instanceof IngestionError && noQuery.message).toBe(
        'Either a username or at least one keyword is required'
      );

      const badDate = await orchestrator
        .runSingle({ username: 'alice', since: '2024-13-01', outputDir: dir })
        .catch((caught: unknown) => caught);
      expect(badDate instanceof IngestionError && badDate.message).toBe(
        'Invalid start date "2024-13-01", expected YYYY-MM-DD'
      );

      expect(upstream.authenticateCalls).toBe(0);
      expect(store.exists()).toBe(false);
    });

    test('an explicit token wins over the stop predicate', async () => {
      const upstream = new FakeUpstream({ pagesByQuery: { [ALICE]: [tweetRange(1, 3)] } });
      const token = new CancellationToken();
      token.cancel();

      const result = await createOrchestrator(upstream).runSingle(
        { username: 'alice', format: 'csv', outputDir: dir },
        { token, shouldStop: () => false }
      );

      expect(result.cancelled).toBe(true);
      expect(result.hasMore).toBe(true);
      expect(upstream.authenticateCalls).toBe(0);
    });

    test('refuses to resume another mode', async () => {
      const state: LinksSessionState = {
        mode: 'links',
        links: [link(1)],
        currentIndex: 0,
        failed: 0,
        skipped: 0,
        version: 2,
        timestamp: '',
        count: 0,
        seenIds: [],
        outputPath: path.join(dir, 'links.csv'),
        outputRows: 0,
        completed: false,
        settings: {},
      };

      const error = await createOrchestrator(new FakeUpstream())
        .runSingle({ username: 'alice', outputDir: dir }, {}, state)
        .catch((caught: unknown) => caught);

      expect(error instanceof IngestionError && error.message).toBe('Cannot resume a links session as single');
    });
  });

  describe('batch', () => {
    test('one failing author does not stop the others', async () => {
      const upstream = new FakeUpstream({
        pagesByQuery: { [ALICE]: [tweetRange(1, 2)], [BOB]: [tweetRange(3, 4)], [CAROL]: [tweetRange(5, 5)] },
      });
      upstream.onPage = (_index, query) => {
        if (query === BOB) throw new Error('boom');
      };

      const result = await createOrchestrator(upstream).runBatch({
        usernames: ['alice', 'bob', 'carol'],
        format: 'csv',
        outputDir: dir,
      });

      expect(result.outcomes).toEqual([
        { username: 'alice', status: 'success', count: 2, outputPath: path.resolve(dir, 'alice_20240601_100000.csv') },
        {
          username: 'bob',
          status: 'failed',
          count: 0,
          outputPath: path.resolve(dir, 'bob_20240601_100000.csv'),
          error: 'boom',
        },
        { username: 'carol', status: 'success', count: 1, outputPath: path.resolve(dir, 'carol_20240601_100000.csv') },
      ]);
      expect(result.succeeded).toBe(2);
      expect(result.totalCount).toBe(3);
      expect(result.stopReason).toBe('2/3 authors completed');
      expect(result.hasMore).toBe(false);

      const state = await loadState();
      expect(state).toEqual(
        expect.objectContaining({ mode: 'batch', currentIndex: 3, inProgress: false, completed: true })
      );
    });

    test('resumes the interrupted author after a network failure', async () => {
      const upstream = new FakeUpstream({
        pagesByQuery: { [ALICE]: [tweetRange(1, 2)], [BOB]: [tweetRange(10, 12), tweetRange(13, 14)] },
      });
      let bobFailures = 0;
      upstream.onPage = (index, query) => {
        if (query === BOB && index === 1 && bobFailures < 5) {
          bobFailures += 1;
          throw httpError(503);
        }
      };
      const orchestrator = createOrchestrator(upstream);
      const request = { usernames: ['alice', 'bob'], format: 'csv' as const, outputDir: dir };

      const error = await orchestrator.runBatch(request).catch((caught: unknown) => caught);

      expect(error instanceof IngestionError && error.code).toBe(ErrorCode.NETWORK_UNAVAILABLE);
      expect(error instanceof IngestionError && error.context.checkpointPath).toBe(store.filePath);
      expect(error instanceof IngestionError && error.context.count).toBe(3);

      const saved = await loadState();
      expect(saved).toEqual(
        expect.objectContaining({
          mode: 'batch',
          currentIndex: 1,
          inProgress: true,
          count: 3,
          cursor: 'c0',
          completed: false,
          results: [
            { username: 'alice', status: 'success', count: 2, outputPath: path.resolve(dir, 'alice_20240601_100000.csv') },
          ],
        })
      );

      const resumed = await orchestrator.resume(saved);
      if (resumed.mode !== 'batch') throw new Error(`unexpected mode ${resumed.mode}`);

      const bobPath = path.resolve(dir, 'bob_20240601_100000.csv');
      expect(resumed.outcomes).toEqual([
        { username: 'alice', status: 'success', count: 2, outputPath: path.resolve(dir, 'alice_20240601_100000.csv') },
        { username: 'bob', status: 'success', count: 5, outputPath: bobPath },
      ]);
      expect(resumed.totalCount).toBe(7);
      expect(lineCount(bobPath)).toBe(6);
      expect(upstream.searches[upstream.searches.length - 1]).toEqual({ query: BOB, cursor: 'c0' });
    });

    test('requires at least one username', async () => {
      const upstream = new FakeUpstream();
      const error = await createOrchestrator(upstream)
        .runBatch({ usernames: [], outputDir: dir })
        .catch((caught: unknown) => caught);

      expect(error instanceof IngestionError && error.message).toBe('usernames: At least one username is required');
      expect(upstream.authenticateCalls).toBe(0);
    });
  });

  describe('links', () => {
    test('drops malformed and repeated links up front', async () => {
      const upstream = new FakeUpstream({ tweets: { '1': rawTweet(1), '2': rawTweet(2) } });
      const updates: Array<number | string> = [];

      const result = await createOrchestrator(upstream).runLinks(
        {
          links: [link(1), 'not a link', 'https://twitter.com/bob/status/1', link(2)],
          delaySeconds: 0,
          format: 'csv',
          outputDir: dir,
        },
        { onProgress: (update) => updates.push(update) }
      );

      expect(result.mode).toBe('links');
      expect(result.invalid).toEqual(['not a link']);
      expect(result.duplicates).toBe(1);
      expect(result.count).toBe(2);
      expect(result.processed).toEqual([link(1), link(2)]);
      expect(result.outputPath).toBe(path.resolve(dir, 'tweet_links_20240601_100000.csv'));
      expect(updates[0]).toBe('Skipping malformed link: not a link');
    });

    test('rejects a list without any tweet link', async () => {
      const upstream = new FakeUpstream();
      const error = await createOrchestrator(upstream)
        .runLinks({ links: ['nope'], outputDir: dir })
        .catch((caught: unknown) => caught);

      expect(error instanceof IngestionError && error.message).toBe('No valid tweet links found');
      expect(upstream.authenticateCalls).toBe(0);
    });

    test('a stopped run resumes with the remaining links', async () => {
      const upstream = new FakeUpstream({ tweets: { '1': rawTweet(1), '2': rawTweet(2), '3': rawTweet(3) } });
      const orchestrator = createOrchestrator(upstream);
      let stop = false;

      const first = await orchestrator.runLinks(
        { links: [link(1), link(2), link(3)], delaySeconds: 0, format: 'csv', outputDir: dir },
        {
          onProgress: (update) => {
            if (update === 1) stop = true;
          },
          shouldStop: () => stop,
        }
      );

      expect(first.cancelled).toBe(true);
      expect(first.processed).toEqual([link(1)]);
      const saved = await loadState();
      expect(saved).toEqual(expect.objectContaining({ mode: 'links', currentIndex: 1, count: 1, completed: false }));

      const resumed = await orchestrator.resume(saved);
      if (resumed.mode !== 'links') throw new Error(`unexpected mode ${resumed.mode}`);

      expect(resumed.count).toBe(3);
      expect(resumed.processed).toEqual([link(1), link(2), link(3)]);
      expect(upstream.fetched).toEqual(['1', '2', '3']);
      expect(lineCount(resumed.outputPath)).toBe(4);
    });
  });

  describe('resume after midnight', () => {
    const ALICE_RANGE = `${ALICE} since:2024-01-01 until:2024-06-01`;
    const BOB_RANGE = `${BOB} since:2024-01-01 until:2024-06-01`;
    let clock: Date;

    function createClockedOrchestrator(upstream: FakeUpstream): SessionOrchestrator {
      return new SessionOrchestrator({
        client: upstream,
        store,
        sleeper: instantSleeper(),
        now: () => clock,
      });
    }

    beforeEach(() => {
      clock = new Date(Date.UTC(2024, 5, 1, 22, 0, 0));
    });

    test('a single session keeps the end date it was clamped to', async () => {
      const upstream = new FakeUpstream({ pagesByQuery: { [ALICE_RANGE]: [tweetRange(1, 3), tweetRange(4, 6)] } });
      const orchestrator = createClockedOrchestrator(upstream);
      let stop = false;

      const first = await orchestrator.runSingle(
        { username: 'alice', since: '2024-01-01', until: '2024-12-31', format: 'csv', outputDir: dir },
        {
          onProgress: (update) => {
            if (update === 2) stop = true;
          },
          shouldStop: () => stop,
        }
      );

      expect(first.cancelled).toBe(true);
      expect(first.query).toBe(ALICE_RANGE);
      const saved = await loadState();
      expect(saved.dateRange).toEqual({ since: '2024-01-01', until: '2024-06-01' });

      clock = new Date(Date.UTC(2024, 5, 2, 1, 0, 0));
      const resumed = await orchestrator.resume(saved);
      if (resumed.mode !== 'single') throw new Error(`unexpected mode ${resumed.mode}`);

      expect(resumed.query).toBe(ALICE_RANGE);
      expect(resumed.count).toBe(6);
      expect(upstream.searches[upstream.searches.length - 1]).toEqual({ query: ALICE_RANGE, cursor: 'c0' });
      const state = await loadState();
      expect(state.dateRange).toEqual({ since: '2024-01-01', until: '2024-06-01' });
      expect(state.completed).toBe(true);
    });

    test('a batch resumes the interrupted author with the saved range', async () => {
      const upstream = new FakeUpstream({
        pagesByQuery: { [ALICE_RANGE]: [tweetRange(1, 2)], [BOB_RANGE]: [tweetRange(3, 5), tweetRange(6, 7)] },
      });
      const orchestrator = createClockedOrchestrator(upstream);
      let stop = false;

      const first = await orchestrator.runBatch(
        { usernames: ['alice', 'bob'], since: '2024-01-01', until: '2024-12-31', format: 'csv', outputDir: dir },
        {
          onProgress: (update) => {
            if (update === 2 && upstream.searches.some((search) => search.query === BOB_RANGE)) stop = true;
          },
          shouldStop: () => stop,
        }
      );

      expect(first.cancelled).toBe(true);
      const saved = await loadState();
      expect(saved).toEqual(
        expect.objectContaining({
          mode: 'batch',
          currentIndex: 1,
          inProgress: true,
          count: 2,
          dateRange: { since: '2024-01-01', until: '2024-06-01' },
        })
      );

      clock = new Date(Date.UTC(2024, 5, 2, 1, 0, 0));
      const resumed = await orchestrator.resume(saved);
      if (resumed.mode !== 'batch') throw new Error(`unexpected mode ${resumed.mode}`);

      expect(resumed.outcomes.map(({ username, status, count }) => ({ username, status, count }))).toEqual([
        { username: 'alice', status: 'success', count: 2 },
        { username: 'bob', status: 'success', count: 5 },
      ]);
      expect(upstream.searches.map((search) => search.query)).toEqual([ALICE_RANGE, BOB_RANGE, BOB_RANGE]);
      expect(upstream.searches[upstream.searches.length - 1]).toEqual({ query: BOB_RANGE, cursor: 'c0' });
    });
  });

  test('prepareLinks keeps the first link per tweet id', () => {
    expect(prepareLinks([' https://x.com/a/status/5 ', '', 'https://twitter.com/b/status/5', 'x'])).toEqual({
      valid: ['https://x.com/a/status/5'],
      invalid: ['x'],
      duplicates: 1,
    });
  });
});
