import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { ErrorCode, IngestionError } from '../../core/errors';
import { SessionEventBus } from '../../core/event-bus';
import type { ProgressData } from '../../core/event-bus';
import { LinkRunner } from '../../core/link-runner';
import type { LinkCheckpoint, LinkRunnerOptions } from '../../core/link-runner';
import { RetryPolicy } from '../../core/retry-policy';
import { CancellationToken } from '../../core/stop-signal';
import { CsvExportSink } from '../../utils/export';
import { FakeUpstream, httpError, instantSleeper, rawTweet } from '../helpers/fake-upstream';

const link = (id: number) => `https://x.com/alice/status/${id}`;

describe('LinkRunner', () => {
  let dir: string;
  let outputPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'test-links-'));
    outputPath = path.join(dir, 'links.csv');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function createRunner(
    upstream: FakeUpstream,
    links: string[],
    overrides: Partial<Pick<LinkRunnerOptions, 'delaySeconds' | 'processed'>> & { stopAt?: number } = {}
  ) {
    const sink = new CsvExportSink({ outputPath });
    await sink.open();
    const events = new SessionEventBus();
    let stop = false;
    if (overrides.stopAt !== undefined) {
      const stopAt = overrides.stopAt;
      events.on(events.events.PROGRESS, (data: ProgressData) => {
        if (data.current === stopAt) stop = true;
      });
    }
    const token = new CancellationToken(() => stop);
    const sleeper = instantSleeper();
    const checkpoints: LinkCheckpoint[] = [];
    const runner = new LinkRunner({
      client: upstream,
      sink,
      token,
      events,
      retryPolicy: new RetryPolicy({ token, events, sleeper }),
      links,
      saveInterval: 50,
      delaySeconds: overrides.delaySeconds ?? 0,
      processed: overrides.processed,
      sleeper,
      onCheckpoint: async (checkpoint) => {
        checkpoints.push(checkpoint);
      },
    });
    return { runner, checkpoints, sleeper };
  }

  test('fetches each link and skips missing tweets', async () => {
    const upstream = new FakeUpstream({ tweets: { '1': rawTweet(1), '3': rawTweet(3) } });
    const { runner, checkpoints } = await createRunner(upstream, [link(1), link(2), link(3)]);

    const result = await runner.run();

    expect(result.state).toBe('DONE');
    expect(result.stopReason).toBe('Processed 3 links');
    expect(result.count).toBe(2);
    expect(result.skipped).toBe(1);
    expect(result.failed).toBe(0);
    expect(result.hasMore).toBe(false);
    expect(result.processed).toEqual([link(1), link(2), link(3)]);
    expect(upstream.fetched).toEqual(['1', '2', '3']);
    expect(checkpoints).toEqual([
      expect.objectContaining({ count: 2, outputRows: 2, completed: true }),
    ]);
    expect(fs.readFileSync(outputPath, 'utf-8').trimEnd().split('\n')).toHaveLength(3);
  });

  test('counts a failing fetch and moves on', async () => {
    const upstream = new FakeUpstream({ tweets: { '1': rawTweet(1), '2': rawTweet(2) } });
    upstream.failFetch('1', new Error('upstream exploded'));
    const { runner } = await createRunner(upstream, [link(1), link(2)]);

    const result = await runner.run();

    expect(result.failed).toBe(1);
    expect(result.count).toBe(1);
    expect(result.processed).toEqual([link(1), link(2)]);
  });

  test('skips links without a tweet id', async () => {
    const upstream = new FakeUpstream({ tweets: { '1': rawTweet(1) } });
    const { runner } = await createRunner(upstream, ['https://example.com/alice/status/9', link(1)]);

    const result = await runner.run();

    expect(result.skipped).toBe(1);
    expect(result.count).toBe(1);
    expect(upstream.fetched).toEqual(['1']);
  });

  test('waits between links but not after the last', async () => {
    const upstream = new FakeUpstream({ tweets: { '1': rawTweet(1), '2': rawTweet(2), '3': rawTweet(3) } });
    const { runner, sleeper } = await createRunner(upstream, [link(1), link(2), link(3)], { delaySeconds: 3 });

    await runner.run();

    expect(sleeper.calls).toEqual([1000, 1000, 1000, 1000, 1000, 1000]);
  });

  test('a resumed run skips processed links', async () => {
    const upstream = new FakeUpstream({ tweets: { '1': rawTweet(1), '2': rawTweet(2), '3': rawTweet(3) } });
    const { runner } = await createRunner(upstream, [link(1), link(2), link(3)], { processed: [link(1)] });

    const result = await runner.run();

    expect(upstream.fetched).toEqual(['2', '3']);
    expect(result.count).toBe(2);
    expect(result.processed).toEqual([link(1), link(2), link(3)]);
  });

  test('cancellation keeps the processed links', async () => {
    const upstream = new FakeUpstream({ tweets: { '1': rawTweet(1), '2': rawTweet(2) } });
    const { runner, checkpoints } = await createRunner(upstream, [link(1), link(2)], { stopAt: 1 });

    const result = await runner.run();

    expect(result.state).toBe('ABORTED');
    expect(result.cancelled).toBe(true);
    expect(result.hasMore).toBe(true);
    expect(result.processed).toEqual([link(1)]);
    expect(checkpoints[checkpoints.length - 1]).toEqual(
      expect.objectContaining({ count: 1, processed: [link(1)], completed: false })
    );
  });

  test('network exhaustion propagates after saving', async () => {
    const upstream = new FakeUpstream({ tweets: { '1': rawTweet(1) } });
    upstream.failFetch('1', ...Array.from({ length: 5 }, () => httpError(503)));
    const { runner, checkpoints } = await createRunner(upstream, [link(1)]);

    const error = await runner.run().catch((caught: unknown) => caught);

    expect(error instanceof IngestionError && error.code).toBe(ErrorCode.NETWORK_UNAVAILABLE);
    expect(error instanceof IngestionError && error.context.count).toBe(0);
    expect(checkpoints).toEqual([expect.objectContaining({ processed: [], completed: false })]);
    expect(upstream.closeCalls).toBe(1);
  });
});
