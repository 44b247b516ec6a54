import { describe, expect, it, vi } from 'vitest';
import { appConfig, fileDiff, makeEvent, makeJob, publisherConfig, testLogger } from '../../../__tests__/helpers.js';
import { createServices } from '../../../bootstrap.js';
import { DiffUnavailableError } from '../../../errors.js';
import type { DiffChunkRecord, ModelRequest, ModelResponse, ReviewEvent, ReviewJob } from '../../../types.js';
import type { ModelProvider } from '../../providers/schema.js';
import { MemoryStateStore } from '../../state/memory-store.js';
import { formatSummaryBody } from '../comment-format.js';
import type { DiffSource } from '../types.js';
import { fakePoster } from './fake-poster.js';

const key = { repositoryId: 'acme/widgets', pullRequestNumber: 7 };

const HUNK = ['@@ -1,2 +1,3 @@', ' const a = 1;', '+const b = a.value;', ' export { a };'];
const DIFF = fileDiff('src/a.ts', [HUNK]);
const TWO_FILES = [fileDiff('src/a.ts', [HUNK]), fileDiff('src/b.ts', [HUNK])].join('\n');

const usage = { promptTokens: 10, completionTokens: 5 };

function reviewResponse(lines: number[], filePath = 'src/a.ts'): ModelResponse {
  return {
    findings: lines.map((line) => ({
      filePath,
      anchor: { kind: 'line' as const, line },
      severity: 'warning' as const,
      message: `Check line ${line}`,
    })),
    rawText: '{}',
    tokenUsage: usage,
  };
}

function setup(options: { diff?: string; store?: MemoryStateStore; policy?: 'keep' | 'retract' } = {}) {
  const store = options.store ?? new MemoryStateStore();
  const diffSource = { fetchDiff: vi.fn<DiffSource['fetchDiff']>().mockResolvedValue(options.diff ?? DIFF) };
  const poster = fakePoster();
  const provider = {
    id: 'fake',
    modelName: 'fake-model',
    summarize: vi
      .fn<(request: ModelRequest) => Promise<ModelResponse>>()
      .mockResolvedValue({ findings: [], rawText: 'Reads a value from a.', tokenUsage: usage }),
    review: vi
      .fn<(request: ModelRequest, filePath: string) => Promise<ModelResponse>>()
      .mockResolvedValue(reviewResponse([2])),
    reportUsage: () => ({ provider: 'fake', modelName: 'fake-model', calls: 0, promptTokens: 0, completionTokens: 0 }),
  } satisfies ModelProvider;

  const services = createServices(
    appConfig({ publisher: publisherConfig({ supersededCommentPolicy: options.policy ?? 'keep' }) }),
    testLogger,
    { diffSource, poster, provider, store }
  );

  async function admit(event: ReviewEvent = makeEvent()): Promise<ReviewJob> {
    const decision = await services.guard.admit(event);
    if (decision.kind === 'drop') throw new Error(`unexpected drop: ${decision.reason}`);
    return decision.job;
  }

  return { ...services, store, diffSource, poster, provider, admit };
}

describe('review pipeline', () => {
  it('reviews, posts and completes a job', async () => {
    const { pipeline, admit, store, poster, provider } = setup();
    const job = await admit();

    const result = await pipeline.execute(job);

    expect(result.status).toBe('completed');
    expect(result.postResult).toMatchObject({ posted: 2, failed: 0, coerced: 0 });
    expect(provider.summarize).toHaveBeenCalledTimes(1);
    expect(provider.review).toHaveBeenCalledTimes(1);
    expect(poster.postComment).toHaveBeenCalledWith(
      job,
      { filePath: 'src/a.ts', position: 2, severity: 'warning', body: '**🟡 Warning**: Check line 2' },
      expect.any(AbortSignal)
    );
    expect(poster.postSummary.mock.calls[0][1]).toBe(
      formatSummaryBody({
        context: { text: 'Reads a value from a.', outcome: 'ok' },
        findings: reviewResponse([2]).findings,
        unreviewed: [],
      })
    );
    expect(await store.getJob(job.jobId)).toMatchObject({ status: 'completed', attemptCount: 1 });
    expect(await store.getActiveJob(key)).toBeNull();
    expect(await store.listComments(job.jobId)).toEqual([]);
  });

  it('reviews every file of a multi-file diff', async () => {
    const { pipeline, admit, provider, poster } = setup({ diff: TWO_FILES });
    provider.review.mockImplementation(async (_request, filePath) => reviewResponse([2], filePath));
    const job = await admit();

    const result = await pipeline.execute(job);

    expect(result.status).toBe('completed');
    expect(result.postResult).toMatchObject({ posted: 3, failed: 0 });
    expect(provider.summarize).toHaveBeenCalledTimes(1);
    expect(provider.review).toHaveBeenCalledTimes(2);
    expect(provider.review).toHaveBeenCalledWith(expect.anything(), 'src/a.ts');
    expect(provider.review).toHaveBeenCalledWith(expect.anything(), 'src/b.ts');
    expect(poster.postComment.mock.calls.map(([, comment]) => [comment.filePath, comment.position])).toEqual([
      ['src/a.ts', 2],
      ['src/b.ts', 2],
    ]);
  });

  it('posts the other files when one file review fails fatally', async () => {
    const { pipeline, admit, provider, poster } = setup({ diff: TWO_FILES });
    provider.review.mockImplementation(async (_request, filePath) => {
      if (filePath === 'src/b.ts') throw Object.assign(new Error('Unauthorized'), { status: 401 });
      return reviewResponse([2], filePath);
    });
    const job = await admit();

    const result = await pipeline.execute(job);

    expect(result.status).toBe('completed');
    expect(provider.review).toHaveBeenCalledTimes(2);
    expect(poster.postComment).toHaveBeenCalledTimes(1);
    expect(poster.postComment.mock.calls[0][1]).toMatchObject({ filePath: 'src/a.ts', position: 2 });
    expect(poster.postSummary.mock.calls[0][1]).toContain('- `src/b.ts`: model review failed');
  });

  it('posts findings in file order when reviews finish out of order', async () => {
    const { pipeline, admit, provider, poster } = setup({ diff: TWO_FILES });
    const finished: string[] = [];
    let releaseFirst: () => void = () => {};
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });
    provider.review.mockImplementation(async (_request, filePath) => {
      if (filePath === 'src/a.ts') {
        await firstGate;
        finished.push(filePath);
        return reviewResponse([2], filePath);
      }
      finished.push(filePath);
      releaseFirst();
      return reviewResponse([1, 2], filePath);
    });

    await pipeline.execute(await admit());

    expect(finished).toEqual(['src/b.ts', 'src/a.ts']);
    expect(poster.postComment.mock.calls.map(([, comment]) => [comment.filePath, comment.position])).toEqual([
      ['src/a.ts', 2],
      ['src/b.ts', 1],
      ['src/b.ts', 2],
    ]);
  });

  it('skips findings already commented on the pull request', async () => {
    const { pipeline, admit, poster } = setup();
    poster.listComments.mockResolvedValue([
      { externalCommentId: 'review:7', filePath: 'src/a.ts', line: 2, body: '**🟡 Warning**: Check line 2' },
    ]);
    const job = await admit();

    const result = await pipeline.execute(job);

    expect(result.status).toBe('completed');
    expect(result.postResult).toMatchObject({ posted: 1, failed: 0 });
    expect(poster.postComment).not.toHaveBeenCalled();
    expect(poster.postSummary.mock.calls[0][1]).toContain('No actionable issues found.');
  });

  it('records the chunks of a run', async () => {
    const { pipeline, admit, store } = setup();
    const saved: DiffChunkRecord[] = [];
    const saveChunks = store.saveChunks.bind(store);
    vi.spyOn(store, 'saveChunks').mockImplementation(async (chunks) => {
      saved.push(...chunks);
      await saveChunks(chunks);
    });
    const job = await admit();

    await pipeline.execute(job);

    expect(saved.map((chunk) => [chunk.chunkId, chunk.filePath, chunk.hunkRange])).toEqual([
      [`${job.jobId}:0`, null, null],
      [`${job.jobId}:1`, 'src/a.ts', { first: 0, last: 0 }],
    ]);
  });

  it('completes without model calls when nothing is reviewable', async () => {
    const { pipeline, admit, provider, poster } = setup({
      diff: 'diff --git a/logo.png b/logo.png\nBinary files a/logo.png and b/logo.png differ',
    });

    const result = await pipeline.execute(await admit());

    expect(result.status).toBe('completed');
    expect(provider.summarize).not.toHaveBeenCalled();
    expect(poster.postComment).not.toHaveBeenCalled();
    expect(poster.postSummary).not.toHaveBeenCalled();
  });

  it('fails the job when the diff is unavailable', async () => {
    const { pipeline, admit, diffSource, store, provider } = setup();
    diffSource.fetchDiff.mockRejectedValue(new DiffUnavailableError('not-found', 'Commit abcdef1 not found'));
    const job = await admit();

    const result = await pipeline.execute(job);

    expect(result.status).toBe('failed');
    expect(await store.getJob(job.jobId)).toMatchObject({ status: 'failed', error: 'Commit abcdef1 not found' });
    expect(provider.summarize).not.toHaveBeenCalled();
    expect(await store.getActiveJob(key)).toBeNull();
  });

  it('fails the job when every model call fails', async () => {
    const { pipeline, admit, store, provider, poster } = setup();
    const rejected = Object.assign(new Error('Bad Request'), { status: 400 });
    provider.summarize.mockRejectedValue(rejected);
    provider.review.mockRejectedValue(rejected);
    const job = await admit();

    await pipeline.execute(job);

    expect(await store.getJob(job.jobId)).toMatchObject({ status: 'failed', error: 'All 2 model calls failed' });
    expect(poster.postComment).not.toHaveBeenCalled();
  });

  it('still posts file reviews when only the summary fails', async () => {
    const { pipeline, admit, provider, poster } = setup();
    provider.summarize.mockRejectedValue(Object.assign(new Error('Bad Request'), { status: 400 }));

    const result = await pipeline.execute(await admit());

    expect(result.status).toBe('completed');
    expect(poster.postComment).toHaveBeenCalledTimes(1);
    expect(poster.postSummary.mock.calls[0][1]).toContain('_Pull request overview unavailable._');
  });

  it('stops without posting when a newer push supersedes the job mid-review', async () => {
    const { pipeline, admit, store, provider, poster } = setup();
    const job = await admit();
    provider.review.mockImplementation(async () => {
      await admit(makeEvent({ deliveryId: 'delivery-2', headCommitSha: 'fedcba9876543210' }));
      return reviewResponse([2]);
    });

    const result = await pipeline.execute(job);

    expect(result.status).toBe('superseded');
    expect(poster.postComment).not.toHaveBeenCalled();
    expect((await store.getActiveJob(key))?.headCommitSha).toBe('fedcba9876543210');
  });

  it('retracts posted comments of a superseded job when configured to', async () => {
    const { pipeline, admit, provider, poster } = setup({ policy: 'retract' });
    const job = await admit();
    provider.review.mockResolvedValue(reviewResponse([1, 2]));
    poster.postComment.mockImplementationOnce(async () => {
      await admit(makeEvent({ deliveryId: 'delivery-2', headCommitSha: 'fedcba9876543210' }));
      return 'review:1';
    });

    const result = await pipeline.execute(job);

    expect(result.status).toBe('superseded');
    expect(poster.postComment).toHaveBeenCalledTimes(1);
    expect(poster.deleteComment).toHaveBeenCalledWith(job, 'review:1', expect.any(AbortSignal));
  });

  it('keeps posted comments of a superseded job by default', async () => {
    const { pipeline, admit, provider, poster } = setup();
    const job = await admit();
    provider.review.mockResolvedValue(reviewResponse([1, 2]));
    poster.postComment.mockImplementationOnce(async () => {
      await admit(makeEvent({ deliveryId: 'delivery-2', headCommitSha: 'fedcba9876543210' }));
      return 'review:1';
    });

    await pipeline.execute(job);

    expect(poster.deleteComment).not.toHaveBeenCalled();
  });

  it('does nothing for a job cancelled before it ran', async () => {
    const { pipeline, admit, guard, diffSource } = setup();
    const job = await admit();
    await guard.cancel(key);

    const result = await pipeline.execute(job);

    expect(result).toEqual({ jobId: job.jobId, status: 'cancelled' });
    expect(diffSource.fetchDiff).not.toHaveBeenCalled();
  });

  it('reports a job it does not know', async () => {
    const { pipeline, diffSource } = setup();

    const result = await pipeline.execute(makeJob({ jobId: 'missing' }));

    expect(result).toEqual({ jobId: 'missing', status: null });
    expect(diffSource.fetchDiff).not.toHaveBeenCalled();
  });

  it('leaves the job live when an attempt fails unexpectedly', async () => {
    const store = new MemoryStateStore();
    vi.spyOn(store, 'saveChunks').mockRejectedValue(new Error('disk full'));
    const { pipeline, admit } = setup({ store });
    const job = await admit();

    await expect(pipeline.execute(job)).rejects.toThrow('disk full');
    expect(await store.getJob(job.jobId)).toMatchObject({ status: 'running', attemptCount: 1 });
    expect((await store.getActiveJob(key))?.jobId).toBe(job.jobId);
  });

  it('abandons a job and releases the pull request', async () => {
    const { pipeline, admit, store } = setup();
    const job = await admit();

    await pipeline.abandon(job, 'Gave up after 5 deliveries');

    expect(await store.getJob(job.jobId)).toMatchObject({ status: 'failed', error: 'Gave up after 5 deliveries' });
    expect(await store.getActiveJob(key)).toBeNull();
  });
});
