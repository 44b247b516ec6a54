import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { makeJob } from '../../../__tests__/helpers.js';
import { MemoryStateStore } from '../memory-store.js';
import { closeDatabase, openDatabase, type SqliteDatabase } from '../sqlite-database.js';
import { SqliteStateStore } from '../sqlite-store.js';
import type { StateStore } from '../state-store.js';

const key = { repositoryId: 'acme/widgets', pullRequestNumber: 7 };

const databases: SqliteDatabase[] = [];

afterEach(() => {
  databases.splice(0).forEach((db) => closeDatabase(db));
});

const factories: Array<[string, () => StateStore]> = [
  ['MemoryStateStore', () => new MemoryStateStore()],
  [
    'SqliteStateStore',
    () => {
      const db = openDatabase(':memory:');
      databases.push(db);
      return new SqliteStateStore(db);
    },
  ],
];

describe.each(factories)('%s', (_name, createStore) => {
  it('claims each delivery once', async () => {
    const store = createStore();

    expect(await store.claimDelivery('delivery-1')).toBe(true);
    expect(await store.claimDelivery('delivery-1')).toBe(false);
    expect(await store.claimDelivery('delivery-2')).toBe(true);
  });

  it('claims a released delivery again', async () => {
    const store = createStore();
    await store.claimDelivery('delivery-1');

    await store.releaseDelivery('delivery-1');
    await store.releaseDelivery('delivery-9');

    expect(await store.claimDelivery('delivery-1')).toBe(true);
  });

  it('installs the first job when nothing is mapped', async () => {
    const store = createStore();
    const job = makeJob({ status: 'queued', attemptCount: 0 });

    expect(await store.swapActiveJob(key, null, job)).toBe(true);
    expect(await store.getActiveJob(key)).toEqual(job);
  });

  it('rejects a swap against a stale expectation', async () => {
    const store = createStore();
    await store.swapActiveJob(key, null, makeJob({ jobId: 'job-1', status: 'queued' }));

    expect(await store.swapActiveJob(key, null, makeJob({ jobId: 'job-2' }))).toBe(false);
    expect(await store.swapActiveJob(key, 'job-9', makeJob({ jobId: 'job-2' }))).toBe(false);
    expect((await store.getActiveJob(key))?.jobId).toBe('job-1');
    expect(await store.getJob('job-2')).toBeNull();
  });

  it('supersedes the replaced job', async () => {
    const store = createStore();
    await store.swapActiveJob(key, null, makeJob({ jobId: 'job-1', status: 'reviewing' }));

    expect(await store.swapActiveJob(key, 'job-1', makeJob({ jobId: 'job-2', status: 'queued' }))).toBe(true);
    expect((await store.getJob('job-1'))?.status).toBe('superseded');
    expect((await store.getActiveJob(key))?.jobId).toBe('job-2');
  });

  it('leaves a terminal replaced job as it was', async () => {
    const store = createStore();
    await store.swapActiveJob(key, null, makeJob({ jobId: 'job-1', status: 'queued' }));
    await store.finalizeJob('job-1', 'completed');

    await store.swapActiveJob(key, 'job-1', makeJob({ jobId: 'job-2', status: 'queued' }));

    expect((await store.getJob('job-1'))?.status).toBe('completed');
  });

  it('writes a terminal status once', async () => {
    const store = createStore();
    await store.swapActiveJob(key, null, makeJob({ status: 'queued' }));

    expect(await store.updateJobStatus('job-1', 'running')).toBe(true);
    expect(await store.finalizeJob('job-1', 'failed', 'Diff unavailable')).toBe(true);
    expect(await store.finalizeJob('job-1', 'completed')).toBe(false);
    expect(await store.updateJobStatus('job-1', 'posting')).toBe(false);
    expect(await store.getJob('job-1')).toMatchObject({ status: 'failed', error: 'Diff unavailable' });
  });

  it('counts attempts', async () => {
    const store = createStore();
    await store.swapActiveJob(key, null, makeJob({ attemptCount: 0 }));

    expect(await store.incrementAttempt('job-1')).toBe(1);
    expect(await store.incrementAttempt('job-1')).toBe(2);
    expect(await store.incrementAttempt('missing')).toBe(0);
  });

  it('clears the mapping only for the mapped job', async () => {
    const store = createStore();
    await store.swapActiveJob(key, null, makeJob({ jobId: 'job-1' }));

    expect(await store.clearActiveJob(key, 'job-2')).toBe(false);
    expect(await store.clearActiveJob(key, 'job-1')).toBe(true);
    expect(await store.getActiveJob(key)).toBeNull();
  });

  it('keeps chunk records ordered by ordinal', async () => {
    const store = createStore();
    await store.saveChunks([
      { chunkId: 'job-1:1', jobId: 'job-1', ordinal: 1, filePath: 'src/a.ts', hunkRange: { first: 0, last: 2 }, tokenEstimate: 40 },
      { chunkId: 'job-1:0', jobId: 'job-1', ordinal: 0, filePath: null, hunkRange: null, tokenEstimate: 90 },
    ]);
    await store.saveChunks([
      { chunkId: 'job-1:1', jobId: 'job-1', ordinal: 1, filePath: 'src/a.ts', hunkRange: { first: 0, last: 1 }, tokenEstimate: 30 },
    ]);

    expect(await store.listChunks('job-1')).toEqual([
      { chunkId: 'job-1:0', jobId: 'job-1', ordinal: 0, filePath: null, hunkRange: null, tokenEstimate: 90 },
      { chunkId: 'job-1:1', jobId: 'job-1', ordinal: 1, filePath: 'src/a.ts', hunkRange: { first: 0, last: 1 }, tokenEstimate: 30 },
    ]);
  });

  it('upserts comments by finding reference', async () => {
    const store = createStore();
    await store.saveComment({ jobId: 'job-1', findingRef: '1:0', externalCommentId: null, postStatus: 'pending' });
    await store.saveComment({ jobId: 'job-1', findingRef: '1:0', externalCommentId: 'review:5', postStatus: 'posted' });
    await store.saveComment({
      jobId: 'job-1',
      findingRef: '1:1',
      externalCommentId: null,
      postStatus: 'failed',
      error: 'Validation Failed',
    });

    expect(await store.getComment('job-1', '1:0')).toMatchObject({ externalCommentId: 'review:5', postStatus: 'posted' });
    expect((await store.listComments('job-1')).map((comment) => comment.findingRef)).toEqual(['1:0', '1:1']);
    expect(await store.getComment('job-1', '9:9')).toBeNull();
  });

  it('discards artifacts of one job', async () => {
    const store = createStore();
    await store.saveChunks([{ chunkId: 'job-1:0', jobId: 'job-1', ordinal: 0, filePath: null, hunkRange: null, tokenEstimate: 1 }]);
    await store.saveComment({ jobId: 'job-1', findingRef: 'summary', externalCommentId: 'issue:1', postStatus: 'posted' });
    await store.saveComment({ jobId: 'job-2', findingRef: 'summary', externalCommentId: 'issue:2', postStatus: 'posted' });

    await store.discardArtifacts('job-1');

    expect(await store.listChunks('job-1')).toEqual([]);
    expect(await store.listComments('job-1')).toEqual([]);
    expect(await store.listComments('job-2')).toHaveLength(1);
  });
});

describe('SqliteStateStore on disk', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('keeps state across a reopen', async () => {
    dir = mkdtempSync(join(tmpdir(), 'review-relay-'));
    const path = join(dir, 'nested', 'state.db');

    const first = openDatabase(path);
    const store = new SqliteStateStore(first);
    await store.claimDelivery('delivery-1');
    await store.swapActiveJob(key, null, makeJob({ status: 'reviewing' }));
    closeDatabase(first);

    const second = openDatabase(path);
    const reopened = new SqliteStateStore(second);
    expect(await reopened.claimDelivery('delivery-1')).toBe(false);
    expect(await reopened.getActiveJob(key)).toEqual(makeJob({ status: 'reviewing' }));
    closeDatabase(second);
  });
});
