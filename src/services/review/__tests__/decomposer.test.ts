import { describe, expect, it, vi } from 'vitest';
import { decomposerConfig, fileDiff, makeJob, testLogger } from '../../../__tests__/helpers.js';
import { DiffUnavailableError } from '../../../errors.js';
import { createDiffDecomposer, renderChunkContent } from '../decomposer.js';
import type { DiffSource } from '../types.js';

const HUNKS = [
  ['@@ -1 +1 @@', '-a', '+b'],
  ['@@ -10 +10 @@', '-c', '+d'],
  ['@@ -20 +20 @@', `-${'e'.repeat(100)}`, `+${'f'.repeat(100)}`],
];

function sourceOf(diff: string): DiffSource {
  return { fetchDiff: vi.fn().mockResolvedValue(diff) };
}

async function decompose(diff: string, overrides: Parameters<typeof decomposerConfig>[0] = {}) {
  const decomposer = createDiffDecomposer({
    diffSource: sourceOf(diff),
    config: decomposerConfig(overrides),
    logger: testLogger,
  });
  return decomposer.decompose(makeJob());
}

describe('createDiffDecomposer', () => {
  it('yields the summary chunk first and file chunks from ordinal 1', async () => {
    const decomposition = await decompose(fileDiff('x.ts', HUNKS));
    const chunks = [...decomposition];

    expect(chunks.map((chunk) => [chunk.ordinal, chunk.kind, chunk.chunkId])).toEqual([
      [0, 'summary', 'job-1:0'],
      [1, 'file', 'job-1:1'],
    ]);
    expect(chunks[0].header).toBe('Pull request acme/widgets#7 at abcdef1, 1 file(s)');
    expect(chunks[0].filePath).toBeNull();
    expect(chunks[1].filePath).toBe('x.ts');
    expect(chunks[1].hunkRange).toEqual({ first: 0, last: 2 });
  });

  it('restarts at ordinal 0 on every iteration', async () => {
    const decomposition = await decompose(fileDiff('x.ts', HUNKS));

    const first = [...decomposition].map((chunk) => chunk.chunkId);
    const second = [...decomposition].map((chunk) => chunk.chunkId);
    expect(second).toEqual(first);
  });

  it('groups consecutive hunks while they fit the chunk budget', async () => {
    const decomposition = await decompose(fileDiff('x.ts', HUNKS), { chunkTokenBudget: 60 });
    const files = [...decomposition].filter((chunk) => chunk.kind === 'file');

    expect(files.map((chunk) => chunk.hunkRange)).toEqual([
      { first: 0, last: 1 },
      { first: 2, last: 2 },
    ]);
    expect(files[0].tokenEstimate).toBe(15);
    expect(files[1].tokenEstimate).toBe(60);
    expect(decomposition.fileChunkCount).toBe(2);
  });

  it('splits hunks into separate chunks when they do not fit together', async () => {
    const decomposition = await decompose(fileDiff('x.ts', HUNKS), { chunkTokenBudget: 12 });
    const files = [...decomposition].filter((chunk) => chunk.kind === 'file');

    expect(files.map((chunk) => chunk.hunkRange)).toEqual([
      { first: 0, last: 0 },
      { first: 1, last: 1 },
    ]);
    expect([...files[1].positions]).toEqual([[10, 5]]);
    expect(renderChunkContent(files[1].header, files[1].sections)).toBe(
      '--- a/x.ts\n+++ b/x.ts\n@@ -10 +10 @@\n-c\n+d'
    );
  });

  it('skips a hunk that exceeds the budget on its own', async () => {
    const decomposition = await decompose(fileDiff('x.ts', HUNKS), { chunkTokenBudget: 15 });
    const files = [...decomposition].filter((chunk) => chunk.kind === 'file');

    expect(files.map((chunk) => chunk.hunkRange)).toEqual([{ first: 0, last: 1 }]);
    expect(decomposition.skipped).toEqual([
      { filePath: 'x.ts', reason: 'oversized-hunk', detail: '@@ -20 +20 @@' },
    ]);
  });

  it('classifies files that are not reviewed', async () => {
    const diff = [
      'diff --git a/logo.png b/logo.png',
      'index 1111111..2222222 100644',
      'Binary files a/logo.png and b/logo.png differ',
      fileDiff('package-lock.json', [['@@ -1 +1 @@', '-{', '+[']]),
      'diff --git a/old.ts b/old.ts',
      'deleted file mode 100644',
      '--- a/old.ts',
      '+++ /dev/null',
      '@@ -1 +0,0 @@',
      '-gone',
      'diff --git a/a.ts b/b.ts',
      'similarity index 100%',
      'rename from a.ts',
      'rename to b.ts',
      fileDiff('src/keep.ts', [['@@ -1 +1 @@', '-x', '+y']]),
    ].join('\n');

    const decomposition = await decompose(diff);

    expect(decomposition.skipped).toEqual([
      { filePath: 'logo.png', reason: 'binary' },
      { filePath: 'package-lock.json', reason: 'excluded' },
      { filePath: 'old.ts', reason: 'deleted' },
      { filePath: 'b.ts', reason: 'no-changes' },
    ]);
    expect(decomposition.files.map((file) => file.path)).toEqual(['src/keep.ts']);
  });

  it('truncates the largest files to fit the summary budget', async () => {
    const decomposition = await decompose(fileDiff('x.ts', HUNKS), { summaryTokenBudget: 30 });
    const [summary] = decomposition;

    expect(summary.sections).toEqual(['--- a/x.ts\n+++ b/x.ts\n... [6 changed lines truncated]']);
    expect(summary.tokenEstimate).toBe(26);
  });

  it('drops files from the summary when headers alone exceed the budget', async () => {
    const decomposition = await decompose(fileDiff('x.ts', HUNKS), { summaryTokenBudget: 20 });
    const [summary] = decomposition;

    expect(summary.sections).toEqual([]);
    expect(summary.header).toBe('Pull request acme/widgets#7 at abcdef1, 1 file(s)');
  });

  it('produces only the summary chunk for an empty diff', async () => {
    const decomposition = await decompose('');

    expect([...decomposition].map((chunk) => chunk.kind)).toEqual(['summary']);
    expect(decomposition.fileChunkCount).toBe(0);
  });

  it('wraps retrieval failures as an unavailable diff', async () => {
    const decomposer = createDiffDecomposer({
      diffSource: { fetchDiff: vi.fn().mockRejectedValue(new Error('socket hang up')) },
      config: decomposerConfig(),
      logger: testLogger,
    });

    const error = await decomposer.decompose(makeJob()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DiffUnavailableError);
    expect(error).toMatchObject({ reason: 'unavailable', message: 'Diff retrieval failed: socket hang up' });
  });

  it('passes a not-found error through unchanged', async () => {
    const notFound = new DiffUnavailableError('not-found', 'Commit abcdef1 not found');
    const decomposer = createDiffDecomposer({
      diffSource: { fetchDiff: vi.fn().mockRejectedValue(notFound) },
      config: decomposerConfig(),
      logger: testLogger,
    });

    await expect(decomposer.decompose(makeJob())).rejects.toBe(notFound);
  });
});
