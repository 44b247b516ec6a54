import type { DecomposerConfig } from '../../config.js';
import { DiffUnavailableError } from '../../errors.js';
import type { DiffChunk, ReviewJob, SkippedFile } from '../../types.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import { CHARS_PER_TOKEN, estimateTokens, shouldSkipFile } from './config.js';
import {
  buildPositionMap,
  parseUnifiedDiff,
  renderFile,
  renderFileHeader,
  renderHunk,
  type DiffFile,
} from './diff-analyzer.js';
import type { DiffSource } from './types.js';

/** Chunk text is the header followed by each section on its own line. */
export function renderChunkContent(header: string, sections: readonly string[]): string {
  return [header, ...sections].join('\n');
}

function contentTokens(header: string, sections: readonly string[]): number {
  const length = sections.reduce((total, section) => total + 1 + section.length, header.length);
  return Math.ceil(length / CHARS_PER_TOKEN);
}

interface FilePlan {
  file: DiffFile;
  header: string;
  hunkTexts: string[];
  groups: number[][];
}

/**
 * The chunks of one job's diff. Iterating always starts again at ordinal 0 and
 * yields the same chunks; chunk text is only built while iterating.
 */
export class Decomposition implements Iterable<DiffChunk> {
  readonly skipped: SkippedFile[];
  private readonly plans: FilePlan[];

  constructor(
    readonly job: ReviewJob,
    readonly files: readonly DiffFile[],
    skipped: SkippedFile[],
    private readonly config: DecomposerConfig
  ) {
    this.skipped = [...skipped];
    this.plans = files.map((file) => this.planFile(file));
  }

  get fileChunkCount(): number {
    return this.plans.reduce((total, plan) => total + plan.groups.length, 0);
  }

  *[Symbol.iterator](): Iterator<DiffChunk> {
    yield this.summaryChunk();

    let ordinal = 1;
    for (const plan of this.plans) {
      for (const group of plan.groups) {
        const sections = group.map((index) => plan.hunkTexts[index]);
        yield {
          chunkId: `${this.job.jobId}:${ordinal}`,
          jobId: this.job.jobId,
          ordinal,
          kind: 'file',
          filePath: plan.file.path,
          hunkRange: { first: group[0], last: group[group.length - 1] },
          tokenEstimate: estimateTokens(renderChunkContent(plan.header, sections)),
          header: plan.header,
          sections,
          positions: buildPositionMap(group.map((index) => plan.file.hunks[index])),
        };
        ordinal++;
      }
    }
  }

  /**
   * Groups consecutive hunks while they fit the per-chunk budget. A hunk that
   * does not fit on its own is left out and reported as skipped.
   */
  private planFile(file: DiffFile): FilePlan {
    const budget = this.config.chunkTokenBudget;
    const header = renderFileHeader(file);
    const hunkTexts = file.hunks.map(renderHunk);
    const groups: number[][] = [];
    let current: number[] = [];

    hunkTexts.forEach((text, index) => {
      const candidate = [...current.map((i) => hunkTexts[i]), text];
      if (contentTokens(header, candidate) <= budget) {
        current.push(index);
        return;
      }
      if (current.length > 0) {
        groups.push(current);
        current = [];
      }
      if (contentTokens(header, [text]) <= budget) {
        current.push(index);
      } else {
        this.skipped.push({
          filePath: file.path,
          reason: 'oversized-hunk',
          detail: file.hunks[index].header,
        });
      }
    });
    if (current.length > 0) groups.push(current);

    return { file, header, hunkTexts, groups };
  }

  /**
   * Whole diff for cross-file context; largest files are truncated first until
   * the estimate fits the summary budget.
   */
  private summaryChunk(): DiffChunk {
    const budget = this.config.summaryTokenBudget;
    let header =
      `Pull request ${this.job.repositoryId}#${this.job.pullRequestNumber} ` +
      `at ${this.job.headCommitSha.slice(0, 7)}, ${this.files.length} file(s)`;
    const entries = this.files.map((file) => ({ file, text: renderFile(file), truncated: false }));
    const texts = () => entries.map((entry) => entry.text);

    while (entries.length > 0 && contentTokens(header, texts()) > budget) {
      const largest = entries
        .filter((entry) => !entry.truncated)
        .sort((a, b) => b.text.length - a.text.length)[0];
      if (largest) {
        const changed = largest.file.additions + largest.file.deletions;
        largest.text = `${renderFileHeader(largest.file)}\n... [${changed} changed lines truncated]`;
        largest.truncated = true;
        continue;
      }
      // Every file is already reduced to its header: drop the largest one
      let dropAt = 0;
      entries.forEach((entry, index) => {
        if (entry.text.length > entries[dropAt].text.length) dropAt = index;
      });
      entries.splice(dropAt, 1);
    }

    if (contentTokens(header, texts()) > budget) {
      header = header.slice(0, budget * CHARS_PER_TOKEN);
    }

    const sections = texts();
    return {
      chunkId: `${this.job.jobId}:0`,
      jobId: this.job.jobId,
      ordinal: 0,
      kind: 'summary',
      filePath: null,
      hunkRange: null,
      tokenEstimate: estimateTokens(renderChunkContent(header, sections)),
      header,
      sections,
      positions: new Map(),
    };
  }
}

export interface DiffDecomposer {
  decompose(job: ReviewJob): Promise<Decomposition>;
}

export function createDiffDecomposer(deps: {
  diffSource: DiffSource;
  config: DecomposerConfig;
  logger: Logger;
}): DiffDecomposer {
  const { diffSource, config, logger } = deps;

  function classify(files: DiffFile[]): { reviewable: DiffFile[]; skipped: SkippedFile[] } {
    const reviewable: DiffFile[] = [];
    const skipped: SkippedFile[] = [];

    for (const file of files) {
      if (file.isBinary) {
        skipped.push({ filePath: file.path, reason: 'binary' });
      } else if (shouldSkipFile(file.path, config.excludePatterns)) {
        skipped.push({ filePath: file.path, reason: 'excluded' });
      } else if (file.status === 'deleted') {
        skipped.push({ filePath: file.path, reason: 'deleted' });
      } else if (file.additions + file.deletions === 0) {
        skipped.push({ filePath: file.path, reason: 'no-changes' });
      } else {
        reviewable.push(file);
      }
    }

    return { reviewable, skipped };
  }

  async function decompose(job: ReviewJob): Promise<Decomposition> {
    let rawDiff: string;
    try {
      rawDiff = await diffSource.fetchDiff(job);
    } catch (error) {
      if (error instanceof DiffUnavailableError) throw error;
      throw new DiffUnavailableError('unavailable', `Diff retrieval failed: ${errorMessage(error)}`, error);
    }

    const { reviewable, skipped } = classify(parseUnifiedDiff(rawDiff));
    const decomposition = new Decomposition(job, reviewable, skipped, config);

    logger.info('Decomposed diff', {
      jobId: job.jobId,
      reviewableFiles: reviewable.length,
      fileChunks: decomposition.fileChunkCount,
      skipped: decomposition.skipped.map((entry) => `${entry.filePath} (${entry.reason})`),
    });

    return decomposition;
  }

  return { decompose };
}
