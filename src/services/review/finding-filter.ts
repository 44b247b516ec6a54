import type { PublisherConfig } from '../../config.js';
import type { ChunkReview, Finding, ReviewJob } from '../../types.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import { withRetry } from '../../utils/retry.js';
import type { StateStore } from '../state/state-store.js';
import { formatCommentBody } from './comment-format.js';
import { isTransientPostError } from './publisher.js';
import type { CommentPoster, ExistingComment } from './types.js';

/**
 * Finding Filter
 *
 * Runs between the model reviews and the publisher. Drops findings that give
 * the author nothing to act on, and findings that repeat a review comment
 * already on the pull request.
 */

export type FilterReason = 'empty' | 'praise-only' | 'not-actionable' | 'duplicate';

export interface FilterResult {
  reviews: ChunkReview[];
  removed: number;
  byReason: Record<FilterReason, number>;
}

export interface FindingFilter {
  apply(job: ReviewJob, reviews: readonly ChunkReview[]): Promise<FilterResult>;
}

const PRAISE =
  /\b(good|great|excellent|nice|well done|perfect|correctly|properly|looks good|lgtm|ship it|no issues|no problems|appropriate|suitable|adequate|sufficient)\b|\bno (changes?|improvements?|modifications?) (needed|required|necessary)\b|\bkeep (it |this )?(as is|unchanged)\b/i;

const CONCERN = new RegExp(
  [
    String.raw`\b(bug|error|issue|problem|flaw|vulnerability)\b`,
    String.raw`\b(should|could|might|consider|recommend|suggest)\b`,
    String.raw`\b(missing|lacks?|needs?|requires?)\b`,
    String.raw`\b(incorrect|wrong|invalid|broken|fails?)\b`,
    String.raw`\b(improve|fix|refactor|optimize|simplify)\b`,
    String.raw`\b(avoid|don'?t|shouldn'?t|never)\b`,
    String.raw`\b(instead|rather|better|prefer)\b`,
    String.raw`\b(risk|dangerous|unsafe|insecure)\b`,
    String.raw`\b(redundant|unnecessary|unused|dead)\b`,
    String.raw`\b(inconsistent|confusing|unclear|ambiguous)\b`,
  ].join('|'),
  'i'
);

const ACTION = new RegExp(
  [
    String.raw`\b(add|guard|validate|handle|ensure|remove)\b`,
    String.raw`\b(rename|extract|split|inline|catch|throw|document)\b`,
    String.raw`\b(check|return|log|move)\s+\w+`,
    String.raw`\b(replace|reorder|restructure)\b`,
    String.raw`\buse\s+(a|an|the|\w+ing)\b`,
  ].join('|'),
  'i'
);

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'are', 'was', 'were', 'this', 'that', 'these', 'those', 'with', 'from',
  'into', 'its', 'has', 'have', 'had', 'can', 'will', 'would', 'not', 'but', 'you', 'your',
]);

// Same line needs less textual overlap than a nearby one
const SAME_LINE_SIMILARITY = 0.5;
const NEARBY_SIMILARITY = 0.7;
const NEARBY_LINES = 3;

/** Why a finding gives nothing to act on, or null when it is kept. */
export function actionabilityOf(finding: Finding): Exclude<FilterReason, 'duplicate'> | null {
  const message = finding.message.trim();
  if (message.length === 0) return 'empty';
  if (CONCERN.test(message) || ACTION.test(message)) return null;
  if (PRAISE.test(message)) return 'praise-only';
  return finding.suggestion?.trim() ? null : 'not-actionable';
}

function tokens(body: string): Set<string> {
  const text = body
    .replace(/```[\s\S]*?```/g, ' ')
    .replace(/^\*\*[^*\n]+\*\*:/gm, ' ')
    .replace(/_Line \d+ is outside the diff; this comment applies to the file\._/g, ' ')
    .toLowerCase();
  return new Set(text.split(/[^a-z0-9]+/).filter((word) => word.length > 2 && !STOP_WORDS.has(word)));
}

/** Jaccard similarity of the comment bodies' word sets, ignoring labels and code blocks. */
export function textSimilarity(a: string, b: string): number {
  const left = tokens(a);
  const right = tokens(b);
  if (left.size === 0 || right.size === 0) return 0;

  const shared = [...left].filter((word) => right.has(word)).length;
  return shared / (left.size + right.size - shared);
}

export function isDuplicate(finding: Finding, existing: readonly ExistingComment[]): boolean {
  const body = formatCommentBody(finding);

  return existing.some((comment) => {
    if (comment.filePath !== finding.filePath) return false;
    const similarity = textSimilarity(body, comment.body);

    if (finding.anchor.kind === 'file' || comment.line === null) {
      return similarity >= NEARBY_SIMILARITY;
    }
    const distance = Math.abs(comment.line - finding.anchor.line);
    if (distance === 0) return similarity >= SAME_LINE_SIMILARITY;
    return distance <= NEARBY_LINES && similarity >= NEARBY_SIMILARITY;
  });
}

export function createFindingFilter(deps: {
  poster: CommentPoster;
  store: StateStore;
  config: PublisherConfig;
  logger: Logger;
}): FindingFilter {
  const { poster, store, config, logger } = deps;

  async function existingComments(job: ReviewJob): Promise<ExistingComment[]> {
    try {
      const own = new Set((await store.listComments(job.jobId)).map((comment) => comment.externalCommentId));
      const listed = await withRetry((signal) => poster.listComments(job, signal), {
        config: config.retry,
        logger,
        label: `list comments ${job.jobId}`,
        isTransient: isTransientPostError,
        timeoutMs: config.timeoutMs,
      });
      return listed.filter((comment) => !own.has(comment.externalCommentId));
    } catch (error) {
      logger.warn('Could not list existing comments, posting without duplicate check', {
        jobId: job.jobId,
        error: errorMessage(error),
      });
      return [];
    }
  }

  async function apply(job: ReviewJob, reviews: readonly ChunkReview[]): Promise<FilterResult> {
    const byReason: Record<FilterReason, number> = { empty: 0, 'praise-only': 0, 'not-actionable': 0, duplicate: 0 };
    if (!config.filterNonActionable && !config.skipDuplicateComments) {
      return { reviews: [...reviews], removed: 0, byReason };
    }

    const existing = config.skipDuplicateComments ? await existingComments(job) : [];

    const reasonFor = (finding: Finding): FilterReason | null => {
      const unactionable = config.filterNonActionable ? actionabilityOf(finding) : null;
      if (unactionable) return unactionable;
      return existing.length > 0 && isDuplicate(finding, existing) ? 'duplicate' : null;
    };

    let removed = 0;
    const filtered = reviews.map((review) => ({
      ...review,
      findings: review.findings.filter((finding) => {
        const reason = reasonFor(finding);
        if (reason === null) return true;
        byReason[reason]++;
        removed++;
        logger.debug('Filtered finding', {
          jobId: job.jobId,
          filePath: finding.filePath,
          line: finding.anchor.kind === 'line' ? finding.anchor.line : null,
          reason,
        });
        return false;
      }),
    }));

    if (removed > 0) {
      logger.info('Filtered findings before posting', { jobId: job.jobId, removed, ...byReason });
    }
    return { reviews: filtered, removed, byReason };
  }

  return { apply };
}
