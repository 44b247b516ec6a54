import type { PublisherConfig } from '../../config.js';
import { PostError } from '../../errors.js';
import type {
  ChunkReview,
  Finding,
  GlobalContext,
  ReviewComment,
  ReviewJob,
  SkippedFile,
  SkipReason,
} from '../../types.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import { withRetry } from '../../utils/retry.js';
import { formatCommentBody, formatSummaryBody, type UnreviewedFile } from './comment-format.js';
import type { StateStore } from '../state/state-store.js';
import type { CommentPoster, OutboundComment } from './types.js';

export const SUMMARY_REF = 'summary';

export interface PostResult {
  posted: number;
  failed: number;
  dropped: number;
  alreadyPosted: number;
  /** Line findings posted at file level because the line is outside the diff. */
  coerced: number;
  /** Posting stopped because the job is no longer active. */
  interrupted: boolean;
  comments: ReviewComment[];
}

export interface PublishExtras {
  context: GlobalContext;
  skipped: readonly SkippedFile[];
}

export interface ReviewPublisher {
  publish(job: ReviewJob, reviews: readonly ChunkReview[], extras?: PublishExtras): Promise<PostResult>;
  /** Deletes every comment this job posted; returns how many were removed. */
  retract(job: ReviewJob): Promise<number>;
}

interface PlannedComment {
  findingRef: string;
  comment: OutboundComment;
  coerced: boolean;
}

const SKIP_REASONS: Record<SkipReason, string> = {
  binary: 'binary file',
  excluded: 'excluded by path filter',
  'no-changes': 'no line changes',
  deleted: 'file deleted',
  'oversized-hunk': 'hunk too large to review',
};

export function findingRef(ordinal: number, index: number): string {
  return `${ordinal}:${index}`;
}

export function isTransientPostError(error: unknown): boolean {
  if (error instanceof PostError) return error.transient;
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export function createReviewPublisher(deps: {
  poster: CommentPoster;
  store: StateStore;
  isActive: (jobId: string) => Promise<boolean>;
  config: PublisherConfig;
  logger: Logger;
}): ReviewPublisher {
  const { poster, store, isActive, config, logger } = deps;

  function plan(reviews: readonly ChunkReview[]): { planned: PlannedComment[]; dropped: number } {
    const planned: PlannedComment[] = [];
    let dropped = 0;

    for (const review of [...reviews].sort((a, b) => a.ordinal - b.ordinal)) {
      review.findings.forEach((finding, index) => {
        const ref = findingRef(review.ordinal, index);
        const toComment = (position: number | null, coercedLine: number | null): PlannedComment => ({
          findingRef: ref,
          coerced: coercedLine !== null,
          comment: {
            filePath: finding.filePath,
            position,
            severity: finding.severity,
            body: formatCommentBody(finding, coercedLine === null ? null : { line: coercedLine }),
          },
        });

        if (finding.anchor.kind === 'file') {
          planned.push(toComment(null, null));
          return;
        }

        const position = review.positions.get(finding.anchor.line);
        if (position !== undefined) {
          planned.push(toComment(position, null));
        } else if (config.fileLevelFallback) {
          planned.push(toComment(null, finding.anchor.line));
        } else {
          dropped++;
          logger.debug('Dropped finding outside the commentable lines', {
            findingRef: ref,
            filePath: finding.filePath,
            line: finding.anchor.line,
          });
        }
      });
    }

    return { planned, dropped };
  }

  async function post(job: ReviewJob, ref: string, send: (signal?: AbortSignal) => Promise<string>): Promise<boolean> {
    await store.saveComment({ jobId: job.jobId, findingRef: ref, externalCommentId: null, postStatus: 'pending' });
    try {
      const externalCommentId = await withRetry((signal) => send(signal), {
        config: config.retry,
        logger,
        label: `comment ${job.jobId}/${ref}`,
        isTransient: isTransientPostError,
        timeoutMs: config.timeoutMs,
      });
      await store.saveComment({ jobId: job.jobId, findingRef: ref, externalCommentId, postStatus: 'posted' });
      return true;
    } catch (error) {
      logger.error('Failed to post comment', { jobId: job.jobId, findingRef: ref, error: errorMessage(error) });
      await store.saveComment({
        jobId: job.jobId,
        findingRef: ref,
        externalCommentId: null,
        postStatus: 'failed',
        error: errorMessage(error),
      });
      return false;
    }
  }

  function unreviewedFiles(
    reviews: readonly ChunkReview[],
    skipped: readonly SkippedFile[],
    failedPaths: ReadonlySet<string>
  ): UnreviewedFile[] {
    const entries: UnreviewedFile[] = [
      ...skipped.map((file) => ({ filePath: file.filePath, reason: SKIP_REASONS[file.reason] })),
      ...reviews
        .filter((review) => review.outcome === 'failed')
        .map((review) => ({ filePath: review.filePath, reason: 'model review failed' })),
      ...[...failedPaths].map((filePath) => ({ filePath, reason: 'comments could not be posted' })),
    ];

    const seen = new Set<string>();
    return entries.filter((entry) => {
      const key = `${entry.filePath}\u0000${entry.reason}`;
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }

  async function publish(
    job: ReviewJob,
    reviews: readonly ChunkReview[],
    extras?: PublishExtras
  ): Promise<PostResult> {
    const { planned, dropped } = plan(reviews);
    const result: PostResult = {
      posted: 0,
      failed: 0,
      dropped,
      alreadyPosted: 0,
      coerced: 0,
      interrupted: false,
      comments: [],
    };
    const failedPaths = new Set<string>();

    for (const item of planned) {
      if (!(await isActive(job.jobId))) {
        result.interrupted = true;
        break;
      }

      const existing = await store.getComment(job.jobId, item.findingRef);
      if (existing?.externalCommentId) {
        result.alreadyPosted++;
        continue;
      }

      if (await post(job, item.findingRef, (signal) => poster.postComment(job, item.comment, signal))) {
        result.posted++;
        if (item.coerced) result.coerced++;
      } else {
        result.failed++;
        failedPaths.add(item.comment.filePath);
      }
    }

    if (!result.interrupted && extras) {
      const existing = await store.getComment(job.jobId, SUMMARY_REF);
      if (existing?.externalCommentId) {
        result.alreadyPosted++;
      } else if (!(await isActive(job.jobId))) {
        result.interrupted = true;
      } else {
        const body = formatSummaryBody({
          context: extras.context,
          findings: reviews.flatMap((review): Finding[] => review.findings),
          unreviewed: unreviewedFiles(reviews, extras.skipped, failedPaths),
        });
        if (await post(job, SUMMARY_REF, (signal) => poster.postSummary(job, body, signal))) {
          result.posted++;
        } else {
          result.failed++;
        }
      }
    }

    result.comments = await store.listComments(job.jobId);

    logger.info('Published review', {
      jobId: job.jobId,
      posted: result.posted,
      failed: result.failed,
      dropped: result.dropped,
      alreadyPosted: result.alreadyPosted,
      coerced: result.coerced,
      interrupted: result.interrupted,
    });

    return result;
  }

  async function retract(job: ReviewJob): Promise<number> {
    const comments = await store.listComments(job.jobId);
    let removed = 0;

    for (const comment of comments) {
      if (!comment.externalCommentId) continue;
      const externalCommentId = comment.externalCommentId;
      try {
        await withRetry((signal) => poster.deleteComment(job, externalCommentId, signal), {
          config: config.retry,
          logger,
          label: `retract ${job.jobId}/${comment.findingRef}`,
          isTransient: isTransientPostError,
          timeoutMs: config.timeoutMs,
        });
        removed++;
      } catch (error) {
        logger.warn('Failed to retract comment', {
          jobId: job.jobId,
          externalCommentId,
          error: errorMessage(error),
        });
      }
    }

    logger.info('Retracted superseded review comments', { jobId: job.jobId, removed });
    return removed;
  }

  return { publish, retract };
}
