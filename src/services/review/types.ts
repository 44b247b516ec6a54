import type { Severity } from '../../types.js';

export interface PullRequestTarget {
  repositoryId: string;
  pullRequestNumber: number;
  headCommitSha: string;
  baseCommitSha?: string;
  installationId?: number;
}

/**
 * Source of unified diffs. Implementations throw DiffUnavailableError when the
 * commit cannot be found or the host cannot be reached.
 */
export interface DiffSource {
  fetchDiff(target: PullRequestTarget): Promise<string>;
}

export interface OutboundComment {
  filePath: string;
  /** Diff position; null posts a file-level comment. */
  position: number | null;
  body: string;
  severity: Severity;
}

/** A review comment already on the pull request, by anyone. */
export interface ExistingComment {
  externalCommentId: string;
  filePath: string;
  /** New-side line; null for file-level or outdated comments. */
  line: number | null;
  body: string;
}

/**
 * Posting target. Failures are reported as PostError with `transient` set when
 * a retry may succeed.
 */
export interface CommentPoster {
  postComment(target: PullRequestTarget, comment: OutboundComment, signal?: AbortSignal): Promise<string>;
  postSummary(target: PullRequestTarget, body: string, signal?: AbortSignal): Promise<string>;
  deleteComment(target: PullRequestTarget, externalCommentId: string, signal?: AbortSignal): Promise<void>;
  listComments(target: PullRequestTarget, signal?: AbortSignal): Promise<ExistingComment[]>;
}

export interface CircuitBreakerState {
  isOpen: boolean;
  failureCount: number;
  lastFailureTime: number;
  resetTimeoutMs: number;
  maxFailures: number;
}
