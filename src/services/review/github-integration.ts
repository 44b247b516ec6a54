import { Octokit } from '@octokit/rest';
import { createAppAuth } from '@octokit/auth-app';
import type { GitHubConfig, RetryConfig } from '../../config.js';
import { ConfigError, DiffUnavailableError, PostError } from '../../errors.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import { withRetry } from '../../utils/retry.js';
import type { CommentPoster, DiffSource, ExistingComment, OutboundComment, PullRequestTarget } from './types.js';

/**
 * GitHub Integration Module
 *
 * Fetches pull request diffs and posts review comments through the REST API.
 */

export type OctokitFactory = (installationId?: number) => Octokit;

/**
 * One client per installation when authenticating as a GitHub App, a single
 * token client otherwise.
 */
export function createOctokitFactory(config: GitHubConfig): OctokitFactory {
  const clients = new Map<number, Octokit>();
  let tokenClient: Octokit | undefined;

  return (installationId) => {
    if (config.appId && config.privateKey && installationId !== undefined) {
      let client = clients.get(installationId);
      if (!client) {
        client = new Octokit({
          authStrategy: createAppAuth,
          auth: {
            appId: config.appId,
            privateKey: config.privateKey,
            installationId,
          },
        });
        clients.set(installationId, client);
      }
      return client;
    }

    if (!config.token) {
      throw new ConfigError(['GITHUB_TOKEN: required for events without an app installation']);
    }
    tokenClient ??= new Octokit({ auth: config.token });
    return tokenClient;
  };
}

export function splitRepository(repositoryId: string): { owner: string; repo: string } {
  const [owner, repo, ...rest] = repositoryId.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new DiffUnavailableError('not-found', `Invalid repository id "${repositoryId}"`);
  }
  return { owner, repo };
}

export function httpStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function isTransientHttpError(error: unknown): boolean {
  const status = httpStatus(error);
  if (status === undefined) return true;
  return status === 429 || status >= 500;
}

const REVIEW_PREFIX = 'review:';
const ISSUE_PREFIX = 'issue:';

export function createGitHubIntegration(deps: {
  octokitFor: OctokitFactory;
  logger: Logger;
  retry: RetryConfig;
  timeoutMs?: number;
}): DiffSource & CommentPoster {
  const { octokitFor, logger, retry, timeoutMs } = deps;

  async function fetchDiff(target: PullRequestTarget): Promise<string> {
    const { owner, repo } = splitRepository(target.repositoryId);
    const octokit = octokitFor(target.installationId);

    try {
      return await withRetry(
        async (signal) => {
          logger.info('Fetching diff from GitHub API', {
            owner,
            repo,
            prNumber: target.pullRequestNumber,
            headCommitSha: target.headCommitSha.substring(0, 7),
          });

          const response = target.baseCommitSha
            ? await octokit.rest.repos.compareCommitsWithBasehead({
                owner,
                repo,
                basehead: `${target.baseCommitSha}...${target.headCommitSha}`,
                mediaType: { format: 'diff' },
                request: { signal },
              })
            : await octokit.rest.pulls.get({
                owner,
                repo,
                pull_number: target.pullRequestNumber,
                mediaType: { format: 'diff' },
                request: { signal },
              });

          // The diff media type returns raw text in place of the JSON body
          const data: unknown = response.data;
          if (typeof data !== 'string') {
            throw new DiffUnavailableError('unavailable', 'GitHub did not return a text diff');
          }
          return data;
        },
        {
          config: retry,
          logger,
          label: `diff ${target.repositoryId}#${target.pullRequestNumber}`,
          isTransient: (error) => !(error instanceof DiffUnavailableError) && isTransientHttpError(error),
          timeoutMs,
        }
      );
    } catch (error) {
      if (error instanceof DiffUnavailableError) throw error;
      const status = httpStatus(error);
      const reason = status === 404 || status === 422 ? 'not-found' : 'unavailable';
      throw new DiffUnavailableError(
        reason,
        `Could not fetch diff for ${target.repositoryId}@${target.headCommitSha}: ${errorMessage(error)}`,
        error
      );
    }
  }

  function toPostError(action: string, error: unknown): PostError {
    return new PostError(`${action}: ${errorMessage(error)}`, isTransientHttpError(error), error);
  }

  async function postComment(
    target: PullRequestTarget,
    comment: OutboundComment,
    signal?: AbortSignal
  ): Promise<string> {
    const { owner, repo } = splitRepository(target.repositoryId);
    const octokit = octokitFor(target.installationId);

    try {
      const response =
        comment.position === null
          ? await octokit.rest.pulls.createReviewComment({
              owner,
              repo,
              pull_number: target.pullRequestNumber,
              commit_id: target.headCommitSha,
              path: comment.filePath,
              body: comment.body,
              subject_type: 'file',
              request: { signal },
            })
          : await octokit.rest.pulls.createReviewComment({
              owner,
              repo,
              pull_number: target.pullRequestNumber,
              commit_id: target.headCommitSha,
              path: comment.filePath,
              position: comment.position,
              body: comment.body,
              request: { signal },
            });

      logger.info('Posted review comment', {
        path: comment.filePath,
        position: comment.position,
        commentId: response.data.id,
      });
      return `${REVIEW_PREFIX}${response.data.id}`;
    } catch (error) {
      throw toPostError(`Failed to post comment on ${comment.filePath}`, error);
    }
  }

  async function postSummary(target: PullRequestTarget, body: string, signal?: AbortSignal): Promise<string> {
    const { owner, repo } = splitRepository(target.repositoryId);
    const octokit = octokitFor(target.installationId);

    try {
      const response = await octokit.rest.issues.createComment({
        owner,
        repo,
        issue_number: target.pullRequestNumber,
        body,
        request: { signal },
      });
      logger.info('Posted review summary', { commentId: response.data.id });
      return `${ISSUE_PREFIX}${response.data.id}`;
    } catch (error) {
      throw toPostError('Failed to post review summary', error);
    }
  }

  async function deleteComment(
    target: PullRequestTarget,
    externalCommentId: string,
    signal?: AbortSignal
  ): Promise<void> {
    const { owner, repo } = splitRepository(target.repositoryId);
    const octokit = octokitFor(target.installationId);

    try {
      if (externalCommentId.startsWith(REVIEW_PREFIX)) {
        await octokit.rest.pulls.deleteReviewComment({
          owner,
          repo,
          comment_id: Number(externalCommentId.slice(REVIEW_PREFIX.length)),
          request: { signal },
        });
      } else if (externalCommentId.startsWith(ISSUE_PREFIX)) {
        await octokit.rest.issues.deleteComment({
          owner,
          repo,
          comment_id: Number(externalCommentId.slice(ISSUE_PREFIX.length)),
          request: { signal },
        });
      } else {
        throw new PostError(`Unknown comment id "${externalCommentId}"`, false);
      }
    } catch (error) {
      if (error instanceof PostError) throw error;
      // Already gone
      if (httpStatus(error) === 404) return;
      throw toPostError(`Failed to delete comment ${externalCommentId}`, error);
    }
  }

  async function listComments(target: PullRequestTarget, signal?: AbortSignal): Promise<ExistingComment[]> {
    const { owner, repo } = splitRepository(target.repositoryId);
    const octokit = octokitFor(target.installationId);

    try {
      const comments = await octokit.paginate(octokit.rest.pulls.listReviewComments, {
        owner,
        repo,
        pull_number: target.pullRequestNumber,
        per_page: 100,
        request: { signal },
      });
      return comments.map((comment) => ({
        externalCommentId: `${REVIEW_PREFIX}${comment.id}`,
        filePath: comment.path,
        line: comment.line ?? null,
        body: comment.body,
      }));
    } catch (error) {
      throw toPostError(`Failed to list comments on ${target.repositoryId}#${target.pullRequestNumber}`, error);
    }
  }

  return { fetchDiff, postComment, postSummary, deleteComment, listComments };
}
