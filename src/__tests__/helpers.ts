import type { AppConfig, DecomposerConfig, ModelConfig, PublisherConfig, RetryConfig } from '../config.js';
import type { ReviewEvent, ReviewJob } from '../types.js';
import { createLogger } from '../utils/logger.js';

export const testLogger = createLogger('test');

export const fastRetry: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1,
  maxDelayMs: 2,
  enableJitter: false,
};

export function makeJob(overrides: Partial<ReviewJob> = {}): ReviewJob {
  return {
    jobId: 'job-1',
    deliveryId: 'delivery-1',
    repositoryId: 'acme/widgets',
    pullRequestNumber: 7,
    headCommitSha: 'abcdef1234567890',
    baseCommitSha: '0123456789abcdef',
    status: 'running',
    createdAt: '2026-01-01T00:00:00.000Z',
    attemptCount: 1,
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<ReviewEvent> = {}): ReviewEvent {
  return {
    deliveryId: 'delivery-1',
    repositoryId: 'acme/widgets',
    pullRequestNumber: 7,
    headCommitSha: 'abcdef1234567890',
    baseCommitSha: '0123456789abcdef',
    action: 'synchronize',
    receivedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function decomposerConfig(overrides: Partial<DecomposerConfig> = {}): DecomposerConfig {
  return {
    summaryTokenBudget: 10_000,
    chunkTokenBudget: 10_000,
    excludePatterns: ['**/package-lock.json', '**/dist/**'],
    ...overrides,
  };
}

export function modelConfig(overrides: Partial<ModelConfig> = {}): ModelConfig {
  return {
    model: 'anthropic/claude-test',
    tokenLimit: 100_000,
    maxOutputTokens: 1_000,
    timeoutMs: 5_000,
    concurrency: 2,
    contextShare: 0.25,
    retry: fastRetry,
    apiKeys: { anthropic: 'test-key' },
    ...overrides,
  };
}

export function publisherConfig(overrides: Partial<PublisherConfig> = {}): PublisherConfig {
  return {
    fileLevelFallback: true,
    supersededCommentPolicy: 'keep',
    filterNonActionable: true,
    skipDuplicateComments: true,
    timeoutMs: 5_000,
    retry: fastRetry,
    ...overrides,
  };
}

export function appConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 8080,
    logLevel: 'error',
    reviewDraftPullRequests: false,
    queue: {
      mode: 'synchronous',
      workerConcurrency: 1,
      embedded: { path: ':memory:', pollIntervalMs: 10, leaseMs: 60_000, maxDeliveries: 3 },
    },
    model: modelConfig(),
    decomposer: decomposerConfig(),
    publisher: publisherConfig(),
    github: { token: 'test-token', webhookSecret: 'test-secret' },
    ...overrides,
  };
}

/** Plain unified diff built from one file header and hunk line arrays. */
export function fileDiff(path: string, hunks: string[][]): string {
  return [`--- a/${path}`, `+++ b/${path}`, ...hunks.flat()].join('\n');
}
