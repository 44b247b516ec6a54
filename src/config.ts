import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LogLevel } from './utils/logger.js';

export type QueueMode = 'durable' | 'embedded' | 'synchronous';
export type SupersededCommentPolicy = 'keep' | 'retract';

export const DEFAULT_EXCLUDE_PATTERNS = [
  '**/node_modules/**',
  '**/vendor/**',
  '**/dist/**',
  '**/build/**',
  '**/*.generated.*',
  '**/*.min.js',
  '**/*.lock',
  '**/package-lock.json',
  '**/yarn.lock',
  '**/pnpm-lock.yaml',
  '**/__generated__/**',
];

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

const int = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z
  .object({
    PORT: int(8080),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    QUEUE_MODE: z.enum(['durable', 'embedded', 'synchronous']).default('embedded'),
    PUBSUB_PROJECT_ID: z.string().min(1).optional(),
    PUBSUB_TOPIC: z.string().min(1).optional(),
    PUBSUB_MAX_DELIVERY_ATTEMPTS: int(5),
    CONVEX_URL: z.string().url().optional(),
    EMBEDDED_QUEUE_PATH: z.string().min(1).default('./data/review-relay.db'),
    EMBEDDED_POLL_INTERVAL_MS: int(1000),
    EMBEDDED_LEASE_MS: int(10 * 60 * 1000),
    EMBEDDED_MAX_DELIVERIES: int(5),
    WORKER_CONCURRENCY: int(2),

    LLM_MODEL: z
      .string()
      .regex(/^[a-z0-9-]+\/.+$/, 'must look like "provider/model"')
      .default('anthropic/claude-sonnet-4-20250514'),
    LLM_TOKEN_LIMIT: int(131072),
    LLM_MAX_OUTPUT_TOKENS: int(4096),
    LLM_MAX_ATTEMPTS: int(3),
    LLM_RETRY_BASE_DELAY_MS: int(5000),
    LLM_RETRY_MAX_DELAY_MS: int(60000),
    LLM_RETRY_JITTER: flag(true),
    LLM_TIMEOUT_MS: int(120000),
    LLM_CONCURRENCY: int(3),
    LLM_CONTEXT_SHARE: z.coerce.number().gt(0).lt(1).default(0.25),
    ANTHROPIC_API_KEY: z.string().min(1).optional(),
    OPENAI_API_KEY: z.string().min(1).optional(),
    GOOGLE_GENERATIVE_AI_API_KEY: z.string().min(1).optional(),

    SUMMARY_TOKEN_BUDGET: int(32000),
    CHUNK_TOKEN_BUDGET: int(24000),
    REVIEW_EXCLUDE_PATTERNS: z.string().optional(),
    REVIEW_DRAFT_PRS: flag(false),

    GITHUB_TOKEN: z.string().min(1).optional(),
    GITHUB_APP_ID: z.string().min(1).optional(),
    GITHUB_PRIVATE_KEY: z.string().min(1).optional(),
    GITHUB_WEBHOOK_SECRET: z.string().min(1),

    FILE_LEVEL_FALLBACK: flag(true),
    SUPERSEDED_COMMENT_POLICY: z.enum(['keep', 'retract']).default('keep'),
    FILTER_NON_ACTIONABLE: flag(true),
    SKIP_DUPLICATE_COMMENTS: flag(true),
    POST_TIMEOUT_MS: int(15000),
    POST_MAX_ATTEMPTS: int(3),
    POST_RETRY_BASE_DELAY_MS: int(1000),
  })
  .superRefine((env, ctx) => {
    if (env.QUEUE_MODE === 'durable') {
      for (const key of ['PUBSUB_PROJECT_ID', 'PUBSUB_TOPIC', 'CONVEX_URL'] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: 'required when QUEUE_MODE=durable',
          });
        }
      }
    }

    if (!env.GITHUB_TOKEN && !(env.GITHUB_APP_ID && env.GITHUB_PRIVATE_KEY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GITHUB_TOKEN'],
        message: 'set GITHUB_TOKEN or both GITHUB_APP_ID and GITHUB_PRIVATE_KEY',
      });
    }

    const provider = env.LLM_MODEL.split('/')[0];
    const keyByProvider: Record<string, string | undefined> = {
      anthropic: env.ANTHROPIC_API_KEY,
      openai: env.OPENAI_API_KEY,
      google: env.GOOGLE_GENERATIVE_AI_API_KEY,
    };
    if (provider in keyByProvider && !keyByProvider[provider]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['LLM_MODEL'],
        message: `no API key configured for provider "${provider}"`,
      });
    }

    if (env.LLM_MAX_OUTPUT_TOKENS >= env.LLM_TOKEN_LIMIT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['LLM_MAX_OUTPUT_TOKENS'],
        message: 'must be smaller than LLM_TOKEN_LIMIT',
      });
    }
  });

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  enableJitter: boolean;
}

export interface ModelConfig {
  model: string;
  tokenLimit: number;
  maxOutputTokens: number;
  timeoutMs: number;
  concurrency: number;
  contextShare: number;
  retry: RetryConfig;
  apiKeys: {
    anthropic?: string;
    openai?: string;
    google?: string;
  };
}

export interface DecomposerConfig {
  summaryTokenBudget: number;
  chunkTokenBudget: number;
  excludePatterns: string[];
}

export interface PublisherConfig {
  fileLevelFallback: boolean;
  supersededCommentPolicy: SupersededCommentPolicy;
  /** Drop praise-only and non-actionable findings before posting. */
  filterNonActionable: boolean;
  /** Drop findings that repeat a comment already on the pull request. */
  skipDuplicateComments: boolean;
  timeoutMs: number;
  retry: RetryConfig;
}

export interface GitHubConfig {
  token?: string;
  appId?: string;
  privateKey?: string;
  webhookSecret: string;
}

export interface QueueConfig {
  mode: QueueMode;
  workerConcurrency: number;
  pubsub?: { projectId: string; topic: string; maxDeliveryAttempts: number };
  convexUrl?: string;
  embedded: { path: string; pollIntervalMs: number; leaseMs: number; maxDeliveries: number };
}

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  reviewDraftPullRequests: boolean;
  queue: QueueConfig;
  model: ModelConfig;
  decomposer: DecomposerConfig;
  publisher: PublisherConfig;
  github: GitHubConfig;
}

function parsePatterns(value: string | undefined): string[] {
  if (value === undefined) return DEFAULT_EXCLUDE_PATTERNS;
  return value
    .split(',')
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern.length > 0);
}

/**
 * Reads the environment once. Every invalid variable is reported in a single
 * ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    reviewDraftPullRequests: e.REVIEW_DRAFT_PRS,
    queue: {
      mode: e.QUEUE_MODE,
      workerConcurrency: e.WORKER_CONCURRENCY,
      pubsub:
        e.PUBSUB_PROJECT_ID && e.PUBSUB_TOPIC
          ? {
              projectId: e.PUBSUB_PROJECT_ID,
              topic: e.PUBSUB_TOPIC,
              maxDeliveryAttempts: e.PUBSUB_MAX_DELIVERY_ATTEMPTS,
            }
          : undefined,
      convexUrl: e.CONVEX_URL,
      embedded: {
        path: e.EMBEDDED_QUEUE_PATH,
        pollIntervalMs: e.EMBEDDED_POLL_INTERVAL_MS,
        leaseMs: e.EMBEDDED_LEASE_MS,
        maxDeliveries: e.EMBEDDED_MAX_DELIVERIES,
      },
    },
    model: {
      model: e.LLM_MODEL,
      tokenLimit: e.LLM_TOKEN_LIMIT,
      maxOutputTokens: e.LLM_MAX_OUTPUT_TOKENS,
      timeoutMs: e.LLM_TIMEOUT_MS,
      concurrency: e.LLM_CONCURRENCY,
      contextShare: e.LLM_CONTEXT_SHARE,
      retry: {
        maxAttempts: e.LLM_MAX_ATTEMPTS,
        baseDelayMs: e.LLM_RETRY_BASE_DELAY_MS,
        maxDelayMs: e.LLM_RETRY_MAX_DELAY_MS,
        enableJitter: e.LLM_RETRY_JITTER,
      },
      apiKeys: {
        anthropic: e.ANTHROPIC_API_KEY,
        openai: e.OPENAI_API_KEY,
        google: e.GOOGLE_GENERATIVE_AI_API_KEY,
      },
    },
    decomposer: {
      summaryTokenBudget: e.SUMMARY_TOKEN_BUDGET,
      chunkTokenBudget: e.CHUNK_TOKEN_BUDGET,
      excludePatterns: parsePatterns(e.REVIEW_EXCLUDE_PATTERNS),
    },
    publisher: {
      fileLevelFallback: e.FILE_LEVEL_FALLBACK,
      supersededCommentPolicy: e.SUPERSEDED_COMMENT_POLICY,
      filterNonActionable: e.FILTER_NON_ACTIONABLE,
      skipDuplicateComments: e.SKIP_DUPLICATE_COMMENTS,
      timeoutMs: e.POST_TIMEOUT_MS,
      retry: {
        maxAttempts: e.POST_MAX_ATTEMPTS,
        baseDelayMs: e.POST_RETRY_BASE_DELAY_MS,
        maxDelayMs: e.POST_RETRY_BASE_DELAY_MS * 16,
        enableJitter: false,
      },
    },
    github: {
      token: e.GITHUB_TOKEN,
      appId: e.GITHUB_APP_ID,
      privateKey: e.GITHUB_PRIVATE_KEY,
      webhookSecret: e.GITHUB_WEBHOOK_SECRET,
    },
  };
}
