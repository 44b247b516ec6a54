import type { ModelConfig } from '../../config.js';
import { ModelFatalError, ModelTransientError } from '../../errors.js';
import type { ChunkReview, DiffChunk, GlobalContext, ModelRequest, ModelResponse } from '../../types.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import { withRetry } from '../../utils/retry.js';
import { isTransientModelError } from '../providers/classify-error.js';
import type { ModelProvider, UsageReport } from '../providers/schema.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { CHARS_PER_TOKEN, estimateTokens, getLanguageFromPath } from './config.js';
import { renderChunkContent } from './decomposer.js';
import { buildReviewContent, buildSummaryContent, createReviewSystemPrompt, SUMMARY_SYSTEM_PROMPT } from './prompts.js';

export interface Fitted {
  text: string;
  truncated: boolean;
}

export function truncateText(text: string, budgetTokens: number): Fitted {
  if (estimateTokens(text) <= budgetTokens) return { text, truncated: false };
  return { text: text.slice(0, Math.max(0, budgetTokens) * CHARS_PER_TOKEN), truncated: true };
}

/**
 * Drops the oldest sections until the chunk fits, then trims characters if a
 * single section is still too large.
 */
export function fitChunk(header: string, sections: readonly string[], budgetTokens: number): Fitted {
  const kept = [...sections];
  let truncated = false;
  while (kept.length > 1 && estimateTokens(renderChunkContent(header, kept)) > budgetTokens) {
    kept.shift();
    truncated = true;
  }
  const fitted = truncateText(renderChunkContent(header, kept), budgetTokens);
  return { text: fitted.text, truncated: truncated || fitted.truncated };
}

interface PreparedRequest {
  request: Omit<ModelRequest, 'signal'>;
  truncated: boolean;
}

export interface ModelGateway {
  summarize(chunk: DiffChunk): Promise<GlobalContext>;
  review(chunk: DiffChunk, context: GlobalContext): Promise<ChunkReview>;
  reportUsage(): UsageReport;
}

export function createModelGateway(deps: {
  provider: ModelProvider;
  config: ModelConfig;
  logger: Logger;
  circuitBreaker?: CircuitBreaker;
}): ModelGateway {
  const { provider, config, logger } = deps;
  const circuitBreaker = deps.circuitBreaker ?? new CircuitBreaker({ logger });
  const inputBudget = config.tokenLimit - config.maxOutputTokens;

  function request(system: string, content: string): Omit<ModelRequest, 'signal'> {
    return {
      provider: provider.id,
      modelName: provider.modelName,
      promptTokensEstimate: estimateTokens(system) + estimateTokens(content),
      maxOutputTokens: config.maxOutputTokens,
      system,
      content,
    };
  }

  function available(system: string, emptyContent: string): number {
    const overhead = estimateTokens(system) + estimateTokens(emptyContent);
    const remaining = inputBudget - overhead;
    if (remaining <= 0) {
      throw new ModelFatalError(`Prompt template needs ${overhead} tokens, over the input budget of ${inputBudget}`);
    }
    return remaining;
  }

  function prepareSummary(chunk: DiffChunk): PreparedRequest {
    const budget = available(SUMMARY_SYSTEM_PROMPT, buildSummaryContent(''));
    const diff = fitChunk(chunk.header, chunk.sections, budget);
    return {
      request: request(SUMMARY_SYSTEM_PROMPT, buildSummaryContent(diff.text)),
      truncated: diff.truncated,
    };
  }

  function prepareReview(chunk: DiffChunk, filePath: string, context: GlobalContext): PreparedRequest {
    const language = getLanguageFromPath(filePath);
    const system = createReviewSystemPrompt(language);
    const budget = available(system, buildReviewContent({ context: '', filePath, language, diff: '' }));

    const contextText = truncateText(context.text, Math.floor(budget * config.contextShare));
    const diff = fitChunk(chunk.header, chunk.sections, budget - estimateTokens(contextText.text));

    return {
      request: request(system, buildReviewContent({ context: contextText.text, filePath, language, diff: diff.text })),
      truncated: contextText.truncated || diff.truncated,
    };
  }

  async function call(
    label: string,
    prepared: Omit<ModelRequest, 'signal'>,
    invoke: (request: ModelRequest) => Promise<ModelResponse>
  ): Promise<ModelResponse> {
    return withRetry(
      async (signal) => {
        if (!circuitBreaker.canExecute()) {
          throw new ModelTransientError('Circuit breaker is open');
        }
        try {
          const response = await invoke({ ...prepared, signal });
          circuitBreaker.recordSuccess();
          return response;
        } catch (error) {
          circuitBreaker.recordFailure(CircuitBreaker.isOverloadError(error));
          throw error;
        }
      },
      {
        config: config.retry,
        logger,
        label,
        isTransient: isTransientModelError,
        timeoutMs: config.timeoutMs,
      }
    );
  }

  function logTruncation(chunk: DiffChunk, prepared: PreparedRequest): void {
    if (!prepared.truncated) return;
    logger.warn('Truncated prompt to fit token budget', {
      chunkId: chunk.chunkId,
      filePath: chunk.filePath,
      promptTokensEstimate: prepared.request.promptTokensEstimate,
      inputBudget,
    });
  }

  async function summarize(chunk: DiffChunk): Promise<GlobalContext> {
    try {
      const prepared = prepareSummary(chunk);
      logTruncation(chunk, prepared);
      const response = await call(`summary ${chunk.chunkId}`, prepared.request, (req) => provider.summarize(req));

      logger.info('Summarized pull request', {
        chunkId: chunk.chunkId,
        tokenUsage: response.tokenUsage,
      });
      return { text: response.rawText.trim(), outcome: prepared.truncated ? 'degraded' : 'ok' };
    } catch (error) {
      logger.error('Summary call failed', { chunkId: chunk.chunkId, error: errorMessage(error) });
      return { text: '', outcome: 'failed', error: errorMessage(error) };
    }
  }

  async function review(chunk: DiffChunk, context: GlobalContext): Promise<ChunkReview> {
    const filePath = chunk.filePath ?? '';
    const base = { chunkId: chunk.chunkId, ordinal: chunk.ordinal, filePath, positions: chunk.positions };

    try {
      const prepared = prepareReview(chunk, filePath, context);
      logTruncation(chunk, prepared);
      const response = await call(filePath, prepared.request, (req) => provider.review(req, filePath));

      const findings = response.findings.filter((finding) => finding.filePath === filePath);
      if (findings.length < response.findings.length) {
        logger.warn('Dropped findings for files outside the chunk', {
          chunkId: chunk.chunkId,
          filePath,
          dropped: response.findings.length - findings.length,
        });
      }

      logger.info('Reviewed chunk', {
        chunkId: chunk.chunkId,
        filePath,
        findings: findings.length,
        tokenUsage: response.tokenUsage,
      });
      return { ...base, outcome: prepared.truncated ? 'degraded' : 'ok', findings };
    } catch (error) {
      logger.error('Review call failed', { chunkId: chunk.chunkId, filePath, error: errorMessage(error) });
      return { ...base, outcome: 'failed', findings: [], error: errorMessage(error) };
    }
  }

  return {
    summarize,
    review,
    reportUsage: () => provider.reportUsage(),
  };
}
