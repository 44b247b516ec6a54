import { z } from 'zod';
import type { Finding, ModelRequest, ModelResponse } from '../../types.js';

export const reviewIssueSchema = z.object({
  file: z.string().optional(),
  line: z.number(),
  severity: z.enum(['critical', 'warning', 'info']),
  category: z.enum(['security', 'bug', 'performance', 'maintainability']).optional(),
  message: z.string().min(1),
  suggestion: z.string().optional(),
});

export const reviewOutputSchema = z.object({
  summary: z.string(),
  issues: z.array(reviewIssueSchema),
});

export type ReviewIssue = z.infer<typeof reviewIssueSchema>;
export type ReviewOutput = z.infer<typeof reviewOutputSchema>;

/**
 * Issues without a file belong to the reviewed file; a non-positive line means
 * the issue concerns the file as a whole.
 */
export function toFindings(issues: ReviewIssue[], filePath: string): Finding[] {
  return issues.map((issue) => {
    const line = Math.trunc(issue.line);
    return {
      filePath: issue.file?.replace(/^[ab]\//, '') || filePath,
      anchor: line > 0 ? { kind: 'line', line } : { kind: 'file' },
      severity: issue.severity,
      message: issue.message,
      suggestion: issue.suggestion || undefined,
    };
  });
}

export interface UsageReport {
  provider: string;
  modelName: string;
  calls: number;
  promptTokens: number;
  completionTokens: number;
}

/**
 * Vendor adapter. `review` returns findings for `filePath` unless the model
 * attributes them elsewhere; errors propagate to the gateway's classifier.
 */
export interface ModelProvider {
  readonly id: string;
  readonly modelName: string;
  summarize(request: ModelRequest): Promise<ModelResponse>;
  review(request: ModelRequest, filePath: string): Promise<ModelResponse>;
  reportUsage(): UsageReport;
}

/** Accumulates token usage across calls of one provider instance. */
export class UsageMeter {
  private calls = 0;
  private promptTokens = 0;
  private completionTokens = 0;

  constructor(
    private readonly provider: string,
    private readonly modelName: string
  ) {}

  record(promptTokens: number | undefined, completionTokens: number | undefined): ModelResponse['tokenUsage'] {
    const usage = {
      promptTokens: Number.isFinite(promptTokens) ? Number(promptTokens) : 0,
      completionTokens: Number.isFinite(completionTokens) ? Number(completionTokens) : 0,
    };
    this.calls++;
    this.promptTokens += usage.promptTokens;
    this.completionTokens += usage.completionTokens;
    return usage;
  }

  report(): UsageReport {
    return {
      provider: this.provider,
      modelName: this.modelName,
      calls: this.calls,
      promptTokens: this.promptTokens,
      completionTokens: this.completionTokens,
    };
  }
}
