import { generateObject, generateText, type LanguageModel } from 'ai';
import type { ModelRequest, ModelResponse } from '../../types.js';
import { reviewOutputSchema, toFindings, UsageMeter, type ModelProvider, type UsageReport } from './schema.js';

/**
 * Provider backed by the Vercel AI SDK. Retries are disabled in the SDK; the
 * gateway owns them.
 */
export class AiSdkProvider implements ModelProvider {
  private readonly meter: UsageMeter;

  constructor(
    readonly id: string,
    readonly modelName: string,
    private readonly model: LanguageModel
  ) {
    this.meter = new UsageMeter(id, modelName);
  }

  async summarize(request: ModelRequest): Promise<ModelResponse> {
    const result = await generateText({
      model: this.model,
      system: request.system,
      prompt: request.content,
      maxTokens: request.maxOutputTokens,
      abortSignal: request.signal,
      maxRetries: 0,
    });

    return {
      findings: [],
      rawText: result.text,
      tokenUsage: this.meter.record(result.usage.promptTokens, result.usage.completionTokens),
    };
  }

  async review(request: ModelRequest, filePath: string): Promise<ModelResponse> {
    const result = await generateObject({
      model: this.model,
      schema: reviewOutputSchema,
      system: request.system,
      prompt: request.content,
      maxTokens: request.maxOutputTokens,
      abortSignal: request.signal,
      maxRetries: 0,
    });

    return {
      findings: toFindings(result.object.issues, filePath),
      rawText: JSON.stringify(result.object),
      tokenUsage: this.meter.record(result.usage.promptTokens, result.usage.completionTokens),
    };
  }

  reportUsage(): UsageReport {
    return this.meter.report();
  }
}
