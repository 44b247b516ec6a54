import OpenAI from 'openai';
import { ModelFatalError } from '../../errors.js';
import type { ModelRequest, ModelResponse } from '../../types.js';
import { reviewOutputSchema, toFindings, UsageMeter, type ModelProvider, type UsageReport } from './schema.js';

type ChatClient = Pick<OpenAI, 'chat'>;

export class OpenAIProvider implements ModelProvider {
  readonly id = 'openai';
  private readonly meter: UsageMeter;

  constructor(
    readonly modelName: string,
    private readonly client: ChatClient
  ) {
    this.meter = new UsageMeter(this.id, modelName);
  }

  private async complete(request: ModelRequest, json: boolean): Promise<{ text: string; usage: ModelResponse['tokenUsage'] }> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.modelName,
        max_tokens: request.maxOutputTokens,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.content },
        ],
        response_format: json ? { type: 'json_object' } : undefined,
      },
      { signal: request.signal, maxRetries: 0 }
    );

    const text = completion.choices[0]?.message?.content ?? '';
    const usage = this.meter.record(completion.usage?.prompt_tokens, completion.usage?.completion_tokens);
    return { text, usage };
  }

  async summarize(request: ModelRequest): Promise<ModelResponse> {
    const { text, usage } = await this.complete(request, false);
    return { findings: [], rawText: text, tokenUsage: usage };
  }

  async review(request: ModelRequest, filePath: string): Promise<ModelResponse> {
    const { text, usage } = await this.complete(request, true);

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new ModelFatalError('Model returned malformed JSON', error);
    }

    const parsed = reviewOutputSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ModelFatalError(`Model output failed validation: ${parsed.error.message}`);
    }

    return {
      findings: toFindings(parsed.data.issues, filePath),
      rawText: text,
      tokenUsage: usage,
    };
  }

  reportUsage(): UsageReport {
    return this.meter.report();
  }
}
