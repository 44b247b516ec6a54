import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import OpenAI from 'openai';
import type { ModelConfig } from '../../config.js';
import { ConfigError } from '../../errors.js';
import { AiSdkProvider } from './ai-sdk-provider.js';
import { OpenAIProvider } from './openai-provider.js';
import type { ModelProvider } from './schema.js';

export type ProviderFactory = (modelName: string, config: ModelConfig) => ModelProvider;

export const PROVIDER_FACTORIES: Readonly<Record<string, ProviderFactory>> = {
  anthropic: (modelName, config) =>
    new AiSdkProvider('anthropic', modelName, createAnthropic({ apiKey: config.apiKeys.anthropic })(modelName)),
  google: (modelName, config) =>
    new AiSdkProvider('google', modelName, createGoogleGenerativeAI({ apiKey: config.apiKeys.google })(modelName)),
  openai: (modelName, config) =>
    new OpenAIProvider(modelName, new OpenAI({ apiKey: config.apiKeys.openai, timeout: config.timeoutMs })),
};

export function parseModelId(model: string): { provider: string; modelName: string } {
  const separator = model.indexOf('/');
  if (separator <= 0 || separator === model.length - 1) {
    throw new ConfigError([`LLM_MODEL: "${model}" must look like "provider/model"`]);
  }
  return { provider: model.slice(0, separator), modelName: model.slice(separator + 1) };
}

/** Resolves the configured `provider/model` string to a provider instance. */
export function createModelProvider(
  config: ModelConfig,
  factories: Readonly<Record<string, ProviderFactory>> = PROVIDER_FACTORIES
): ModelProvider {
  const { provider, modelName } = parseModelId(config.model);
  const factory = factories[provider];
  if (!factory) {
    throw new ConfigError([
      `LLM_MODEL: unknown provider "${provider}" (expected one of ${Object.keys(factories).join(', ')})`,
    ]);
  }
  return factory(modelName, config);
}
