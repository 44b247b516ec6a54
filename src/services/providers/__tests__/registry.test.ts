import { describe, expect, it, vi } from 'vitest';
import { modelConfig } from '../../../__tests__/helpers.js';
import { ConfigError } from '../../../errors.js';
import { createModelProvider, parseModelId, PROVIDER_FACTORIES, type ProviderFactory } from '../registry.js';

describe('parseModelId', () => {
  it('splits at the first slash', () => {
    expect(parseModelId('openai/gpt-4o')).toEqual({ provider: 'openai', modelName: 'gpt-4o' });
    expect(parseModelId('google/models/gemini-2.0-flash')).toEqual({
      provider: 'google',
      modelName: 'models/gemini-2.0-flash',
    });
  });

  it.each(['gpt-4o', '/gpt-4o', 'openai/'])('rejects %s', (model) => {
    expect(() => parseModelId(model)).toThrow(ConfigError);
  });
});

describe('createModelProvider', () => {
  it('passes the model name to the matching factory', () => {
    const provider = {
      id: 'local',
      modelName: 'tiny',
      summarize: vi.fn(),
      review: vi.fn(),
      reportUsage: vi.fn(),
    };
    const factory = vi.fn<ProviderFactory>().mockReturnValue(provider);
    const config = modelConfig({ model: 'local/tiny' });

    expect(createModelProvider(config, { local: factory })).toBe(provider);
    expect(factory).toHaveBeenCalledWith('tiny', config);
  });

  it('rejects an unknown provider', () => {
    expect(() => createModelProvider(modelConfig({ model: 'mystery/model' }))).toThrow(
      'LLM_MODEL: unknown provider "mystery" (expected one of anthropic, google, openai)'
    );
  });

  it.each([
    ['anthropic', 'claude-sonnet-4-20250514'],
    ['google', 'gemini-2.0-flash'],
    ['openai', 'gpt-4o-mini'],
  ])('builds the %s provider', (id, modelName) => {
    const provider = createModelProvider(
      modelConfig({
        model: `${id}/${modelName}`,
        apiKeys: { anthropic: 'test-key', google: 'test-key', openai: 'test-key' },
      }),
      PROVIDER_FACTORIES
    );

    expect(provider.id).toBe(id);
    expect(provider.modelName).toBe(modelName);
    expect(provider.reportUsage()).toEqual({ provider: id, modelName, calls: 0, promptTokens: 0, completionTokens: 0 });
  });
});
