import { describe, expect, it, beforeEach, vi } from 'vitest';
import type { SecretResolver } from '../../types.js';
import { createOpenAiClientManager } from './client.js';
import { createOpenAiEmbeddingProvider } from './embedding.js';

const mocks = vi.hoisted(() => ({
  embedMany: vi.fn(),
  textEmbeddingModel: vi.fn(),
  createOpenAI: vi.fn(),
}));

vi.mock('@ai-sdk/openai', async () => {
  const actual = await vi.importActual<typeof import('@ai-sdk/openai')>('@ai-sdk/openai');
  return {
    ...actual,
    createOpenAI: mocks.createOpenAI,
  };
});

vi.mock('ai', async () => {
  const actual = await vi.importActual<typeof import('ai')>('ai');
  return {
    ...actual,
    embedMany: (...args: unknown[]) => mocks.embedMany(...args),
  };
});

const secretResolver = (value: string | null): SecretResolver => ({
  getSecret: vi.fn(async () => value),
});

describe('createOpenAiEmbeddingProvider', () => {
  beforeEach(() => {
    mocks.embedMany.mockReset();
    mocks.createOpenAI.mockReset();
    mocks.textEmbeddingModel.mockReset();
    mocks.textEmbeddingModel.mockReturnValue('embedding-model-handle');
    mocks.createOpenAI.mockReturnValue({ textEmbeddingModel: mocks.textEmbeddingModel });
    mocks.embedMany.mockResolvedValue({ embeddings: [[1, 0], [0, 1]], usage: { tokens: 4 } });
  });

  it('embeds through the AI SDK with the configured model and dimensions', async () => {
    const debug = vi.fn();
    const provider = createOpenAiEmbeddingProvider({
      model: 'text-embedding-3-small',
      clientManager: createOpenAiClientManager(secretResolver('test-key')),
      config: { dimensions: 2, maxRetries: 1 },
      logger: { debug },
    });

    await expect(provider.embed(['Hello', 'Bonjour'])).resolves.toEqual([[1, 0], [0, 1]]);

    expect(mocks.createOpenAI).toHaveBeenCalledWith({ apiKey: 'test-key' });
    expect(mocks.textEmbeddingModel).toHaveBeenCalledWith('text-embedding-3-small');
    expect(mocks.embedMany).toHaveBeenCalledWith({
      model: 'embedding-model-handle',
      values: ['Hello', 'Bonjour'],
      maxRetries: 1,
      abortSignal: undefined,
      providerOptions: { openai: { dimensions: 2 } },
    });
    expect(debug).toHaveBeenCalledWith('provider.openai.embed', { model: 'text-embedding-3-small', texts: 2, tokens: 4 });
  });

  it('creates the client once across calls', async () => {
    const resolver = secretResolver('test-key');
    const provider = createOpenAiEmbeddingProvider({
      model: 'text-embedding-3-small',
      clientManager: createOpenAiClientManager(resolver),
      config: {},
    });

    await provider.embed(['one', 'two']);
    await provider.embed(['three', 'four']);

    expect(mocks.createOpenAI).toHaveBeenCalledTimes(1);
    expect(resolver.getSecret).toHaveBeenCalledTimes(1);
    expect(mocks.embedMany.mock.calls[0]?.[0]).toMatchObject({ providerOptions: undefined, maxRetries: undefined });
  });

  it('fails with a provider error when the API key is missing', async () => {
    const provider = createOpenAiEmbeddingProvider({
      model: 'text-embedding-3-small',
      clientManager: createOpenAiClientManager(secretResolver(null)),
      config: {},
    });

    await expect(provider.embed(['Hello'])).rejects.toMatchObject({ code: 'E010' });
    expect(mocks.embedMany).not.toHaveBeenCalled();
  });
});
