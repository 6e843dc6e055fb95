import { createOpenAI } from '@ai-sdk/openai';
import { createProviderError, ProviderErrorCode } from '@subpair/core';
import type { ProviderLogger, SecretResolver } from '../../types.js';

export interface OpenAiClientManager {
  ensure(): Promise<ReturnType<typeof createOpenAI>>;
}

/**
 * Creates an OpenAI client manager with lazy initialization.
 *
 * Only live mode uses it; the API key is resolved on the first request.
 */
export function createOpenAiClientManager(
  secretResolver: SecretResolver,
  logger?: ProviderLogger,
): OpenAiClientManager {
  let client: ReturnType<typeof createOpenAI> | null = null;

  return {
    async ensure(): Promise<ReturnType<typeof createOpenAI>> {
      if (client) {
        return client;
      }

      const apiKey = await secretResolver.getSecret('OPENAI_API_KEY');
      if (!apiKey) {
        throw createProviderError(
          ProviderErrorCode.MISSING_API_KEY,
          'OPENAI_API_KEY is required to use the OpenAI embedding provider.',
          { suggestion: 'Set OPENAI_API_KEY in the environment or in the .env file at the workspace root.' },
        );
      }

      client = createOpenAI({ apiKey });
      logger?.debug?.('provider.openai.client.ready');
      return client;
    },
  };
}
