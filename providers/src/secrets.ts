import process from 'node:process';
import { loadEnv } from '@subpair/core';
import type { ProviderLogger, SecretResolver } from './types.js';

export interface EnvSecretResolverOptions {
  logger?: ProviderLogger;
  /** Skip reading .env files; only the process environment is used */
  skipDotenv?: boolean;
}

/**
 * Resolves secrets from `process.env`. The workspace .env files are loaded
 * on first use; variables already set in the environment win.
 */
export function createEnvSecretResolver(options: EnvSecretResolverOptions = {}): SecretResolver {
  let loaded = options.skipDotenv ?? false;
  return {
    async getSecret(key: string): Promise<string | null> {
      if (!loaded) {
        loadEnv(import.meta.url, { logger: options.logger });
        loaded = true;
      }
      const value = process.env[key];
      return value && value.trim() !== '' ? value : null;
    },
  };
}
