import eld from 'eld/medium';
import type { Logger } from '../logger.js';
import type { LanguageDetector } from '../types.js';
import { detectScriptLanguage } from './script-detector.js';

export interface CreateLanguageDetectorOptions {
  logger?: Partial<Logger>;
}

/**
 * Default detector: n-gram detection through eld, with the Unicode-script
 * classification as fallback when eld has no answer or fails.
 */
export function createLanguageDetector(options: CreateLanguageDetectorOptions = {}): LanguageDetector {
  const logger = options.logger ?? {};
  return {
    detect(text) {
      try {
        const result = eld.detect(text);
        if (result.language) {
          return result.language;
        }
        logger.debug?.('language.detect.fallback', { sample: text.slice(0, 30) });
      } catch (error) {
        logger.warn?.('language.detect.failed', {
          sample: text.slice(0, 30),
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return detectScriptLanguage(text);
    },
  };
}
