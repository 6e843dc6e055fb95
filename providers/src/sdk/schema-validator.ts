import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { createProviderError, ProviderErrorCode } from '@subpair/core';

const ajv = new Ajv({ allErrors: true, strict: false });

function describeError(error: ErrorObject): string {
  if (error.keyword === 'additionalProperties') {
    return `unknown field "${String(error.params.additionalProperty)}"`;
  }
  return `${error.instancePath || '/'} ${error.message ?? ''}`.trim();
}

/**
 * Compiles `schema` once and returns a function that passes valid payloads
 * through as `T` and throws a provider config error (E011) otherwise.
 */
export function createPayloadValidator<T>(schema: SchemaObject, label: string): (payload: unknown) => T {
  let validate: ValidateFunction<T>;
  try {
    validate = ajv.compile<T>(schema);
  } catch (error) {
    throw createProviderError(
      ProviderErrorCode.INVALID_PROVIDER_CONFIG,
      `Invalid ${label} schema: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  return (payload) => {
    if (validate(payload)) {
      return payload;
    }
    const messages = (validate.errors ?? []).map(describeError);
    throw createProviderError(ProviderErrorCode.INVALID_PROVIDER_CONFIG, `Invalid ${label}: ${messages.join('; ')}`, {
      context: label,
    });
  };
}
