import type { ResolvedWriterOptions, WriterOptions } from '../types';
import { DEFAULT_ARRAY_KEYS } from '../constants';
import { UsageError } from '../errors';
import { createLogger } from '../logger';
import { isNonEmptyString } from '../utils/type-guards';

const NO_MATCH_POLICIES: ReadonlySet<string> = new Set(['throw', 'skip']);

const defaultLogger = createLogger('writer');

/**
 * Applies defaults to writer options and checks the values that callers
 * outside of TypeScript can get wrong.
 *
 * @throws `UsageError` for a non-string array key or an unknown policy.
 */
export function resolveWriterOptions(
  options: WriterOptions = {}
): ResolvedWriterOptions {
  const arrayKeys = new Set<string>();
  for (const key of options.arrayKeys ?? DEFAULT_ARRAY_KEYS) {
    if (!isNonEmptyString(key)) {
      throw new UsageError(
        `Invalid array key ${JSON.stringify(key)}: expected a non-empty string.`
      );
    }
    arrayKeys.add(key);
  }

  const onNoMatch = options.onNoMatch ?? 'throw';
  if (!NO_MATCH_POLICIES.has(onNoMatch)) {
    throw new UsageError(
      `Invalid onNoMatch policy "${onNoMatch}": expected "throw" or "skip".`
    );
  }

  return {
    arrayKeys,
    onNoMatch,
    schema: options.schema,
    logger: options.logger ?? defaultLogger
  };
}
