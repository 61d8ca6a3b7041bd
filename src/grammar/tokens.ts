import type { BindingLogger, NoMatchPolicy } from '../types';
import { TokenSyntaxError } from '../errors';
import { createLogger } from '../logger';
import { splitToken } from './split-token';

const defaultLogger = createLogger('grammar');

export type TokensToPairsOptions = {
  /**
   * Policy for tokens `splitToken` rejects.
   * @default 'throw'
   */
  onNoMatch?: NoMatchPolicy;

  /**
   * Receives skipped tokens under the `'skip'` policy.
   */
  logger?: BindingLogger;
};

/**
 * Splits a list of `key=value` tokens into the flat argument shape of the
 * writer: `[key1, value1, key2, value2, ...]`.
 *
 * Order is preserved, so a later token for the same key wins once written.
 *
 * @param tokens
 *   Raw tokens, typically an argument list or configuration property values.
 * @param options
 *   No-match policy and logger.
 * @returns
 *   Keys and raw values, alternating.
 * @throws
 *   `TokenSyntaxError` for the first unsplittable token under `'throw'`.
 */
export function tokensToPairs(
  tokens: readonly string[],
  options: TokensToPairsOptions = {}
): string[] {
  const { onNoMatch = 'throw', logger = defaultLogger } = options;
  const params: string[] = [];

  for (const token of tokens) {
    const pair = splitToken(token);

    if (!pair) {
      if (onNoMatch === 'throw') {
        throw new TokenSyntaxError(token);
      }
      logger.warn('Skipping token that is not a key=value pair', { token });
      continue;
    }

    params.push(pair.key, pair.value);
  }

  return params;
}
