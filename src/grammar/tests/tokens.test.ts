import { describe, expect, it } from 'vitest';
import { tokensToPairs } from '..';
import { TokenSyntaxError } from '../../errors';
import { createLoggerSpy } from '../../utils/tests/logger-spy';

describe('tokensToPairs', () => {
  it('flattens tokens into alternating keys and values', () => {
    expect(tokensToPairs(['a=1', 'b=${x ? 1 : 2}', 'c=/some/path'])).toEqual([
      'a',
      '1',
      'b',
      '${x ? 1 : 2}',
      'c',
      '/some/path'
    ]);
  });

  it('returns an empty list for no tokens', () => {
    expect(tokensToPairs([])).toEqual([]);
  });

  it('throws a TokenSyntaxError naming the token by default', () => {
    expect(() => tokensToPairs(['a=1', 'broken'])).toThrow(TokenSyntaxError);

    try {
      tokensToPairs(['a=1', 'broken']);
    } catch (error) {
      expect(error).toBeInstanceOf(TokenSyntaxError);
      if (error instanceof TokenSyntaxError) {
        expect(error.token).toBe('broken');
        expect(error.message).toBe(
          '"broken" is not a valid key=value token. ' +
            'Expected a key, a single "=" outside of ${...} spans, and a value.'
        );
      }
    }
  });

  it('skips and logs unsplittable tokens under the skip policy', () => {
    const logger = createLoggerSpy();

    const params = tokensToPairs(['a=1', 'broken', 'b=2'], {
      onNoMatch: 'skip',
      logger
    });

    expect(params).toEqual(['a', '1', 'b', '2']);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      'Skipping token that is not a key=value pair',
      { token: 'broken' }
    );
  });
});
