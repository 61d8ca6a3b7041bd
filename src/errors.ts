/**
 * Raised when a caller breaks the argument contract of the writer:
 * an odd number of arguments, or a key that is not a non-empty string.
 *
 * Fatal to the call that raised it; no pair of that call is written.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Raised for a token that cannot be split into key and value when the
 * `onNoMatch` policy is `'throw'`.
 *
 * `splitToken` itself never throws; it reports the same condition as `null`.
 */
export class TokenSyntaxError extends Error {
  readonly token: string;

  constructor(token: string) {
    super(
      `"${token}" is not a valid key=value token. ` +
        'Expected a key, a single "=" outside of ${...} spans, and a value.'
    );
    this.name = 'TokenSyntaxError';
    this.token = token;
  }
}

/**
 * Raised when a configured schema reports an issue for a built binding map.
 */
export class BindingValidationError extends Error {
  /** Dotted path of the first issue (`'unknown'` when the schema gave none). */
  readonly issuePath: string;

  constructor(context: string, issuePath: string, issueMessage: string) {
    super(`Invalid bindings for "${context}" at "${issuePath}": ${issueMessage}`);
    this.name = 'BindingValidationError';
    this.issuePath = issuePath;
  }
}
