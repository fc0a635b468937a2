/**
 * Error thrown when a matching rules file cannot be read, parsed or validated.
 */
export class MatchingRulesError extends Error {
  constructor(
    message: string,
    /** One line per schema violation or invalid pattern */
    public readonly details: string[] = [],
  ) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'MatchingRulesError';
    Object.setPrototypeOf(this, MatchingRulesError.prototype);
  }
}
