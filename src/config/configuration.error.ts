/** Raised at startup when required configuration is missing or malformed; the process exits on it */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}
