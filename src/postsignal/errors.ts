/**
 * postsignal - Pipeline Errors
 *
 * Both errors are fatal for a run. Per-post scoring problems never surface here;
 * the scorer degrades them to neutral values instead.
 */

/** Unordered or malformed post sequence */
export class InvalidInputError extends Error {
  constructor(
    message: string,
    public readonly postId?: string,
    public readonly index?: number,
  ) {
    super(index === undefined ? message : `[post #${index}${postId ? ` ${postId}` : ''}] ${message}`);
    this.name = 'InvalidInputError';
  }
}

/** Missing or invalid analysis configuration */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Errors worth answering with the usage text: bad configuration or flags
 * that `util.parseArgs` refused
 */
export function isUsageError(error: Error): boolean {
  if (error instanceof ConfigurationError) return true;
  return 'code' in error && typeof error.code === 'string' && error.code.startsWith('ERR_PARSE_ARGS');
}
