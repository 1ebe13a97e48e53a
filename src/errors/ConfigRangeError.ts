import { AppError } from './AppError';

/**
 * Configuration Range Error (422 Unprocessable Entity)
 * Fatal: raised while resolving the run configuration, before any asset is processed.
 * Examples: thresholds out of order, zero-length Z-score window, unknown period label
 */
export class ConfigRangeError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 422, 'CONFIG_RANGE');
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigRangeError.prototype);
  }
}
