import { AppError } from './AppError';

/**
 * No FX rate at or before the observation within the staleness window
 * Per-asset data-quality error: recorded in the manifest, never aborts a run
 */
export class MissingRateError extends AppError {
  public readonly pair: string;
  public readonly timestamp: Date;

  constructor(pair: string, timestamp: Date, detail?: string) {
    super(
      `No usable ${pair} rate for ${timestamp.toISOString()}${detail ? ` (${detail})` : ''}`,
      422,
      'MISSING_RATE'
    );
    this.pair = pair;
    this.timestamp = timestamp;
    Object.setPrototypeOf(this, MissingRateError.prototype);
  }
}
