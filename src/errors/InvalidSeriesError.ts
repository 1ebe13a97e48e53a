import { AppError } from './AppError';

/**
 * Price series violates its invariants (unordered, duplicate timestamps, non-positive prices)
 */
export class InvalidSeriesError extends AppError {
  public readonly ticker: string;

  constructor(ticker: string, message: string) {
    super(message, 422, 'INVALID_SERIES');
    this.ticker = ticker;
    Object.setPrototypeOf(this, InvalidSeriesError.prototype);
  }
}
