import { AppError } from './AppError';

/**
 * Series too short for a lookback period (period set) or for analysis at all (period null)
 * Soft failure: the metric is reported as null
 */
export class InsufficientHistoryError extends AppError {
  public readonly ticker: string;
  public readonly period: string | null;

  constructor(ticker: string, period: string | null, message: string) {
    super(message, 422, 'INSUFFICIENT_HISTORY');
    this.ticker = ticker;
    this.period = period;
    Object.setPrototypeOf(this, InsufficientHistoryError.prototype);
  }
}
