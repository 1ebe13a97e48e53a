import { AppError } from './AppError';
import { RateRejectionReason } from '@/models';

/**
 * FX rate found but rejected by the sanity check
 * Per-asset data-quality error: the rate is never applied
 */
export class InvalidRateError extends AppError {
  public readonly pair: string;
  public readonly timestamp: Date;
  public readonly rate: number;
  public readonly reason: RateRejectionReason;

  constructor(pair: string, timestamp: Date, rate: number, reason: RateRejectionReason) {
    super(
      `Rejected ${pair} rate ${rate} at ${timestamp.toISOString()}: ${reason}`,
      422,
      'INVALID_RATE'
    );
    this.pair = pair;
    this.timestamp = timestamp;
    this.rate = rate;
    this.reason = reason;
    Object.setPrototypeOf(this, InvalidRateError.prototype);
  }
}
