/**
 * Central export point for all custom errors
 */
export * from './AppError';
export * from './ValidationError';
export * from './NotFoundError';
export * from './ConfigRangeError';
export * from './MissingRateError';
export * from './InvalidRateError';
export * from './InsufficientHistoryError';
export * from './InvalidSeriesError';

import { MissingRateError } from './MissingRateError';
import { InvalidRateError } from './InvalidRateError';

/**
 * Errors a conversion can report for a single observation
 */
export type FXValidationError = MissingRateError | InvalidRateError;
