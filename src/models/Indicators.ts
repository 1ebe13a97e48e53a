/**
 * Supporting technical indicators on the normalized series
 * Each value is null when the series is shorter than the indicator window
 */
export interface TechnicalIndicators {
  rsi: number | null;
  bollingerUpper: number | null;
  bollingerLower: number | null;
  pctFromMa50: number | null; // Percentage, e.g. 12.5 = 12.5% above MA50
  pctFromMa200: number | null;
}
