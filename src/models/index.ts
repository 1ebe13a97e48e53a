/**
 * Central export point for all models
 * Allows clean imports: import { Asset, ZScoreRecord } from '@/models'
 */

export * from './Asset';
export * from './FxRate';
export * from './Performance';
export * from './ZScore';
export * from './Indicators';
export * from './Alert';
export * from './Rebalance';
export * from './AnalysisRun';
