import { AnalysisRun } from '@/models';

/**
 * Analysis Run Repository Interface
 */
export interface IAnalysisRunRepository {
  /**
   * Store a completed run; it becomes the latest
   */
  save(run: AnalysisRun): Promise<void>;

  findLatest(): Promise<AnalysisRun | null>;
}
