import { AnalysisRun } from '@/models';
import { IAnalysisRunRepository } from './interfaces/IAnalysisRunRepository';

/**
 * Analysis Run Repository
 * Keeps only the latest completed run, in process memory
 */
export class AnalysisRunRepository implements IAnalysisRunRepository {
  private latest: AnalysisRun | null = null;

  async save(run: AnalysisRun): Promise<void> {
    this.latest = run;
  }

  async findLatest(): Promise<AnalysisRun | null> {
    return this.latest;
  }
}
