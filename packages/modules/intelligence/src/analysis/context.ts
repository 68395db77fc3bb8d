import type { AnalysisConfig } from '../config/analysis-config';
import type { CalendarDate } from '../types';

export interface AnalysisContext {
  config: AnalysisConfig;
  /** Reference date for time windows and overdue checks. */
  asOf: CalendarDate;
  /** Data-quality confidence (0–100) of the batch being analyzed. */
  dataConfidence: number;
}
