import type { OutputTable } from '../types/record'
import type { RunReport } from '../types/report'

/**
 * Outcome of one cleaning run.
 */
export interface PipelineResult {
  /** Normalized table, identifier column first */
  table: OutputTable
  /** Counters gathered by every stage */
  report: RunReport
}
