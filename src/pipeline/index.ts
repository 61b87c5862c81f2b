export {
  cleanData,
  cleanRecords,
  cleanLoaded,
  runPipeline,
  fromEntries,
} from './clean-data'
export type { PipelineResult } from './types'
export { RecordCleaner, createCleaner } from './record-cleaner'
