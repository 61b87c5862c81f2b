export {
  buildOutputTable,
  resolveIdentifierColumn,
  toCellText,
  generatedId,
  type OutputTableOptions,
  type OutputTableResult,
} from './output-table'
export { toCsv, escapeCsvValue } from './csv'
export { exportCsv } from './exporter'
