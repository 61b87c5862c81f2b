export { loadRecords, parseRecords, type LoadResult } from './json-loader'
export { flattenRecord, isPlainObject } from './flatten'
