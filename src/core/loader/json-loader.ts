/**
 * Tolerant JSON loader for exported record files
 * @module core/loader/json-loader
 */

import * as fs from 'fs'
import type { FlatRecord } from '../../types/record'
import type { LoadMode, LoadStats } from '../../types/report'
import { LoadError, describeError } from '../../utils/errors'
import { isIdentifierName } from '../classifier/rules'
import { flattenRecord, isPlainObject } from './flatten'

/**
 * Records recovered from one source together with the load counters.
 */
export interface LoadResult {
  records: FlatRecord[]
  stats: LoadStats
}

interface ParsedEntries {
  entries: unknown[]
  mode: LoadMode
  skippedLines: number
  /** True when the document was a container that is legitimately empty */
  emptyContainer: boolean
}

/**
 * Reads a JSON export from disk and recovers every record it can.
 *
 * @param path - File to read
 * @returns The recovered records and load counters
 * @throws {LoadError} If the file cannot be read or yields no records at all
 */
export function loadRecords(path: string): LoadResult {
  let text: string
  try {
    text = fs.readFileSync(path, 'utf8')
  } catch (error) {
    throw new LoadError(path, describeError(error))
  }
  return parseRecords(text, path)
}

/**
 * Parses JSON text that may be a single object, an array of objects, an object
 * wrapping an array (`{"data": [...]}`), or newline-delimited JSON with some
 * corrupt lines.
 *
 * Entries that are not objects are skipped and counted. Source order is kept.
 *
 * @param text - Raw file contents
 * @param source - Label used in stats and errors
 * @throws {LoadError} If non-blank text yields no records and is not an empty container
 *
 * @example
 * ```typescript
 * const { records, stats } = parseRecords('{"a":1}\nnot json\n{"a":2}')
 * // records: [{ a: 1 }, { a: 2 }], stats.skippedLines: 1
 * ```
 */
export function parseRecords(text: string, source = '<inline>'): LoadResult {
  const parsed = parseEntries(text.replace(/^\uFEFF/, ''), source)

  const records: FlatRecord[] = []
  let skippedEntries = 0
  for (const entry of parsed.entries) {
    if (isPlainObject(entry)) {
      records.push(flattenRecord(entry))
    } else {
      skippedEntries++
    }
  }

  if (records.length === 0 && parsed.mode !== 'empty' && !parsed.emptyContainer) {
    throw new LoadError(source, 'no JSON object could be recovered', {
      skippedLines: parsed.skippedLines,
      skippedEntries,
    })
  }

  return {
    records,
    stats: {
      source,
      mode: parsed.mode,
      records: records.length,
      skippedLines: parsed.skippedLines,
      skippedEntries,
    },
  }
}

function parseEntries(text: string, source: string): ParsedEntries {
  if (text.trim() === '') {
    return { entries: [], mode: 'empty', skippedLines: 0, emptyContainer: false }
  }

  let document: unknown
  try {
    document = JSON.parse(text)
  } catch {
    return parseLines(text, source)
  }

  const entries = unwrapDocument(document)
  return {
    entries,
    mode: 'document',
    skippedLines: 0,
    emptyContainer: entries.length === 0,
  }
}

/**
 * Turns a parsed document into its list of entries: arrays are taken as is,
 * an object wrapping an array of records is unwrapped, and anything else is a
 * single entry.
 */
function unwrapDocument(document: unknown): unknown[] {
  if (Array.isArray(document)) return document

  if (isPlainObject(document)) {
    const wrapped = findWrappedRecords(document)
    if (wrapped) return wrapped
  }

  return [document]
}

/**
 * First property holding an array of objects (`{"data": [...]}`).
 * An empty array only counts when it is the object's sole property, so a
 * record such as `{"id": 1, "tags": []}` stays a record. An object carrying
 * an identifier value (`{"user_id": "1", "orders": [...]}`) is never a wrapper.
 */
function findWrappedRecords(document: Record<string, unknown>): unknown[] | undefined {
  const hasIdentifier = Object.entries(document).some(
    ([key, value]) => (key === 'id' || isIdentifierName(key)) && isScalar(value)
  )
  if (hasIdentifier) return undefined

  const values = Object.values(document)
  for (const value of values) {
    if (!Array.isArray(value)) continue
    if (value.length > 0 ? value.every(isPlainObject) : values.length === 1) {
      return value
    }
  }
  return undefined
}

function isScalar(value: unknown): boolean {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value)
}

function parseLines(text: string, source: string): ParsedEntries {
  const entries: unknown[] = []
  let skippedLines = 0

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim()
    if (!line) continue

    try {
      entries.push(JSON.parse(line))
    } catch {
      skippedLines++
    }
  }

  if (entries.length === 0) {
    throw new LoadError(source, 'neither the document nor any line is valid JSON', {
      skippedLines,
    })
  }

  return { entries, mode: 'lines', skippedLines, emptyContainer: false }
}
