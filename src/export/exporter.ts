/**
 * Writes the output table to disk
 * @module export/exporter
 */

import * as fs from 'fs'
import type { OutputTable } from '../types/record'
import { IOError, describeError } from '../utils/errors'
import { toCsv } from './csv'

/**
 * Writes a table as a UTF-8 CSV file, replacing any existing file.
 * The target directory must already exist.
 *
 * @param table - Table to write
 * @param path - Destination file
 * @throws {IOError} If the file cannot be written
 */
export function exportCsv(table: OutputTable, path: string): void {
  const csv = toCsv(table)
  try {
    fs.writeFileSync(path, csv, { encoding: 'utf8' })
  } catch (error) {
    throw new IOError(path, describeError(error))
  }
}
