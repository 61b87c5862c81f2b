/**
 * Category-specific value normalization
 * @module core/transformer
 */

import type { FieldCategory, FieldClassification } from '../types/category'
import type { FlatRecord, RawValue, RecordSet } from '../types/record'
import type { FallbackCounts } from '../types/report'
import { emptyFallbackCounts } from '../types/report'
import { maskValue, DEFAULT_MASK_OPTIONS, type MaskOptions, type ValueOutcome } from './masking'
import { normalizeDateTime } from './normalizers/date'
import { normalizeAmount } from './normalizers/number'
import { rawText, trim } from './normalizers/text'

/**
 * Settings the transformer reads from the cleaner configuration.
 */
export type TransformOptions = MaskOptions & {
  /** Read ambiguous `NN/NN/YYYY` dates as day first */
  dayFirst: boolean
}

export const DEFAULT_TRANSFORM_OPTIONS: TransformOptions = {
  ...DEFAULT_MASK_OPTIONS,
  dayFirst: true,
}

/**
 * Records rebuilt with transformed values, plus the fallbacks counted on the way.
 */
export interface TransformedRecordSet {
  records: FlatRecord[]
  fallbacks: FallbackCounts
}

/**
 * Transforms one value and reports whether it fell back to its safe default.
 * Never throws; null always becomes the empty string.
 *
 * - `DATE` - `DD/MM/YYYY HH:MM:SS`, or the original text if unparseable
 * - `SENSITIVE_ID` - masked according to the PII kind
 * - `NUMERIC` - rounded to two decimals, or the original text if not a number
 * - `TEXT` - trimmed
 */
export function transformValue(
  value: RawValue,
  category: FieldCategory,
  options: TransformOptions = DEFAULT_TRANSFORM_OPTIONS
): ValueOutcome {
  if (value === null) return { text: '', fallback: false }

  switch (category.kind) {
    case 'DATE': {
      const formatted = normalizeDateTime(value, { dayFirst: options.dayFirst })
      return formatted === null
        ? { text: rawText(value), fallback: true }
        : { text: formatted, fallback: false }
    }
    case 'SENSITIVE_ID':
      return maskValue(value, category.pii, options)
    case 'NUMERIC': {
      const amount = normalizeAmount(value)
      return amount === null
        ? { text: rawText(value), fallback: true }
        : { text: amount, fallback: false }
    }
    case 'TEXT':
      return { text: trim(value), fallback: false }
  }
}

/**
 * Transforms one value to its normalized text.
 *
 * @example
 * ```typescript
 * transform('2024-01-30T10:15:00Z', DATE)        // '30/01/2024 10:15:00'
 * transform('ann@x.com', sensitive('email'))     // 'a****@x.com'
 * transform(19.999, NUMERIC)                     // '20.0'
 * transform('  plain ', TEXT)                    // 'plain'
 * ```
 */
export function transform(
  value: RawValue,
  category: FieldCategory,
  options?: TransformOptions
): string {
  return transformValue(value, category, options).text
}

/**
 * Builds new records where every classified field holds its transformed text.
 * Fields without a classification keep their raw value. Input records are
 * left untouched.
 */
export function transformRecordSet(
  records: RecordSet,
  classifications: readonly FieldClassification[],
  options: TransformOptions = DEFAULT_TRANSFORM_OPTIONS
): TransformedRecordSet {
  const categories = new Map<string, FieldCategory>(
    classifications.map((classification) => [classification.field, classification.category])
  )
  const fallbacks = emptyFallbackCounts()

  const transformed = records.map((record) => {
    const output: FlatRecord = {}
    for (const [field, value] of Object.entries(record)) {
      const category = categories.get(field)
      if (!category) {
        output[field] = value
        continue
      }

      const outcome = transformValue(value, category, options)
      if (outcome.fallback) {
        fallbacks[category.kind]++
      }
      output[field] = outcome.text
    }
    return output
  })

  return { records: transformed, fallbacks }
}
