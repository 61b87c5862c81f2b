/**
 * Field classification
 * @module core/classifier/classifier
 */

import type { FieldCategory, FieldClassification } from '../../types/category'
import { TEXT } from '../../types/category'
import type { RawValue, RecordSet } from '../../types/record'
import { collectFieldNames, normalizeFieldName, sampleField } from '../fields'
import { isBlank } from '../normalizers/text'
import { CLASSIFICATION_RULES } from './rules'

/**
 * Options for classification.
 */
export interface ClassifierOptions {
  /** Read ambiguous `NN/NN/YYYY` values as day first (default: true) */
  dayFirst?: boolean
  /** Maximum non-blank values sampled per field (default: 100) */
  sampleSize?: number
}

/**
 * Classifies a field and reports which rule decided.
 * Pure: the same name and sample always give the same result.
 *
 * @param fieldName - Field name as it appears in the records
 * @param sampleValues - Values of the field; nulls and blanks are ignored
 * @param options - Classification options
 *
 * @example
 * ```typescript
 * explainClassification('amount', [10, '12.5', 'n/a'])
 * // { field: 'amount', category: { kind: 'NUMERIC' }, rule: 'numeric-values' }
 * ```
 */
export function explainClassification(
  fieldName: string,
  sampleValues: readonly RawValue[],
  options?: ClassifierOptions
): FieldClassification {
  const input = {
    field: fieldName,
    normalizedName: normalizeFieldName(fieldName),
    sample: sampleValues.filter((value) => !isBlank(value)),
    dayFirst: options?.dayFirst ?? true,
  }

  for (const rule of CLASSIFICATION_RULES) {
    const category = rule.apply(input)
    if (category) {
      return { field: fieldName, category, rule: rule.name }
    }
  }

  // The last rule always matches
  return { field: fieldName, category: TEXT, rule: 'default' }
}

/**
 * Assigns a semantic category to a field from its name and a sample of values.
 *
 * @example
 * ```typescript
 * classifyField('email', ['ann@x.com'])      // { kind: 'SENSITIVE_ID', pii: 'email' }
 * classifyField('when', ['2024-01-30'])      // { kind: 'DATE' }
 * classifyField('label', [null, null])       // { kind: 'TEXT' }
 * ```
 */
export function classifyField(
  fieldName: string,
  sampleValues: readonly RawValue[],
  options?: ClassifierOptions
): FieldCategory {
  return explainClassification(fieldName, sampleValues, options).category
}

/**
 * Classifies every field of a record set, in first-seen field order.
 * Identifier fields skip the rules and are kept as plain text.
 *
 * @param records - Records to inspect
 * @param options - Classification options
 * @param identifiers - Structural fields such as the join key
 *
 * @example
 * ```typescript
 * classifyRecordSet([{ user_id: 7, email: 'ann@x.com' }], {}, new Set(['user_id']))
 * // [
 * //   { field: 'user_id', category: { kind: 'TEXT' }, rule: 'identifier' },
 * //   { field: 'email', category: { kind: 'SENSITIVE_ID', pii: 'email' }, rule: 'pii-name' },
 * // ]
 * ```
 */
export function classifyRecordSet(
  records: RecordSet,
  options?: ClassifierOptions,
  identifiers: ReadonlySet<string> = new Set()
): FieldClassification[] {
  const sampleSize = options?.sampleSize ?? 100
  return collectFieldNames(records).map((field): FieldClassification =>
    identifiers.has(field)
      ? { field, category: TEXT, rule: 'identifier' }
      : explainClassification(field, sampleField(records, field, sampleSize), options)
  )
}
