/**
 * Ordered classification rules. The first rule returning a category wins, so
 * the order of `CLASSIFICATION_RULES` is part of the contract.
 * @module core/classifier/rules
 */

import type { ClassificationRule, FieldCategory, PiiKind } from '../../types/category'
import { DATE, NUMERIC, TEXT, sensitive } from '../../types/category'
import type { RawValue } from '../../types/record'
import { normalizeFieldName } from '../fields'
import { parseDateTimeText } from '../normalizers/date'
import { isNumeric } from '../normalizers/number'

/**
 * Everything a rule may look at.
 */
export interface ClassificationInput {
  /** Field name as it appears in the records */
  field: string
  /** snake_case form of the field name */
  normalizedName: string
  /** Non-blank sampled values */
  sample: RawValue[]
  dayFirst: boolean
}

export interface ClassificationRuleDefinition {
  name: ClassificationRule
  apply(input: ClassificationInput): FieldCategory | null
}

/**
 * Name patterns marking a field as PII, checked in order.
 * Patterns run against the snake_case field name.
 */
export const PII_NAME_PATTERNS: ReadonlyArray<{ kind: PiiKind; patterns: RegExp[] }> = [
  { kind: 'email', patterns: [/email/, /mail/] },
  {
    kind: 'nationalId',
    patterns: [/national/, /(^|_)nid(_|$)/, /ssn/, /id_?number/, /passport/],
  },
  { kind: 'notes', patterns: [/note/, /comment/, /remark/] },
  { kind: 'phone', patterns: [/phone/, /msisdn/, /mobile/, /(^|_)tel(_|$)/] },
]

/**
 * Name patterns hinting at a date or time field.
 */
export const DATE_NAME_PATTERNS: readonly RegExp[] = [
  /date/,
  /time/,
  /created/,
  /updated/,
  /(^|_)(at|dob|ts)$/,
]

/**
 * True when strictly more than half of the sample satisfies the predicate.
 */
export function isMajority(sample: RawValue[], predicate: (value: RawValue) => boolean): boolean {
  if (sample.length === 0) return false
  const hits = sample.filter(predicate).length
  return hits * 2 > sample.length
}

/**
 * Finds the PII kind a field name points to, if any.
 */
export function piiKindFromName(normalizedName: string): PiiKind | null {
  for (const entry of PII_NAME_PATTERNS) {
    if (entry.patterns.some((pattern) => pattern.test(normalizedName))) {
      return entry.kind
    }
  }
  return null
}

/**
 * Suffix of a field named like a record identifier (`order_id`, `orderId`, `ID`).
 */
export const ID_SUFFIX = /(_id|Id|ID)$/

/**
 * Checks whether a field is named like a record identifier.
 * PII names win, so `national_id` stays sensitive.
 *
 * @example
 * ```typescript
 * isIdentifierName('merchant_id')  // true
 * isIdentifierName('orderId')      // true
 * isIdentifierName('national_id')  // false
 * isIdentifierName('amount')       // false
 * ```
 */
export function isIdentifierName(field: string): boolean {
  return ID_SUFFIX.test(field) && piiKindFromName(normalizeFieldName(field)) === null
}

const emptySample: ClassificationRuleDefinition = {
  name: 'empty-sample',
  apply: ({ sample }) => (sample.length === 0 ? TEXT : null),
}

const piiName: ClassificationRuleDefinition = {
  name: 'pii-name',
  apply: ({ normalizedName }) => {
    const kind = piiKindFromName(normalizedName)
    return kind ? sensitive(kind) : null
  },
}

const dateName: ClassificationRuleDefinition = {
  name: 'date-name',
  apply: ({ normalizedName }) =>
    DATE_NAME_PATTERNS.some((pattern) => pattern.test(normalizedName)) ? DATE : null,
}

const dateValues: ClassificationRuleDefinition = {
  name: 'date-values',
  apply: ({ sample, dayFirst }) =>
    // Only text votes: bare numbers are far more often amounts than epochs
    isMajority(
      sample,
      (value) => typeof value === 'string' && parseDateTimeText(value, { dayFirst }) !== null
    )
      ? DATE
      : null,
}

const numericValues: ClassificationRuleDefinition = {
  name: 'numeric-values',
  apply: ({ sample }) => (isMajority(sample, isNumeric) ? NUMERIC : null),
}

const fallback: ClassificationRuleDefinition = {
  name: 'default',
  apply: () => TEXT,
}

/**
 * Rules in precedence order.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRuleDefinition[] = [
  emptySample,
  piiName,
  dateName,
  dateValues,
  numericValues,
  fallback,
]
