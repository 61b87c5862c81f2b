/**
 * Semantic category tags a field can be assigned.
 */
export const CATEGORY_KINDS = ['DATE', 'SENSITIVE_ID', 'NUMERIC', 'TEXT'] as const

export type CategoryKind = (typeof CATEGORY_KINDS)[number]

/**
 * Kinds of personally identifiable information, each masked differently.
 *
 * - `email` - keep the first character of the local part and the domain
 * - `nationalId` - keep a short prefix, mask the rest
 * - `phone` - mask every digit
 * - `notes` - scrub embedded emails and digits from free text
 */
export type PiiKind = 'email' | 'nationalId' | 'phone' | 'notes'

/**
 * Category assigned to a field for the lifetime of one run.
 * The `SENSITIVE_ID` variant may carry the PII kind inferred from the field name;
 * without it the masker infers the kind from each value's shape.
 */
export type FieldCategory =
  | { kind: 'DATE' }
  | { kind: 'SENSITIVE_ID'; pii?: PiiKind }
  | { kind: 'NUMERIC' }
  | { kind: 'TEXT' }

/**
 * Name of the classification rule that produced a category.
 */
export type ClassificationRule =
  | 'identifier'
  | 'empty-sample'
  | 'pii-name'
  | 'date-name'
  | 'date-values'
  | 'numeric-values'
  | 'default'

/**
 * A field's category together with the rule that decided it.
 */
export interface FieldClassification {
  field: string
  category: FieldCategory
  rule: ClassificationRule
}

export const DATE: FieldCategory = { kind: 'DATE' }
export const NUMERIC: FieldCategory = { kind: 'NUMERIC' }
export const TEXT: FieldCategory = { kind: 'TEXT' }

/**
 * Builds a `SENSITIVE_ID` category, optionally pinned to a PII kind.
 */
export function sensitive(pii?: PiiKind): FieldCategory {
  return pii ? { kind: 'SENSITIVE_ID', pii } : { kind: 'SENSITIVE_ID' }
}
