import type { CountryCode } from 'libphonenumber-js'
import type { Logger } from '../utils/logger'

/**
 * How a field present on both a transaction and its user is resolved.
 *
 * - `suffix` - transaction value keeps the name, user value moves to `<name><userSuffix>`
 * - `preferTransaction` - keep the transaction value, fall back to the user value when null
 * - `preferUser` - keep the user value, fall back to the transaction value when null
 */
export type OverlapPolicy = 'suffix' | 'preferTransaction' | 'preferUser'

export const OVERLAP_POLICIES: readonly OverlapPolicy[] = [
  'suffix',
  'preferTransaction',
  'preferUser',
]

/**
 * Fully resolved cleaner configuration.
 */
export interface CleanerConfig {
  /** Ordered candidate join keys; the first present in both inputs wins */
  joinKeyAliases: string[]
  /** Ordered candidate record identifier columns, used when no join key exists */
  identifierAliases: string[]
  /** Maximum number of non-null values sampled per field for classification */
  sampleSize: number
  /** Read ambiguous `NN/NN/YYYY` dates as day first */
  dayFirst: boolean
  /** Character masking the local part of emails */
  emailMaskChar: string
  /** Character masking national identifiers, phone digits and digits in notes */
  maskChar: string
  /** Leading characters of a national identifier left readable */
  nationalIdPrefixLength: number
  /** Notes longer than this are truncated and suffixed with `...` */
  notesMaxLength: number
  overlap: OverlapPolicy
  /** Suffix for user columns under the `suffix` overlap policy */
  userSuffix: string
  /** Insert a generated `ID` column when no identifier column exists */
  generateIds: boolean
  /** Prefix of generated identifiers (`TXN000001`) */
  generatedIdPrefix: string
  /** Region used when checking whether a value is shaped like a phone number */
  defaultPhoneCountry?: CountryCode
  logger: Logger
}

/**
 * Options accepted by the cleaner; anything omitted takes its default.
 */
export type CleanerOptions = Partial<CleanerConfig>

/**
 * Name of the generated identifier column.
 */
export const GENERATED_ID_COLUMN = 'ID'

/**
 * Default configuration, without the logger.
 */
export const DEFAULT_CLEANER_CONFIG: Omit<CleanerConfig, 'logger' | 'defaultPhoneCountry'> = {
  joinKeyAliases: [
    'user_id',
    'customer_id',
    'client_id',
    'userId',
    'customerId',
    'clientId',
    'id',
  ],
  identifierAliases: [
    'tx_id',
    'TXN_ID',
    'txn_id',
    'transaction_id',
    'transactionId',
    'txid',
    'ID',
    'id',
  ],
  sampleSize: 100,
  dayFirst: true,
  emailMaskChar: '*',
  maskChar: 'X',
  nationalIdPrefixLength: 3,
  notesMaxLength: 200,
  overlap: 'suffix',
  userSuffix: '_user',
  generateIds: true,
  generatedIdPrefix: 'TXN',
}
