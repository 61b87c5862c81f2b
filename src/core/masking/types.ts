import type { CleanerConfig } from '../../types/config'

/**
 * Text produced for one value, and whether it came from a fallback path.
 */
export interface ValueOutcome {
  text: string
  fallback: boolean
}

/**
 * Settings the maskers read from the cleaner configuration.
 */
export type MaskOptions = Pick<
  CleanerConfig,
  'emailMaskChar' | 'maskChar' | 'nationalIdPrefixLength' | 'notesMaxLength' | 'defaultPhoneCountry'
>

export const DEFAULT_MASK_OPTIONS: MaskOptions = {
  emailMaskChar: '*',
  maskChar: 'X',
  nationalIdPrefixLength: 3,
  notesMaxLength: 200,
}
