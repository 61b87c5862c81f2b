import type { RawValue } from '../../types/record'

/**
 * Components of a parsed date-time, expressed in UTC wall-clock terms.
 */
export interface DateTimeComponents {
  year: number
  /** Month (1-12) */
  month: number
  /** Day (1-31) */
  day: number
  hour: number
  minute: number
  second: number
}

/**
 * Options for date-time parsing.
 */
export interface DateTimeParseOptions {
  /** Read ambiguous `NN/NN/YYYY` values as day first (default: true) */
  dayFirst?: boolean
}

/**
 * Epoch numbers above this are milliseconds, below it seconds.
 */
const MILLISECOND_EPOCH_THRESHOLD = 1e12

/**
 * Month name mappings (case-insensitive).
 */
const MONTH_NAMES: Record<string, number> = {
  january: 1,
  february: 2,
  march: 3,
  april: 4,
  may: 5,
  june: 6,
  july: 7,
  august: 8,
  september: 9,
  october: 10,
  november: 11,
  december: 12,
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  sept: 9,
  oct: 10,
  nov: 11,
  dec: 12,
}

/**
 * Optional time of day and zone following a date.
 */
const TIME_TAIL =
  String.raw`(?:(?:T|\s+|,\s*)(?<hour>\d{1,2}):(?<minute>\d{2})(?::(?<second>\d{2})(?:[.,]\d{1,9})?)?\s*(?<meridiem>[ap]\.?m\.?)?)?` +
  String.raw`\s*(?<zone>Z|UTC|GMT|[+-]\d{2}(?::?\d{2})?)?`

/**
 * Optional leading weekday (`Mon, `, `Tuesday `).
 */
const WEEKDAY_HEAD = String.raw`(?:[a-z]{3,9}\.?,?\s+)?`

function anchored(head: string): RegExp {
  return new RegExp(`^${head}${TIME_TAIL}$`, 'i')
}

/** `2024-01-30`, `2024/01/30 10:00` */
const YEAR_FIRST = anchored(String.raw`(?<year>\d{4})[-/.](?<month>\d{1,2})[-/.](?<day>\d{1,2})`)
/** `20240130T101500`, `20240130T1015Z` */
const COMPACT =
  /^(?<year>\d{4})(?<month>\d{2})(?<day>\d{2})T(?<hour>\d{2})(?<minute>\d{2})(?<second>\d{2})?(?<zone>Z)?$/i
/** `30/01/2024`, `01-30-24`, `30.01.2024` */
const NUMERIC_DAY_MONTH = anchored(
  String.raw`(?<first>\d{1,2})(?<separator>[/.-])(?<second_part>\d{1,2})\k<separator>(?<year>\d{2}|\d{4})`
)
/** `January 30, 2024`, `Tue Jan 30 2024` */
const MONTH_NAME_FIRST = anchored(
  String.raw`${WEEKDAY_HEAD}(?<monthName>[a-z]{3,9})\.?\s+(?<day>\d{1,2})(?:st|nd|rd|th)?,?\s+(?<year>\d{4})`
)
/** `30 January 2024`, `Tue, 30 Jan 2024 10:00:00 GMT` */
const DAY_FIRST_NAME = anchored(
  String.raw`${WEEKDAY_HEAD}(?<day>\d{1,2})(?:st|nd|rd|th)?[\s-]+(?<monthName>[a-z]{3,9})\.?,?[\s-]+(?<year>\d{4})`
)

/**
 * Validates if a date is valid (checks month/day ranges and leap years).
 *
 * @example
 * ```typescript
 * isValidDate(2024, 2, 29)  // true (leap year)
 * isValidDate(2023, 2, 29)  // false (not leap year)
 * isValidDate(2024, 13, 1)  // false (month out of range)
 * ```
 */
export function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12) {
    return false
  }

  // Days in each month (non-leap year)
  const daysInMonth = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

  const isLeapYear = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
  if (isLeapYear && month === 2) {
    daysInMonth[1] = 29
  }

  if (day < 1 || day > daysInMonth[month - 1]) {
    return false
  }

  return true
}

/**
 * Pads a number with leading zeros.
 */
function pad(num: number, length = 2): string {
  return String(num).padStart(length, '0')
}

function group(match: RegExpMatchArray, name: string): string | undefined {
  return match.groups?.[name]
}

function toInt(text: string | undefined): number | undefined {
  return text === undefined ? undefined : parseInt(text, 10)
}

function expandYear(text: string): number {
  const year = parseInt(text, 10)
  // Two-digit years are read as 20xx
  return text.length === 2 ? 2000 + year : year
}

/**
 * Offset of a zone designator in minutes east of UTC.
 */
function zoneOffsetMinutes(zone: string | undefined): number {
  if (!zone) return 0
  const match = zone.match(/^([+-])(\d{2}):?(\d{2})?$/)
  if (!match) return 0 // Z, UTC, GMT
  const sign = match[1] === '-' ? -1 : 1
  return sign * (parseInt(match[2], 10) * 60 + (match[3] ? parseInt(match[3], 10) : 0))
}

/**
 * Builds validated components from a date and the shared time tail.
 */
function withTime(
  year: number,
  month: number,
  day: number,
  match: RegExpMatchArray
): DateTimeComponents | null {
  if (!isValidDate(year, month, day)) return null

  let hour = toInt(group(match, 'hour')) ?? 0
  const minute = toInt(group(match, 'minute')) ?? 0
  const second = toInt(group(match, 'second')) ?? 0
  const meridiem = group(match, 'meridiem')?.replace(/\./g, '').toLowerCase()

  if (meridiem) {
    if (hour < 1 || hour > 12) return null
    if (meridiem === 'am' && hour === 12) hour = 0
    if (meridiem === 'pm' && hour !== 12) hour += 12
  }

  if (hour > 23 || minute > 59 || second > 59) return null

  const offset = zoneOffsetMinutes(group(match, 'zone'))
  if (offset === 0) {
    return { year, month, day, hour, minute, second }
  }

  return fromDate(new Date(Date.UTC(year, month - 1, day, hour, minute, second) - offset * 60_000))
}

function fromDate(date: Date): DateTimeComponents | null {
  if (isNaN(date.getTime())) return null
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
  }
}

/**
 * Resolves which of two leading numbers is the day.
 * A part above 12 can only be a day; otherwise `dayFirst` decides.
 * Dotted dates are always day first.
 */
function resolveDayMonth(
  first: number,
  second: number,
  separator: string,
  dayFirst: boolean
): { day: number; month: number } {
  if (separator === '.') return { day: first, month: second }
  if (first > 12) return { day: first, month: second }
  if (second > 12) return { day: second, month: first }
  return dayFirst ? { day: first, month: second } : { day: second, month: first }
}

/**
 * Parses a date-time written in any of the supported textual formats.
 *
 * Supported:
 * - ISO 8601 dates and date-times, with `T` or space, optional seconds and
 *   fractions, and a `Z` or `±HH:MM` offset (converted to UTC)
 * - Year-first dates with `/` or `.` separators
 * - Compact `YYYYMMDDTHHMM[SS]`
 * - Numeric day/month dates with `/`, `-` or `.` and two or four digit years
 * - Month-name dates, with optional weekday, time and AM/PM
 *
 * @param text - The date-time text
 * @param options - Parse options
 * @returns Components, or null when the text is not a complete valid date
 *
 * @example
 * ```typescript
 * parseDateTimeText('2024-01-30T10:15:00Z')
 * // { year: 2024, month: 1, day: 30, hour: 10, minute: 15, second: 0 }
 *
 * parseDateTimeText('05/03/2024')                     // 5 March 2024
 * parseDateTimeText('05/03/2024', { dayFirst: false }) // 3 May 2024
 * parseDateTimeText('Jan 30, 2024 3:45 PM')           // 15:45:00
 * ```
 */
export function parseDateTimeText(
  text: string,
  options?: DateTimeParseOptions
): DateTimeComponents | null {
  const str = text.trim()
  if (!str) return null

  const dayFirst = options?.dayFirst ?? true

  let match = str.match(YEAR_FIRST) ?? str.match(COMPACT)
  if (match) {
    return withTime(
      parseInt(group(match, 'year') ?? '', 10),
      parseInt(group(match, 'month') ?? '', 10),
      parseInt(group(match, 'day') ?? '', 10),
      match
    )
  }

  match = str.match(NUMERIC_DAY_MONTH)
  if (match) {
    const { day, month } = resolveDayMonth(
      parseInt(group(match, 'first') ?? '', 10),
      parseInt(group(match, 'second_part') ?? '', 10),
      group(match, 'separator') ?? '/',
      dayFirst
    )
    return withTime(expandYear(group(match, 'year') ?? ''), month, day, match)
  }

  match = str.match(MONTH_NAME_FIRST) ?? str.match(DAY_FIRST_NAME)
  if (match) {
    const month = MONTH_NAMES[(group(match, 'monthName') ?? '').toLowerCase()]
    if (month === undefined) return null
    return withTime(
      parseInt(group(match, 'year') ?? '', 10),
      month,
      parseInt(group(match, 'day') ?? '', 10),
      match
    )
  }

  return null
}

/**
 * Parses a raw field value as a date-time.
 * Numbers are read as Unix epoch seconds, or milliseconds above 1e12.
 *
 * @returns Components, or null when the value is not a date-time
 */
export function parseDateTime(
  value: RawValue,
  options?: DateTimeParseOptions
): DateTimeComponents | null {
  if (value === null || typeof value === 'boolean') return null

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null
    const millis = Math.abs(value) > MILLISECOND_EPOCH_THRESHOLD ? value : value * 1000
    return fromDate(new Date(millis))
  }

  return parseDateTimeText(value, options)
}

/**
 * Formats components as `DD/MM/YYYY HH:MM:SS`.
 *
 * @example
 * ```typescript
 * formatDateTime({ year: 2024, month: 1, day: 30, hour: 9, minute: 5, second: 0 })
 * // '30/01/2024 09:05:00'
 * ```
 */
export function formatDateTime(components: DateTimeComponents): string {
  const { year, month, day, hour, minute, second } = components
  return `${pad(day)}/${pad(month)}/${pad(year, 4)} ${pad(hour)}:${pad(minute)}:${pad(second)}`
}

/**
 * Normalizes a raw value to `DD/MM/YYYY HH:MM:SS`.
 *
 * @returns The formatted date-time, or null if the value cannot be parsed
 *
 * @example
 * ```typescript
 * normalizeDateTime('2024-01-30 14:03')  // '30/01/2024 14:03:00'
 * normalizeDateTime(0)                   // '01/01/1970 00:00:00'
 * normalizeDateTime('soon')              // null
 * ```
 */
export function normalizeDateTime(
  value: RawValue,
  options?: DateTimeParseOptions
): string | null {
  const components = parseDateTime(value, options)
  return components ? formatDateTime(components) : null
}
