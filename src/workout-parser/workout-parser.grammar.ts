import type { TargetRange } from './workout-parser.types'

// Regex source fragments shared by the scanner, the decomposer and the standalone matchers.
export const DURATION = String.raw`\d{1,2}:\d{2}(?::\d{2})?`
export const STARS = String.raw`\**`
export const VALUE = String.raw`(?:\d{1,2}:\d{2}|\d+(?:[.,]\d+)?)`
// Horizontal whitespace only: a range never reaches into the next line.
export const RANGE_SEPARATOR = String.raw`[ \t]*(?:to|à|-|–)[ \t]*`
export const UNIT = String.raw`(?:[ \t]*(?:watts|min\/km|\/km|w)\b)?`
// "80 à 85" written before the target range, as in "04:00* (Position haute) 80 à 85 220 à 230"
export const CADENCE = String.raw`(?:(?<cadenceLow>\d{2,3})${RANGE_SEPARATOR}(?<cadenceHigh>\d{2,3})(?:[ \t]*rpm\b)?[ \t]+)?`

const DURATION_RE = new RegExp(`^${DURATION}$`)
const PACE_RE = /^(\d{1,2}):(\d{2})$/
const NUMBER_RE = /^\d+(?:[.,]\d+)?$/
const BULLET_RE = /^[-*•●]+\s*/

/**
 * Parses MM:SS or HH:MM:SS into seconds. Returns null for malformed or zero durations.
 */
export function parseDurationToSeconds(value: string): number | null {
  const raw = value.trim()
  if (!DURATION_RE.test(raw)) return null

  const parts = raw.split(':').map(Number)
  let seconds: number
  if (parts.length === 2) {
    const [min = 0, sec = 0] = parts
    if (sec > 59) return null
    seconds = min * 60 + sec
  } else {
    const [hours = 0, min = 0, sec = 0] = parts
    if (min > 59 || sec > 59) return null
    seconds = hours * 3600 + min * 60 + sec
  }

  return seconds > 0 ? seconds : null
}

/**
 * Target values are plain numbers (power) or M:SS paces, stored as seconds per km.
 */
export function parseTargetValue(value: string): number | null {
  const raw = value.trim()

  const pace = raw.match(PACE_RE)
  if (pace) {
    const sec = Number(pace[2])
    if (sec > 59) return null
    return Number(pace[1]) * 60 + sec
  }

  if (NUMBER_RE.test(raw)) return Number(raw.replace(',', '.'))

  return null
}

export function parseTargetRange(low: string, high: string): TargetRange | null {
  const a = parseTargetValue(low)
  const b = parseTargetValue(high)
  if (a === null || b === null) return null
  return a <= b ? { low: a, high: b } : { low: b, high: a }
}

export function cleanLine(line: string): string {
  return line.trim().replace(BULLET_RE, '').trim()
}

/**
 * Lowercases and strips accents so "Échauffement" and "echauffement" compare equal.
 */
export function foldText(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
}
