import { foldText } from './workout-parser.grammar'
import { resolvePhaseRole } from './workout-parser.segment'
import type { Discipline, ExpectedCounts, WorkoutDocument } from './workout-parser.types'

export type DeclaredMetadata = {
  code?: string
  date?: string
  discipline?: Discipline
  indoor?: boolean
  expected?: ExpectedCounts
}

const SESSION_HEADER_RE = /^\s*session\s+(?<code>[A-Za-z0-9_-]+)\b.*$/i
const KEY_VALUE_RE = /^\s*(?<key>[^:]+?)\s*:\s*(?<value>.+?)\s*$/

const DISCIPLINE_ALIASES: Record<string, Discipline> = {
  cycling: 'cycling',
  bike: 'cycling',
  ride: 'cycling',
  cyclisme: 'cycling',
  running: 'running',
  run: 'running',
  course: 'running',
  'course a pied': 'running',
}

const TRUE_VALUES = ['yes', 'true', 'y', '1', 'oui']
const FALSE_VALUES = ['no', 'false', 'n', '0', 'non']

function parseCount(value: string): number | undefined {
  return /^\d+$/.test(value) ? Number(value) : undefined
}

function isValidDate(year: number, month: number, day: number): boolean {
  const d = new Date(Date.UTC(year, month - 1, day))
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day
}

/**
 * Accepts YYYY-MM-DD or DD/MM[/YYYY]; a missing year comes from `defaultYear`.
 */
export function parsePlanDate(value: string, defaultYear: number): string | undefined {
  const iso = value.match(/^(\d{4})-(\d{2})-(\d{2})$/)
  const dm = value.match(/^(\d{1,2})\/(\d{1,2})(?:\/(\d{4}))?$/)

  let year: number
  let month: number
  let day: number
  if (iso) {
    year = Number(iso[1])
    month = Number(iso[2])
    day = Number(iso[3])
  } else if (dm) {
    day = Number(dm[1])
    month = Number(dm[2])
    year = dm[3] !== undefined ? Number(dm[3]) : defaultYear
  } else {
    return undefined
  }

  if (!isValidDate(year, month, day)) return undefined
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`
}

/**
 * Reads "Key: value" lines above the first phase header. Unknown keys and values that
 * do not parse are ignored.
 */
export function readPreamble(preamble: string, defaultYear: number): DeclaredMetadata {
  const meta: DeclaredMetadata = {}
  const phases: NonNullable<ExpectedCounts['phases']> = {}
  let total: number | undefined

  for (const line of preamble.split(/\r?\n/)) {
    const session = line.match(SESSION_HEADER_RE)?.groups
    if (session?.code) {
      meta.code = session.code
      continue
    }

    const kv = line.match(KEY_VALUE_RE)?.groups
    if (!kv?.key || !kv.value) continue
    const key = foldText(kv.key)
    const value = kv.value

    if (key === 'session' || key === 'code') {
      meta.code = value
    } else if (key === 'date') {
      const date = parsePlanDate(value, defaultYear)
      if (date) meta.date = date
    } else if (key === 'discipline' || key === 'sport') {
      const discipline = DISCIPLINE_ALIASES[foldText(value)]
      if (discipline) meta.discipline = discipline
    } else if (key === 'indoor') {
      const folded = foldText(value)
      if (TRUE_VALUES.includes(folded)) meta.indoor = true
      else if (FALSE_VALUES.includes(folded)) meta.indoor = false
    } else if (key === 'intervals' || key === 'total intervals') {
      total = parseCount(value)
    } else if (key.endsWith(' intervals')) {
      const role = resolvePhaseRole(key.slice(0, -' intervals'.length))
      const count = parseCount(value)
      if (role && count !== undefined) phases[role] = count
    }
  }

  if (total !== undefined || Object.keys(phases).length > 0) {
    meta.expected = {
      ...(total !== undefined ? { total } : {}),
      ...(Object.keys(phases).length > 0 ? { phases } : {}),
    }
  }

  return meta
}

/**
 * Caller-supplied counts win over declared ones, per phase.
 */
export function mergeExpected(
  declared: ExpectedCounts | undefined,
  supplied: ExpectedCounts | undefined,
): ExpectedCounts | undefined {
  if (!declared) return supplied
  if (!supplied) return declared

  const phases = { ...declared.phases, ...supplied.phases }
  const total = supplied.total ?? declared.total
  return {
    ...(total !== undefined ? { total } : {}),
    ...(Object.keys(phases).length > 0 ? { phases } : {}),
  }
}

/**
 * Splits a multi-session plan on "Session CODE" lines. Text before the first session
 * header is dropped; a plan without headers is a single document.
 */
export function splitSessions(text: string): WorkoutDocument[] {
  const lines = text.split(/\r?\n/)
  const starts = lines.flatMap((line, idx) => (SESSION_HEADER_RE.test(line) ? [idx] : []))

  if (starts.length === 0) return [{ text }]

  return starts.map((start, i) => ({
    text: lines.slice(start, starts[i + 1] ?? lines.length).join('\n'),
  }))
}
