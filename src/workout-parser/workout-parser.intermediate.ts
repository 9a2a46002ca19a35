import { unparsedSpan } from './workout-parser.errors'
import {
  CADENCE,
  DURATION,
  RANGE_SEPARATOR,
  STARS,
  UNIT,
  VALUE,
  cleanLine,
  parseDurationToSeconds,
  parseTargetRange,
} from './workout-parser.grammar'
import { createInterval } from './workout-parser.interval'
import type {
  Interval,
  PhaseRole,
  RepetitionDirective,
  SubIntervalTemplate,
  UnparsedSpanFinding,
} from './workout-parser.types'

export type PhaseRegion =
  | { kind: 'directive'; directive: RepetitionDirective }
  | { kind: 'text'; text: string }

export type StandaloneVariant = 'WithPosition' | 'WithoutPosition'

type StandaloneMatcher = {
  variant: StandaloneVariant
  patterns: RegExp[]
}

const RANGE = String.raw`${CADENCE}(?<low>${VALUE})${RANGE_SEPARATOR}(?<high>${VALUE})${UNIT}`
const LABEL = String.raw`\((?<position>[^()]+)\)`

// Tried in order; the first matcher that accepts the line wins.
export const STANDALONE_MATCHERS: readonly StandaloneMatcher[] = [
  {
    variant: 'WithPosition',
    patterns: [
      // "08:00* (aero position) 180 to 190 W", "04:00* (Position haute) 80 à 85 220 à 230"
      new RegExp(String.raw`^(?<duration>${DURATION})${STARS}\s*${LABEL}\s*:?\s*${RANGE}\s*$`, 'i'),
      // "08:00 180 to 190 W (aero position)"
      new RegExp(String.raw`^(?<duration>${DURATION})${STARS}(?:\s*:\s*|\s+)${RANGE}\s*${LABEL}\s*$`, 'i'),
    ],
  },
  {
    // "05:00 120 to 130", "03:00 70 à 75 220 à 230"
    variant: 'WithoutPosition',
    patterns: [new RegExp(String.raw`^(?<duration>${DURATION})${STARS}(?:\s*:\s*|\s+)${RANGE}\s*$`, 'i')],
  },
]

// "08:00* (Position haute) décomposées en :" opens a block whose lines inherit the label.
const DECOMPOSED_HEADER_RE = new RegExp(
  String.raw`^(?<duration>${DURATION})${STARS}[ \t]*${LABEL}[ \t]*(?:d[ée]compos[ée]e?s?[ \t]+en|split[ \t]+into|broken[ \t]+into)[ \t]*:?$`,
  'i',
)

/**
 * Splits phase text into directive-owned regions and the text around them, in source order.
 */
export function partitionPhase(text: string, directives: readonly RepetitionDirective[]): PhaseRegion[] {
  const regions: PhaseRegion[] = []
  let cursor = 0

  for (const directive of directives) {
    if (directive.start > cursor) {
      regions.push({ kind: 'text', text: text.slice(cursor, directive.start) })
    }
    regions.push({ kind: 'directive', directive })
    cursor = directive.end
  }
  if (cursor < text.length) {
    regions.push({ kind: 'text', text: text.slice(cursor) })
  }

  return regions
}

/**
 * Each non-empty line of an intermediate region is one span.
 */
export function splitSpans(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(cleanLine)
    .filter((line) => line.length > 0)
}

export type StandaloneResult =
  | { ok: true; variant: StandaloneVariant; interval: Interval }
  | { ok: false; finding: UnparsedSpanFinding }

/**
 * `inheritedPosition` labels WithoutPosition spans that sit inside a decomposed block.
 */
export function parseStandaloneSpan(span: string, phase: PhaseRole, inheritedPosition?: string): StandaloneResult {
  for (const matcher of STANDALONE_MATCHERS) {
    const groups = matchFirst(span, matcher.patterns)
    if (!groups) continue

    const durationSeconds = parseDurationToSeconds(groups.duration ?? '')
    const target = parseTargetRange(groups.low ?? '', groups.high ?? '')
    if (durationSeconds === null || !target) break

    const cadence =
      groups.cadenceLow !== undefined && groups.cadenceHigh !== undefined
        ? parseTargetRange(groups.cadenceLow, groups.cadenceHigh) ?? undefined
        : undefined
    const position = matcher.variant === 'WithPosition' ? groups.position?.trim() : inheritedPosition
    return {
      ok: true,
      variant: matcher.variant,
      interval: createInterval({ phase, durationSeconds, target, cadence, position }),
    }
  }

  return { ok: false, finding: unparsedSpan(phase, span) }
}

type DecomposedBlock = {
  position: string
  remainingSeconds: number
}

export type SpanRead =
  | { kind: 'header' }
  | { kind: 'interval'; interval: Interval }
  | { kind: 'unparsed'; finding: UnparsedSpanFinding }

/**
 * Reads intermediate spans one at a time, tracking the open decomposed block. A block
 * ends once its lines cover its duration, or at the next labelled line or header.
 */
export class SpanReader {
  private block: DecomposedBlock | null = null

  constructor(private readonly phase: PhaseRole) {}

  read(span: string): SpanRead {
    const header = span.match(DECOMPOSED_HEADER_RE)?.groups
    const headerSeconds = header ? parseDurationToSeconds(header.duration ?? '') : null
    if (header?.position && headerSeconds !== null) {
      this.block = { position: header.position.trim(), remainingSeconds: headerSeconds }
      return { kind: 'header' }
    }

    const parsed = parseStandaloneSpan(span, this.phase, this.block?.position)
    if (!parsed.ok) return { kind: 'unparsed', finding: parsed.finding }

    if (parsed.variant === 'WithPosition' || !this.block) {
      this.block = null
    } else {
      this.block.remainingSeconds -= parsed.interval.durationSeconds
      if (this.block.remainingSeconds <= 0) this.block = null
    }
    return { kind: 'interval', interval: parsed.interval }
  }
}

export type IntermediateParse = {
  intervals: Interval[]
  findings: UnparsedSpanFinding[]
}

export function parseIntermediateText(text: string, phase: PhaseRole): IntermediateParse {
  const reader = new SpanReader(phase)
  const intervals: Interval[] = []
  const findings: UnparsedSpanFinding[] = []

  for (const span of splitSpans(text)) {
    const read = reader.read(span)
    if (read.kind === 'interval') intervals.push(read.interval)
    else if (read.kind === 'unparsed') findings.push(read.finding)
  }

  return { intervals, findings }
}

export type DirectiveBody = {
  templates: SubIntervalTemplate[]
  end: number // offset just past the last claimed line
}

/**
 * Reads the lines following a directive as one iteration of its body, stopping once
 * their durations add up to `iterationSeconds`. Null when a line does not parse or the
 * lines overshoot or run out first.
 */
export function readDirectiveBody(
  text: string,
  from: number,
  limit: number,
  iterationSeconds: number,
  phase: PhaseRole,
): DirectiveBody | null {
  const reader = new SpanReader(phase)
  const templates: SubIntervalTemplate[] = []
  let covered = 0
  let offset = from

  while (offset < limit) {
    const newline = text.indexOf('\n', offset)
    const lineEnd = newline >= 0 && newline < limit ? newline : limit
    const span = cleanLine(text.slice(offset, lineEnd))
    offset = lineEnd + 1

    if (span.length === 0) continue
    const read = reader.read(span)
    if (read.kind === 'unparsed') return null
    if (read.kind === 'header') continue

    const { durationSeconds, target, cadence, position } = read.interval
    templates.push({
      durationSeconds,
      target: { low: target.low, high: target.high },
      ...(cadence ? { cadence: { low: cadence.low, high: cadence.high } } : {}),
      ...(position ? { position } : {}),
    })
    covered += durationSeconds
    if (covered === iterationSeconds) return { templates, end: lineEnd }
    if (covered > iterationSeconds) return null
  }

  return null
}

function matchFirst(span: string, patterns: readonly RegExp[]): Record<string, string | undefined> | null {
  for (const pattern of patterns) {
    const groups = span.match(pattern)?.groups
    if (groups) return groups
  }
  return null
}
