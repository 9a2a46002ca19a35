import { decomposeTemplate, templateDurations } from './workout-parser.decompose'
import { invalidDirective } from './workout-parser.errors'
import { expandDirective } from './workout-parser.expand'
import { parseIntermediateText, partitionPhase, readDirectiveBody } from './workout-parser.intermediate'
import { summarizePhases, summarizeTotal } from './workout-parser.interval'
import { mergeExpected, readPreamble, splitSessions } from './workout-parser.metadata'
import { normalizeWorkout } from './workout-parser.normalize'
import { DEFAULT_MAX_REPEAT_COUNT, scanDirectives } from './workout-parser.scan'
import { DEFAULT_REQUIRED_PHASES, findMissingPhases, segmentPhases } from './workout-parser.segment'
import { validateCounts } from './workout-parser.validate'
import type {
  Discipline,
  Finding,
  Interval,
  Phase,
  PhaseRole,
  RepetitionDirective,
  SubIntervalTemplate,
  WorkoutDocument,
  WorkoutResult,
} from './workout-parser.types'

export type ParseLimits = {
  maxRepeatCount: number
  maxIntervals: number // per document, directives over it are skipped
}

export const DEFAULT_PARSE_LIMITS: ParseLimits = {
  maxRepeatCount: DEFAULT_MAX_REPEAT_COUNT,
  maxIntervals: 5000,
}

export type ParseOptions = {
  defaultYear: number // for DD/MM dates
  defaultDiscipline?: Discipline
  requiredPhases?: Record<Discipline, PhaseRole[]>
  indoorProfile?: string | null // applied to rides flagged indoor
  outdoorProfile?: string | null // applied to every other ride
  limits?: ParseLimits
}

type PhaseParse = {
  intervals: Interval[]
  findings: Finding[]
}

/**
 * A directive without a target range, as in "3 x (04:00*-04:00**) :", takes one
 * iteration from the lines below it when their durations add up to the template's.
 */
function attachBodies(phase: Phase, directives: readonly RepetitionDirective[]): RepetitionDirective[] {
  return directives.map((directive, idx) => {
    if (directive.target) return directive
    if (decomposeTemplate(directive, phase.role).ok) return directive

    const durations = templateDurations(directive.template)
    if (!durations) return directive

    const limit = directives[idx + 1]?.start ?? phase.text.length
    const iterationSeconds = durations.reduce((sum, d) => sum + d, 0)
    const body = readDirectiveBody(phase.text, directive.end, limit, iterationSeconds, phase.role)
    if (!body) return directive

    return {
      ...directive,
      end: body.end,
      raw: phase.text.slice(directive.start, body.end),
      body: body.templates.map((t) => (t.position || !directive.position ? t : { ...t, position: directive.position })),
    }
  })
}

export function parsePhase(phase: Phase, limits: ParseLimits = DEFAULT_PARSE_LIMITS): PhaseParse {
  const intervals: Interval[] = []
  const scan = scanDirectives(phase.text, phase.role, limits.maxRepeatCount)
  const findings: Finding[] = [...scan.findings]

  for (const region of partitionPhase(phase.text, attachBodies(phase, scan.directives))) {
    if (region.kind === 'text') {
      const parsed = parseIntermediateText(region.text, phase.role)
      intervals.push(...parsed.intervals)
      findings.push(...parsed.findings)
      continue
    }

    const { directive } = region
    let templates: SubIntervalTemplate[]
    if (directive.body) {
      templates = directive.body
    } else {
      const decoded = decomposeTemplate(directive, phase.role)
      if (!decoded.ok) {
        findings.push(decoded.finding)
        continue
      }
      templates = decoded.templates
    }

    const count = directive.repeatCount * templates.length
    if (intervals.length + count > limits.maxIntervals) {
      findings.push(
        invalidDirective(
          phase.role,
          directive.raw.trim(),
          `expands to ${count} intervals, over the limit of ${limits.maxIntervals}`,
        ),
      )
      continue
    }
    intervals.push(...expandDirective(phase.role, directive.repeatCount, templates))
  }

  return { intervals, findings }
}

/**
 * Parses one workout document into its ordered interval sequence. Never throws for
 * document content: problems are returned as findings next to the partial result.
 */
export function parseWorkout(document: WorkoutDocument, options: ParseOptions): WorkoutResult {
  const segmented = segmentPhases(document.text)
  const declared = readPreamble(segmented.preamble, options.defaultYear)
  const limits = options.limits ?? DEFAULT_PARSE_LIMITS

  const discipline = document.discipline ?? declared.discipline ?? options.defaultDiscipline ?? 'cycling'
  const required = (options.requiredPhases ?? DEFAULT_REQUIRED_PHASES)[discipline]

  const findings: Finding[] = [...findMissingPhases(segmented.phases, required)]
  const intervals: Interval[] = []

  for (const phase of segmented.phases) {
    const parsed = parsePhase(phase, { ...limits, maxIntervals: limits.maxIntervals - intervals.length })
    intervals.push(...parsed.intervals)
    findings.push(...parsed.findings)
  }

  const phases = summarizePhases(
    segmented.phases.map((p) => p.role),
    intervals,
  )
  const total = summarizeTotal(intervals)
  const expected = mergeExpected(declared.expected, document.expected)
  findings.push(...validateCounts(expected, phases, total))

  const code = document.code ?? declared.code
  const date = document.date ?? declared.date
  const result: WorkoutResult = {
    ...(code ? { code } : {}),
    ...(date ? { date } : {}),
    discipline,
    intervals,
    phases,
    total,
    findings,
    ...(expected ? { expected } : {}),
  }

  // Trainer and outdoor corrections are power values: rides only.
  if (discipline !== 'cycling') return result
  const indoor = document.indoor ?? declared.indoor ?? false
  const profile = indoor ? options.indoorProfile : options.outdoorProfile
  return profile ? normalizeWorkout(result, profile) : result
}

/**
 * Each session is parsed on its own; results keep the plan's order.
 */
export function parseSessions(text: string, options: ParseOptions): WorkoutResult[] {
  return splitSessions(text).map((document) => parseWorkout(document, options))
}
