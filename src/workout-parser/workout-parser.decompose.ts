import { templateDecodeError } from './workout-parser.errors'
import { DURATION, STARS, VALUE, parseDurationToSeconds, parseTargetRange } from './workout-parser.grammar'
import type {
  PhaseRole,
  RepetitionDirective,
  SubIntervalTemplate,
  TemplateDecodeErrorFinding,
} from './workout-parser.types'

// One group of "04:00*@220/230[aero]-02:00-…"; the override and label are optional.
const GROUP_RE = new RegExp(
  String.raw`^(?<duration>${DURATION})${STARS}(?:@(?<low>${VALUE})\/(?<high>${VALUE}))?(?:\[(?<position>[^\]]+)\])?$`,
)

export type DecomposeResult =
  | { ok: true; templates: SubIntervalTemplate[] }
  | { ok: false; finding: TemplateDecodeErrorFinding }

export function decomposeTemplate(directive: RepetitionDirective, phase: PhaseRole): DecomposeResult {
  const fail = (reason: string): DecomposeResult => ({
    ok: false,
    finding: templateDecodeError(phase, directive.template, reason),
  })

  if (directive.template.length === 0) return fail('template is empty')

  const groups = directive.template.split('-').map((g) => g.trim())
  const templates: SubIntervalTemplate[] = []

  for (const [idx, group] of groups.entries()) {
    const match = group.match(GROUP_RE)
    if (!match?.groups) {
      return fail(`group ${idx + 1} "${group}" is not a duration group`)
    }

    const durationSeconds = parseDurationToSeconds(match.groups.duration ?? '')
    if (durationSeconds === null) {
      return fail(`group ${idx + 1} has an invalid duration "${match.groups.duration}"`)
    }

    let target = directive.target
    const { low, high } = match.groups
    if (low !== undefined && high !== undefined) {
      const override = parseTargetRange(low, high)
      if (!override) return fail(`group ${idx + 1} has an invalid target "${low}/${high}"`)
      target = override
    }
    if (!target) {
      return fail(`group ${idx + 1} has no target range and the directive declares none`)
    }

    const position = match.groups.position?.trim() || directive.position
    templates.push({
      durationSeconds,
      target,
      ...(position ? { position } : {}),
    })
  }

  return { ok: true, templates }
}

/**
 * Durations of the template's groups, overrides ignored. Null when a group is not a duration.
 */
export function templateDurations(template: string): number[] | null {
  const durations: number[] = []
  for (const group of template.split('-')) {
    const duration = group.trim().match(GROUP_RE)?.groups?.duration
    const seconds = duration !== undefined ? parseDurationToSeconds(duration) : null
    if (seconds === null) return null
    durations.push(seconds)
  }
  return durations
}
