import { invalidDirective } from './workout-parser.errors'
import { RANGE_SEPARATOR, UNIT, VALUE, parseTargetRange } from './workout-parser.grammar'
import type { InvalidDirectiveFinding, PhaseRole, RepetitionDirective } from './workout-parser.types'

// "3 x (04:00-02:00-04:00-02:00) : 200 to 210 W (high position)"
// The count is digits, or a single word followed by whitespace so that it can be reported.
const DIRECTIVE_SOURCE =
  String.raw`(?:(?<count>\d+)[ \t]*|(?<word>[^\s\d()][^\s()]*)[ \t]+)[x×][ \t]*\((?<template>[^()]*)\)` +
  String.raw`(?:[ \t]*:)?` +
  String.raw`(?:[ \t]*(?<low>${VALUE})${RANGE_SEPARATOR}(?<high>${VALUE})${UNIT})?` +
  String.raw`(?:[ \t]*\((?<position>[^()\n]+)\))?`

export const DEFAULT_MAX_REPEAT_COUNT = 100

export type ScanResult = {
  directives: RepetitionDirective[]
  findings: InvalidDirectiveFinding[]
}

/**
 * Finds every repetition directive in a phase, in source order. Spans never overlap and
 * cover the trailing target range and position label. Occurrences with a bad repeat count
 * are reported and left out, so their text is handled as intermediate text.
 */
export function scanDirectives(
  text: string,
  phase: PhaseRole,
  maxRepeatCount: number = DEFAULT_MAX_REPEAT_COUNT,
): ScanResult {
  const directives: RepetitionDirective[] = []
  const findings: InvalidDirectiveFinding[] = []
  const re = new RegExp(DIRECTIVE_SOURCE, 'gi')

  for (const match of text.matchAll(re)) {
    const groups = match.groups ?? {}
    const raw = match[0]
    const start = match.index ?? 0

    if (groups.word !== undefined) {
      findings.push(invalidDirective(phase, raw.trim(), `repeat count "${groups.word}" is not a number`))
      continue
    }

    const repeatCount = Number(groups.count)
    if (!Number.isSafeInteger(repeatCount) || repeatCount <= 0) {
      findings.push(invalidDirective(phase, raw.trim(), 'repeat count must be a positive integer'))
      continue
    }
    if (repeatCount > maxRepeatCount) {
      findings.push(
        invalidDirective(phase, raw.trim(), `repeat count ${repeatCount} exceeds the limit of ${maxRepeatCount}`),
      )
      continue
    }

    const directive: RepetitionDirective = {
      repeatCount,
      template: (groups.template ?? '').trim(),
      start,
      end: start + raw.length,
      raw,
    }

    if (groups.low !== undefined && groups.high !== undefined) {
      const target = parseTargetRange(groups.low, groups.high)
      if (!target) {
        findings.push(invalidDirective(phase, raw.trim(), `invalid target range "${groups.low}-${groups.high}"`))
        continue
      }
      directive.target = target
    }

    const position = groups.position?.trim()
    if (position) directive.position = position

    directives.push(directive)
  }

  return { directives, findings }
}
