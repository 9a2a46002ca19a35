import type {
  CountMismatchFinding,
  InvalidDirectiveFinding,
  MissingPhaseFinding,
  PhaseRole,
  TemplateDecodeErrorFinding,
  UnparsedSpanFinding,
} from './workout-parser.types'

export class UnknownProfileError extends Error {
  constructor(
    readonly profile: string,
    readonly available: string[],
  ) {
    super(`Unknown correction profile "${profile}" (available: ${available.join(', ') || 'none'})`)
    this.name = 'UnknownProfileError'
  }
}

export const missingPhase = (phase: PhaseRole): MissingPhaseFinding => ({
  kind: 'MissingPhase',
  phase,
  message: `Phase "${phase}" not found in document`,
})

export const invalidDirective = (phase: PhaseRole, text: string, reason: string): InvalidDirectiveFinding => ({
  kind: 'InvalidDirective',
  phase,
  text,
  reason,
  message: `Invalid repetition directive in ${phase}: ${reason}`,
})

export const templateDecodeError = (
  phase: PhaseRole,
  template: string,
  reason: string,
): TemplateDecodeErrorFinding => ({
  kind: 'TemplateDecodeError',
  phase,
  template,
  reason,
  message: `Cannot decode template "(${template})" in ${phase}: ${reason}`,
})

export const unparsedSpan = (phase: PhaseRole, text: string): UnparsedSpanFinding => ({
  kind: 'UnparsedSpan',
  phase,
  text,
  message: `Unrecognized line in ${phase}: "${text}"`,
})

export const countMismatch = (
  phase: PhaseRole | 'overall',
  expected: number,
  actual: number,
): CountMismatchFinding => {
  const delta = actual - expected
  return {
    kind: 'CountMismatch',
    phase,
    expected,
    actual,
    delta,
    message: `${phase}: expected ${expected} intervals, parsed ${actual} (${delta > 0 ? '+' : ''}${delta})`,
  }
}
