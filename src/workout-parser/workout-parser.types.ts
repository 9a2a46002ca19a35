export type Discipline = 'cycling' | 'running'

export type PhaseRole = 'warmup' | 'body' | 'recovery'

export type TargetRange = {
  low: number // watts (cycling) or sec/km (running)
  high: number
}

export type Repetition = {
  index: number // 1-based pass of the directive
  total: number
}

export type Interval = Readonly<{
  phase: PhaseRole
  durationSeconds: number
  target: Readonly<TargetRange>
  cadence?: Readonly<TargetRange> // rpm, informational
  position?: string
  repetition?: Readonly<Repetition>
}>

export type ExpectedCounts = {
  total?: number
  phases?: Partial<Record<PhaseRole, number>>
}

export type WorkoutDocument = {
  text: string
  discipline?: Discipline
  expected?: ExpectedCounts
  code?: string
  date?: string // YYYY-MM-DD
  indoor?: boolean
}

export type Phase = {
  role: PhaseRole
  text: string
  line: number // 1-based line of the header
}

export type RepetitionDirective = {
  repeatCount: number
  template: string
  target?: TargetRange
  position?: string
  start: number // offsets into the phase text, end exclusive
  end: number
  raw: string
  body?: SubIntervalTemplate[] // one iteration read from the lines below a range-less directive
}

export type SubIntervalTemplate = {
  durationSeconds: number
  target: TargetRange
  cadence?: TargetRange
  position?: string
}

export type PhaseSummary = {
  role: PhaseRole
  intervalCount: number
  durationSeconds: number
}

export type WorkoutTotals = {
  intervalCount: number
  durationSeconds: number
}

export type MissingPhaseFinding = {
  kind: 'MissingPhase'
  phase: PhaseRole
  message: string
}

export type InvalidDirectiveFinding = {
  kind: 'InvalidDirective'
  phase: PhaseRole
  text: string
  reason: string
  message: string
}

export type TemplateDecodeErrorFinding = {
  kind: 'TemplateDecodeError'
  phase: PhaseRole
  template: string
  reason: string
  message: string
}

export type UnparsedSpanFinding = {
  kind: 'UnparsedSpan'
  phase: PhaseRole
  text: string
  message: string
}

export type CountMismatchFinding = {
  kind: 'CountMismatch'
  phase: PhaseRole | 'overall'
  expected: number
  actual: number
  delta: number // actual - expected
  message: string
}

export type Finding =
  | MissingPhaseFinding
  | InvalidDirectiveFinding
  | TemplateDecodeErrorFinding
  | UnparsedSpanFinding
  | CountMismatchFinding

export type FindingKind = Finding['kind']

export type WorkoutResult = {
  code?: string
  date?: string
  discipline: Discipline
  intervals: Interval[]
  phases: PhaseSummary[] // document order
  total: WorkoutTotals
  findings: Finding[]
  expected?: ExpectedCounts // declared and supplied counts, merged
  profile?: string // correction profile applied, if any
}
