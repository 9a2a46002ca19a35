import type { Interval, PhaseRole, PhaseSummary, Repetition, TargetRange, WorkoutTotals } from './workout-parser.types'

type IntervalInit = {
  phase: PhaseRole
  durationSeconds: number
  target: TargetRange
  cadence?: TargetRange
  position?: string
  repetition?: Repetition
}

/**
 * Intervals are frozen on creation; corrections build new ones.
 */
export function createInterval(init: IntervalInit): Interval {
  const interval: Interval = {
    phase: init.phase,
    durationSeconds: init.durationSeconds,
    target: Object.freeze({ low: init.target.low, high: init.target.high }),
    ...(init.cadence ? { cadence: Object.freeze({ low: init.cadence.low, high: init.cadence.high }) } : {}),
    ...(init.position ? { position: init.position } : {}),
    ...(init.repetition
      ? { repetition: Object.freeze({ index: init.repetition.index, total: init.repetition.total }) }
      : {}),
  }
  return Object.freeze(interval)
}

export function summarizePhases(roles: PhaseRole[], intervals: readonly Interval[]): PhaseSummary[] {
  return roles.map((role) => {
    const own = intervals.filter((i) => i.phase === role)
    return {
      role,
      intervalCount: own.length,
      durationSeconds: own.reduce((sum, i) => sum + i.durationSeconds, 0),
    }
  })
}

export function summarizeTotal(intervals: readonly Interval[]): WorkoutTotals {
  return {
    intervalCount: intervals.length,
    durationSeconds: intervals.reduce((sum, i) => sum + i.durationSeconds, 0),
  }
}
