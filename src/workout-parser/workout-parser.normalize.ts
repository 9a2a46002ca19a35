import { CORRECTION_PROFILES, type CorrectionProfile } from './correction-profiles'
import { UnknownProfileError } from './workout-parser.errors'
import { createInterval, summarizePhases, summarizeTotal } from './workout-parser.interval'
import { PHASE_ROLES } from './workout-parser.segment'
import { validateCounts } from './workout-parser.validate'
import type { Interval, PhaseRole, WorkoutResult } from './workout-parser.types'

export function findProfile(name: string, profiles: readonly CorrectionProfile[] = CORRECTION_PROFILES): CorrectionProfile {
  const profile = profiles.find((p) => p.name === name)
  if (!profile) {
    throw new UnknownProfileError(
      name,
      profiles.map((p) => p.name),
    )
  }
  return profile
}

/**
 * Replaced phases missing from the document are inserted at their canonical position.
 */
function resolveRoleOrder(present: PhaseRole[], replaced: PhaseRole[]): PhaseRole[] {
  const order = [...present]
  const rank = (role: PhaseRole) => PHASE_ROLES.indexOf(role)

  for (const role of PHASE_ROLES) {
    if (!replaced.includes(role) || order.includes(role)) continue
    const before = order.findIndex((r) => rank(r) > rank(role))
    if (before >= 0) {
      order.splice(before, 0, role)
    } else {
      order.push(role)
    }
  }

  return order
}

/**
 * Applies a correction profile and returns a new result; the input is left untouched.
 * Parse findings are carried over as they describe the source document. Count
 * mismatches are checked again against the corrected phases.
 */
export function normalizeWorkout(
  result: WorkoutResult,
  profileName: string,
  profiles: readonly CorrectionProfile[] = CORRECTION_PROFILES,
): WorkoutResult {
  const profile = findProfile(profileName, profiles)
  const replaced = PHASE_ROLES.filter((role) => profile.replacePhases[role] !== undefined)
  const roles = resolveRoleOrder(
    result.phases.map((p) => p.role),
    replaced,
  )

  const intervals: Interval[] = roles.flatMap((role): Interval[] => {
    const replacement = profile.replacePhases[role]
    if (replacement) {
      return replacement.map((step) =>
        createInterval({ phase: role, durationSeconds: step.durationSeconds, target: step.target, position: step.position }),
      )
    }

    const own = result.intervals.filter((i) => i.phase === role)
    const offset = profile.offsets[role]
    if (!offset) return own

    return own.map((i) =>
      createInterval({
        phase: i.phase,
        durationSeconds: i.durationSeconds,
        target: { low: i.target.low + offset, high: i.target.high + offset },
        cadence: i.cadence,
        position: i.position,
        repetition: i.repetition,
      }),
    )
  })

  const phases = summarizePhases(roles, intervals)
  const total = summarizeTotal(intervals)
  return {
    ...result,
    intervals,
    phases,
    total,
    findings: [
      ...result.findings.filter((f) => f.kind !== 'CountMismatch'),
      ...validateCounts(result.expected, phases, total),
    ],
    profile: profile.name,
  }
}
