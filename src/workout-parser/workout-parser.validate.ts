import { countMismatch } from './workout-parser.errors'
import { PHASE_ROLES } from './workout-parser.segment'
import type { CountMismatchFinding, ExpectedCounts, PhaseSummary, WorkoutTotals } from './workout-parser.types'

/**
 * Compares declared interval counts with what was parsed. Findings are advisory.
 */
export function validateCounts(
  expected: ExpectedCounts | undefined,
  phases: readonly PhaseSummary[],
  total: WorkoutTotals,
): CountMismatchFinding[] {
  if (!expected) return []

  const findings: CountMismatchFinding[] = []

  for (const role of PHASE_ROLES) {
    const declared = expected.phases?.[role]
    if (declared === undefined) continue
    const actual = phases.find((p) => p.role === role)?.intervalCount ?? 0
    if (actual !== declared) findings.push(countMismatch(role, declared, actual))
  }

  if (expected.total !== undefined && expected.total !== total.intervalCount) {
    findings.push(countMismatch('overall', expected.total, total.intervalCount))
  }

  return findings
}
