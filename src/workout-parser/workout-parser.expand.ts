import { createInterval } from './workout-parser.interval'
import type { Interval, PhaseRole, SubIntervalTemplate } from './workout-parser.types'

/**
 * Replicates a decomposed template: iteration 1's templates, then iteration 2's, and so on.
 * Consumers rely on this grouping to render one repetition at a time.
 */
export function expandDirective(
  phase: PhaseRole,
  repeatCount: number,
  templates: readonly SubIntervalTemplate[],
): Interval[] {
  const intervals: Interval[] = []

  for (let index = 1; index <= repeatCount; index++) {
    for (const template of templates) {
      intervals.push(
        createInterval({
          phase,
          durationSeconds: template.durationSeconds,
          target: template.target,
          cadence: template.cadence,
          position: template.position,
          repetition: { index, total: repeatCount },
        }),
      )
    }
  }

  return intervals
}
