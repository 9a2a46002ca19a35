import type { PhaseRole, TargetRange } from './workout-parser.types'

export type ReplacementStep = {
  durationSeconds: number
  target: TargetRange
  position?: string
}

export type CorrectionProfile = {
  name: string
  description: string
  replacePhases: Partial<Record<PhaseRole, readonly ReplacementStep[]>>
  offsets: Partial<Record<PhaseRole, number>> // added to low and high
}

export const CORRECTION_PROFILES: readonly CorrectionProfile[] = [
  {
    name: 'indoor-trainer',
    description: 'Home trainer: standard warmup and recovery blocks, main set +15 W',
    replacePhases: {
      warmup: [
        { durationSeconds: 150, target: { low: 96, high: 106 } },
        { durationSeconds: 150, target: { low: 130, high: 136 } },
        { durationSeconds: 300, target: { low: 156, high: 166 } },
        { durationSeconds: 300, target: { low: 180, high: 190 } },
      ],
      recovery: [
        { durationSeconds: 120, target: { low: 175, high: 180 } },
        { durationSeconds: 120, target: { low: 175, high: 180 } },
      ],
    },
    offsets: { body: 15 },
  },
  {
    name: 'outdoor',
    description: 'Outdoor ride: main set +15 W',
    replacePhases: {},
    offsets: { body: 15 },
  },
]
