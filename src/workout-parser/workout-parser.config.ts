import { z } from 'zod'
import { CORRECTION_PROFILES } from './correction-profiles'
import { findProfile } from './workout-parser.normalize'
import { DEFAULT_PARSE_LIMITS } from './workout-parser.parse'
import type { ParseLimits } from './workout-parser.parse'
import { disciplineSchema } from './workout-parser.schema'
import type { Clock } from '../common/clock'
import type { Discipline } from './workout-parser.types'

export const WORKOUT_PARSER_CONFIG = Symbol('WORKOUT_PARSER_CONFIG')

export type WorkoutParserConfig = {
  defaultDiscipline: Discipline
  indoorProfile: string | null // null disables automatic correction
  outdoorProfile: string | null
  maxDocumentChars: number
  defaultYear: number
  limits: ParseLimits
}

const DEFAULT_MAX_DOCUMENT_CHARS = 200_000

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().max(Number.MAX_SAFE_INTEGER).catch(fallback)

// An empty name turns the automatic correction off; an unknown one fails at startup.
function readProfile(name: string): string | null {
  if (name === '') return null
  return findProfile(name, CORRECTION_PROFILES).name
}

/**
 * Reads parser settings from the environment. Malformed numbers and disciplines fall back
 * to defaults.
 */
export function loadWorkoutParserConfig(env: NodeJS.ProcessEnv, clock: Clock): WorkoutParserConfig {
  const schema = z.object({
    WORKOUT_PARSER_DEFAULT_DISCIPLINE: z
      .string()
      .trim()
      .toLowerCase()
      .pipe(disciplineSchema)
      .catch('cycling'),
    WORKOUT_PARSER_INDOOR_PROFILE: z.string().trim().default('indoor-trainer'),
    WORKOUT_PARSER_OUTDOOR_PROFILE: z.string().trim().default('outdoor'),
    WORKOUT_PARSER_MAX_DOCUMENT_CHARS: positiveInt(DEFAULT_MAX_DOCUMENT_CHARS),
    WORKOUT_PARSER_DEFAULT_YEAR: positiveInt(clock.now().getUTCFullYear()),
    WORKOUT_PARSER_MAX_REPEAT_COUNT: positiveInt(DEFAULT_PARSE_LIMITS.maxRepeatCount),
    WORKOUT_PARSER_MAX_INTERVALS: positiveInt(DEFAULT_PARSE_LIMITS.maxIntervals),
  })

  const raw = schema.parse({
    WORKOUT_PARSER_DEFAULT_DISCIPLINE: env.WORKOUT_PARSER_DEFAULT_DISCIPLINE,
    WORKOUT_PARSER_INDOOR_PROFILE: env.WORKOUT_PARSER_INDOOR_PROFILE,
    WORKOUT_PARSER_OUTDOOR_PROFILE: env.WORKOUT_PARSER_OUTDOOR_PROFILE,
    WORKOUT_PARSER_MAX_DOCUMENT_CHARS: env.WORKOUT_PARSER_MAX_DOCUMENT_CHARS,
    WORKOUT_PARSER_DEFAULT_YEAR: env.WORKOUT_PARSER_DEFAULT_YEAR,
    WORKOUT_PARSER_MAX_REPEAT_COUNT: env.WORKOUT_PARSER_MAX_REPEAT_COUNT,
    WORKOUT_PARSER_MAX_INTERVALS: env.WORKOUT_PARSER_MAX_INTERVALS,
  })

  return {
    defaultDiscipline: raw.WORKOUT_PARSER_DEFAULT_DISCIPLINE,
    indoorProfile: readProfile(raw.WORKOUT_PARSER_INDOOR_PROFILE),
    outdoorProfile: readProfile(raw.WORKOUT_PARSER_OUTDOOR_PROFILE),
    maxDocumentChars: raw.WORKOUT_PARSER_MAX_DOCUMENT_CHARS,
    defaultYear: raw.WORKOUT_PARSER_DEFAULT_YEAR,
    limits: {
      maxRepeatCount: raw.WORKOUT_PARSER_MAX_REPEAT_COUNT,
      maxIntervals: raw.WORKOUT_PARSER_MAX_INTERVALS,
    },
  }
}
