import { z } from 'zod'
import { createInterval } from './workout-parser.interval'
import { phaseRoleSchema } from './workout-parser.schema'
import type { Interval } from './workout-parser.types'

// Flat record handed to export and upload code.
export const exportRecordSchema = z
  .object({
    phase: phaseRoleSchema,
    duration_seconds: z.number().int().positive(),
    target_low: z.number(),
    target_high: z.number(),
    cadence_low: z.number().optional(),
    cadence_high: z.number().optional(),
    position: z.string().min(1).optional(),
    repetition_index: z.number().int().positive().optional(),
    repetition_total: z.number().int().positive().optional(),
  })
  .strict()
  .refine((r) => r.target_low <= r.target_high, { message: 'target_low must not exceed target_high' })
  .refine((r) => (r.cadence_low === undefined) === (r.cadence_high === undefined), {
    message: 'cadence_low and cadence_high go together',
  })
  .refine((r) => r.cadence_low === undefined || r.cadence_low <= (r.cadence_high ?? 0), {
    message: 'cadence_low must not exceed cadence_high',
  })
  .refine((r) => (r.repetition_index === undefined) === (r.repetition_total === undefined), {
    message: 'repetition_index and repetition_total go together',
  })
  .refine((r) => r.repetition_index === undefined || r.repetition_index <= (r.repetition_total ?? 0), {
    message: 'repetition_index exceeds repetition_total',
  })

export const exportRecordsSchema = z.array(exportRecordSchema)

export type ExportRecord = z.infer<typeof exportRecordSchema>

export function toExportRecords(intervals: readonly Interval[]): ExportRecord[] {
  return intervals.map((i) => ({
    phase: i.phase,
    duration_seconds: i.durationSeconds,
    target_low: i.target.low,
    target_high: i.target.high,
    ...(i.cadence ? { cadence_low: i.cadence.low, cadence_high: i.cadence.high } : {}),
    ...(i.position ? { position: i.position } : {}),
    ...(i.repetition ? { repetition_index: i.repetition.index, repetition_total: i.repetition.total } : {}),
  }))
}

/**
 * Re-ingests exported records. Returns null when the payload does not match the schema.
 */
export function fromExportRecords(value: unknown): Interval[] | null {
  const parsed = exportRecordsSchema.safeParse(value)
  if (!parsed.success) return null

  return parsed.data.map((r) =>
    createInterval({
      phase: r.phase,
      durationSeconds: r.duration_seconds,
      target: { low: r.target_low, high: r.target_high },
      cadence:
        r.cadence_low !== undefined && r.cadence_high !== undefined
          ? { low: r.cadence_low, high: r.cadence_high }
          : undefined,
      position: r.position,
      repetition:
        r.repetition_index !== undefined && r.repetition_total !== undefined
          ? { index: r.repetition_index, total: r.repetition_total }
          : undefined,
    }),
  )
}
