import { z } from 'zod'

export const disciplineSchema = z.enum(['cycling', 'running'])

export const phaseRoleSchema = z.enum(['warmup', 'body', 'recovery'])

const targetRangeSchema = z
  .object({
    low: z.number(),
    high: z.number(),
  })
  .refine((t) => t.low <= t.high, { message: 'target low must not exceed high' })

export const intervalSchema = z.object({
  phase: phaseRoleSchema,
  durationSeconds: z.number().int().positive(),
  target: targetRangeSchema,
  cadence: targetRangeSchema.optional(),
  position: z.string().min(1).optional(),
  repetition: z
    .object({
      index: z.number().int().positive(),
      total: z.number().int().positive(),
    })
    .refine((r) => r.index <= r.total, { message: 'repetition index exceeds total' })
    .optional(),
})

const findingSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('MissingPhase'), phase: phaseRoleSchema, message: z.string() }),
  z.object({
    kind: z.literal('InvalidDirective'),
    phase: phaseRoleSchema,
    text: z.string(),
    reason: z.string(),
    message: z.string(),
  }),
  z.object({
    kind: z.literal('TemplateDecodeError'),
    phase: phaseRoleSchema,
    template: z.string(),
    reason: z.string(),
    message: z.string(),
  }),
  z.object({ kind: z.literal('UnparsedSpan'), phase: phaseRoleSchema, text: z.string(), message: z.string() }),
  z.object({
    kind: z.literal('CountMismatch'),
    phase: z.union([phaseRoleSchema, z.literal('overall')]),
    expected: z.number().int(),
    actual: z.number().int(),
    delta: z.number().int(),
    message: z.string(),
  }),
])

const phaseCountsSchema = z.object({
  warmup: z.number().int().nonnegative().optional(),
  body: z.number().int().nonnegative().optional(),
  recovery: z.number().int().nonnegative().optional(),
})

const expectedCountsSchema = z.object({
  total: z.number().int().nonnegative().optional(),
  phases: phaseCountsSchema.optional(),
})

const totalsSchema = z.object({
  intervalCount: z.number().int().nonnegative(),
  durationSeconds: z.number().nonnegative(),
})

export const workoutResultSchema = z
  .object({
    code: z.string().optional(),
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
    discipline: disciplineSchema,
    intervals: z.array(intervalSchema),
    phases: z.array(totalsSchema.extend({ role: phaseRoleSchema })),
    total: totalsSchema,
    findings: z.array(findingSchema),
    expected: expectedCountsSchema.optional(),
    profile: z.string().optional(),
  })
  .refine((r) => r.phases.reduce((sum, p) => sum + p.intervalCount, 0) === r.total.intervalCount, {
    message: 'Phase counts must add up to the overall count',
  })
  .refine((r) => r.total.intervalCount === r.intervals.length, {
    message: 'Overall count must match the interval list',
  })
