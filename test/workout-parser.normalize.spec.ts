import type { CorrectionProfile } from '../src/workout-parser/correction-profiles'
import { UnknownProfileError } from '../src/workout-parser/workout-parser.errors'
import { normalizeWorkout } from '../src/workout-parser/workout-parser.normalize'
import { parseWorkout } from '../src/workout-parser/workout-parser.parse'

const OPTIONS = { defaultYear: 2026 }

const RIDE = [
  'Warmup',
  '10:00 100 to 120 W',
  'Main set',
  '2 x (04:00-02:00) : 200 to 210 W',
  'Recovery',
  '05:00 100 to 110 W',
].join('\n')

describe('normalizeWorkout', () => {
  const parsed = parseWorkout({ text: RIDE }, OPTIONS)

  it('parses the ride as written', () => {
    expect(parsed.total).toEqual({ intervalCount: 6, durationSeconds: 1620 })
    expect(parsed.findings).toEqual([])
    expect(parsed.profile).toBeUndefined()
  })

  it('indoor-trainer replaces warmup and recovery and raises the main set', () => {
    const result = normalizeWorkout(parsed, 'indoor-trainer')

    expect(result.profile).toBe('indoor-trainer')
    expect(result.phases).toEqual([
      { role: 'warmup', intervalCount: 4, durationSeconds: 900 },
      { role: 'body', intervalCount: 4, durationSeconds: 720 },
      { role: 'recovery', intervalCount: 2, durationSeconds: 240 },
    ])
    expect(result.total).toEqual({ intervalCount: 10, durationSeconds: 1860 })
    expect(result.intervals.slice(0, 4).map((i) => [i.durationSeconds, i.target.low, i.target.high])).toEqual([
      [150, 96, 106],
      [150, 130, 136],
      [300, 156, 166],
      [300, 180, 190],
    ])
    expect(result.intervals[4]).toEqual({
      phase: 'body',
      durationSeconds: 240,
      target: { low: 215, high: 225 },
      repetition: { index: 1, total: 2 },
    })
    expect(result.intervals.slice(8).map((i) => [i.durationSeconds, i.target.low, i.target.high])).toEqual([
      [120, 175, 180],
      [120, 175, 180],
    ])
  })

  it('leaves the input result untouched', () => {
    normalizeWorkout(parsed, 'indoor-trainer')
    expect(parsed.intervals[1]?.target).toEqual({ low: 200, high: 210 })
    expect(parsed.total.intervalCount).toBe(6)
  })

  it('outdoor only offsets the main set', () => {
    const result = normalizeWorkout(parsed, 'outdoor')

    expect(result.total).toEqual(parsed.total)
    expect(result.intervals.map((i) => i.target.low)).toEqual([100, 215, 215, 215, 215, 100])
  })

  it('inserts replaced phases missing from the document in canonical order', () => {
    const bodyOnly = parseWorkout({ text: 'Main set\n2 x (04:00-02:00) : 200 to 210 W' }, OPTIONS)
    const result = normalizeWorkout(bodyOnly, 'indoor-trainer')

    expect(result.phases.map((p) => p.role)).toEqual(['warmup', 'body', 'recovery'])
    expect(result.findings.map((f) => f.kind)).toEqual(['MissingPhase', 'MissingPhase'])
  })

  it('accepts caller-supplied profiles', () => {
    const custom: CorrectionProfile = {
      name: 'easy-day',
      description: 'Lower warmup',
      replacePhases: {},
      offsets: { warmup: -10 },
    }
    const result = normalizeWorkout(parsed, 'easy-day', [custom])
    expect(result.intervals[0]?.target).toEqual({ low: 90, high: 110 })
  })

  it('checks declared counts again after correction and keeps the other findings', () => {
    const declared = parseWorkout({ text: 'Main set\n2 x (04:00-02:00) : 200 to 210 W', expected: { total: 10 } }, OPTIONS)
    expect(declared.findings.map((f) => f.kind)).toEqual(['MissingPhase', 'MissingPhase', 'CountMismatch'])

    const result = normalizeWorkout(declared, 'indoor-trainer')
    expect(result.total.intervalCount).toBe(10)
    expect(result.findings.map((f) => f.kind)).toEqual(['MissingPhase', 'MissingPhase'])
    expect(result.expected).toEqual({ total: 10 })
  })

  it('keeps the cadence of offset intervals', () => {
    const ride = parseWorkout({ text: 'Main set\n04:00 (haute) 80 à 85 220 à 230' }, OPTIONS)
    const result = normalizeWorkout(ride, 'outdoor')

    expect(result.intervals[0]?.target).toEqual({ low: 235, high: 245 })
    expect(result.intervals[0]?.cadence).toEqual({ low: 80, high: 85 })
  })

  it('throws on an unknown profile', () => {
    expect(() => normalizeWorkout(parsed, 'turbo')).toThrow(UnknownProfileError)
    expect(() => normalizeWorkout(parsed, 'turbo')).toThrow(
      'Unknown correction profile "turbo" (available: indoor-trainer, outdoor)',
    )
  })
})
