import { fromExportRecords, toExportRecords } from '../src/workout-parser/workout-parser.export'
import { parseWorkout } from '../src/workout-parser/workout-parser.parse'

const OPTIONS = { defaultYear: 2026 }

const RIDE = [
  'Warmup',
  '08:00 (seated) 100 to 120 W',
  'Main set',
  '3 x (04:00-02:00) : 200 to 210 W (high position)',
  '05:00 150 to 160 W',
  'Recovery',
  '05:00 100 to 110 W',
].join('\n')

describe('export records', () => {
  const { intervals } = parseWorkout({ text: RIDE }, OPTIONS)

  it('flattens intervals into snake_case records', () => {
    const records = toExportRecords(intervals)

    expect(records).toHaveLength(9)
    expect(records[0]).toEqual({
      phase: 'warmup',
      duration_seconds: 480,
      target_low: 100,
      target_high: 120,
      position: 'seated',
    })
    expect(records[1]).toEqual({
      phase: 'body',
      duration_seconds: 240,
      target_low: 200,
      target_high: 210,
      position: 'high position',
      repetition_index: 1,
      repetition_total: 3,
    })
    expect(records[7]).toEqual({ phase: 'body', duration_seconds: 300, target_low: 150, target_high: 160 })
  })

  it('re-ingesting an export yields the same ordered intervals', () => {
    const json = JSON.parse(JSON.stringify(toExportRecords(intervals)))
    expect(fromExportRecords(json)).toEqual(intervals)
  })

  it.each([
    ['a reversed range', { target_low: 300, target_high: 200 }],
    ['an index without a total', { repetition_index: 1 }],
    ['an index past the total', { repetition_index: 4, repetition_total: 3 }],
    ['an unknown field', { cadence: 90 }],
    ['a zero duration', { duration_seconds: 0 }],
    ['a cadence low without a high', { cadence_low: 80 }],
    ['a reversed cadence', { cadence_low: 95, cadence_high: 85 }],
  ])('rejects %s', (_label, patch) => {
    const record = { phase: 'body', duration_seconds: 60, target_low: 200, target_high: 210, ...patch }
    expect(fromExportRecords([record])).toBeNull()
  })

  it('carries the cadence range both ways', () => {
    const { intervals: withCadence } = parseWorkout({ text: 'Main set\n04:00 80 à 85 220 à 230' }, OPTIONS)
    const records = toExportRecords(withCadence)

    expect(records).toEqual([
      { phase: 'body', duration_seconds: 240, target_low: 220, target_high: 230, cadence_low: 80, cadence_high: 85 },
    ])
    expect(fromExportRecords(records)).toEqual(withCadence)
  })

  it('rejects a payload that is not a list', () => {
    expect(fromExportRecords({ phase: 'body' })).toBeNull()
  })
})
