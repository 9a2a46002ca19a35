import {
  cleanLine,
  foldText,
  parseDurationToSeconds,
  parseTargetRange,
  parseTargetValue,
} from '../src/workout-parser/workout-parser.grammar'

describe('workout-parser grammar', () => {
  it('parses MM:SS and HH:MM:SS durations', () => {
    expect(parseDurationToSeconds('04:00')).toBe(240)
    expect(parseDurationToSeconds('4:30')).toBe(270)
    expect(parseDurationToSeconds('1:02:03')).toBe(3723)
  })

  it('rejects zero, malformed and out-of-range durations', () => {
    expect(parseDurationToSeconds('00:00')).toBeNull()
    expect(parseDurationToSeconds('4:75')).toBeNull()
    expect(parseDurationToSeconds('1:60:00')).toBeNull()
    expect(parseDurationToSeconds('02:0')).toBeNull()
    expect(parseDurationToSeconds('abc')).toBeNull()
  })

  it('reads watts, decimal commas and paces', () => {
    expect(parseTargetValue('210')).toBe(210)
    expect(parseTargetValue('212,5')).toBe(212.5)
    expect(parseTargetValue('4:30')).toBe(270)
    expect(parseTargetValue('12:75')).toBeNull()
    expect(parseTargetValue('fast')).toBeNull()
  })

  it('orders target ranges low to high', () => {
    expect(parseTargetRange('200', '210')).toEqual({ low: 200, high: 210 })
    expect(parseTargetRange('210', '200')).toEqual({ low: 200, high: 210 })
    expect(parseTargetRange('4:45', '4:30')).toEqual({ low: 270, high: 285 })
    expect(parseTargetRange('200', 'x')).toBeNull()
  })

  it('strips bullets and folds accents', () => {
    expect(cleanLine('  - 05:00 120 to 130 ')).toBe('05:00 120 to 130')
    expect(cleanLine('• 02:00 100 to 110')).toBe('02:00 100 to 110')
    expect(foldText('  Corps   de Séance ')).toBe('corps de seance')
    expect(foldText('Échauffement')).toBe('echauffement')
  })
})
