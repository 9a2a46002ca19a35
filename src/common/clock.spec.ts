import { fixedClock, systemClock } from './clock'

describe('clock', () => {
  it('a fixed clock always reports its instant', () => {
    const clock = fixedClock('2026-03-14T06:30:00.000Z')
    expect(clock.now().toISOString()).toBe('2026-03-14T06:30:00.000Z')
    expect(clock.now()).not.toBe(clock.now())
  })

  it('rejects an unreadable timestamp', () => {
    expect(() => fixedClock('yesterday')).toThrow('Invalid clock timestamp "yesterday"')
  })

  it('the system clock follows Date.now', () => {
    jest.useFakeTimers().setSystemTime(new Date('2026-01-02T00:00:00.000Z'))
    try {
      expect(systemClock.now().toISOString()).toBe('2026-01-02T00:00:00.000Z')
    } finally {
      jest.useRealTimers()
    }
  })
})
