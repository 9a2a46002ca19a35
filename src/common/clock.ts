export const CLOCK = Symbol('CLOCK')

// Time source for response stamps and the default plan year; tests pin it.
export type Clock = {
  now(): Date
}

export const systemClock: Clock = {
  now: () => new Date(),
}

/**
 * A clock stopped at `iso`. Throws on a timestamp `Date` cannot read.
 */
export function fixedClock(iso: string): Clock {
  const at = Date.parse(iso)
  if (Number.isNaN(at)) throw new Error(`Invalid clock timestamp "${iso}"`)
  return { now: () => new Date(at) }
}
