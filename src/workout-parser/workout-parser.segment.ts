import { missingPhase } from './workout-parser.errors'
import { foldText } from './workout-parser.grammar'
import type { Discipline, MissingPhaseFinding, Phase, PhaseRole } from './workout-parser.types'

export type PhaseDefinition = {
  role: PhaseRole
  aliases: string[] // folded (lowercase, no accents)
}

// Canonical order; also the order replaced phases are inserted in by the normalizer.
export const PHASE_DEFINITIONS: PhaseDefinition[] = [
  { role: 'warmup', aliases: ['warmup', 'warm-up', 'warm up', 'echauffement'] },
  { role: 'body', aliases: ['main set', 'main', 'body', 'main body', 'corps de seance'] },
  { role: 'recovery', aliases: ['recovery', 'cooldown', 'cool-down', 'cool down', 'recuperation'] },
]

export const PHASE_ROLES: PhaseRole[] = PHASE_DEFINITIONS.map((d) => d.role)

export const DEFAULT_REQUIRED_PHASES: Record<Discipline, PhaseRole[]> = {
  cycling: ['warmup', 'body', 'recovery'],
  running: ['body'],
}

export type SegmentedDocument = {
  preamble: string
  phases: Phase[]
  findings: MissingPhaseFinding[]
}

/**
 * Resolves a phase name ("Main set", "## Récupération") to its role.
 */
export function resolvePhaseRole(name: string): PhaseRole | null {
  const folded = foldText(name.replace(/^#+/, ''))
  const def = PHASE_DEFINITIONS.find((d) => d.aliases.includes(folded))
  return def?.role ?? null
}

function matchHeader(line: string): { role: PhaseRole; rest: string } | null {
  const colon = line.indexOf(':')
  const head = colon >= 0 ? line.slice(0, colon) : line
  const role = resolvePhaseRole(head)
  if (!role) return null
  return { role, rest: colon >= 0 ? line.slice(colon + 1).trim() : '' }
}

export function findMissingPhases(phases: Phase[], required: PhaseRole[]): MissingPhaseFinding[] {
  return required.filter((role) => !phases.some((p) => p.role === role)).map(missingPhase)
}

/**
 * Splits a document into its preamble and ordered phases. A header is a line holding
 * only a phase name, optionally followed by ":" and content for that phase.
 */
export function segmentPhases(text: string, required: PhaseRole[] = []): SegmentedDocument {
  const lines = text.split(/\r?\n/)
  const preamble: string[] = []
  const phases: Array<Phase & { lines: string[] }> = []
  let current: (Phase & { lines: string[] }) | null = null

  lines.forEach((line, idx) => {
    const header = matchHeader(line)
    if (header) {
      const existing = phases.find((p) => p.role === header.role)
      if (existing) {
        current = existing
      } else {
        current = { role: header.role, text: '', line: idx + 1, lines: [] }
        phases.push(current)
      }
      if (header.rest) current.lines.push(header.rest)
      return
    }

    if (current) {
      current.lines.push(line)
    } else {
      preamble.push(line)
    }
  })

  const result: Phase[] = phases.map((p) => ({ role: p.role, text: p.lines.join('\n'), line: p.line }))

  return {
    preamble: preamble.join('\n'),
    phases: result,
    findings: findMissingPhases(result, required),
  }
}
