import {
  BadRequestException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  PayloadTooLargeException,
} from '@nestjs/common'
import { createHash } from 'crypto'
import stringify from 'fast-json-stable-stringify'
import { CLOCK } from '../common/clock'
import type { Clock } from '../common/clock'
import { CORRECTION_PROFILES } from './correction-profiles'
import { UnknownProfileError } from './workout-parser.errors'
import { toExportRecords } from './workout-parser.export'
import type { ExportRecord } from './workout-parser.export'
import { WORKOUT_PARSER_CONFIG } from './workout-parser.config'
import type { WorkoutParserConfig } from './workout-parser.config'
import { findProfile, normalizeWorkout } from './workout-parser.normalize'
import { parseSessions, parseWorkout } from './workout-parser.parse'
import type { ParseOptions } from './workout-parser.parse'
import { workoutResultSchema } from './workout-parser.schema'
import type { Discipline, WorkoutDocument, WorkoutResult } from './workout-parser.types'

export type ParsedWorkout = {
  result: WorkoutResult
  records: ExportRecord[]
}

export type ParseResponse = ParsedWorkout & {
  parsedAtIso: string
  inputsHash: string // sha256 hex of the stable JSON request
}

export type PlanResponse = {
  parsedAtIso: string
  inputsHash: string
  sessions: ParsedWorkout[]
}

export type ProfileInfo = {
  name: string
  description: string
}

type CorrectionOptions = {
  profile?: string // explicit profile; disables the automatic indoor and outdoor corrections
}

@Injectable()
export class WorkoutParserService {
  private readonly logger = new Logger(WorkoutParserService.name)

  constructor(
    @Inject(WORKOUT_PARSER_CONFIG) private readonly config: WorkoutParserConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  parseDocument(document: WorkoutDocument, opts: CorrectionOptions = {}): ParseResponse {
    this.assertSize(document.text)
    this.assertProfile(opts.profile)

    const parsed = this.finish(parseWorkout(document, this.parseOptions(opts)), opts.profile)
    return {
      parsedAtIso: this.clock.now().toISOString(),
      inputsHash: this.calculateInputsHash({ document, profile: opts.profile ?? null }),
      ...parsed,
    }
  }

  parsePlan(text: string, opts: CorrectionOptions & { discipline?: Discipline } = {}): PlanResponse {
    this.assertSize(text)
    this.assertProfile(opts.profile)

    const options: ParseOptions = {
      ...this.parseOptions(opts),
      defaultDiscipline: opts.discipline ?? this.config.defaultDiscipline,
    }
    const sessions = parseSessions(text, options).map((result) => this.finish(result, opts.profile))

    return {
      parsedAtIso: this.clock.now().toISOString(),
      inputsHash: this.calculateInputsHash({
        text,
        discipline: opts.discipline ?? null,
        profile: opts.profile ?? null,
      }),
      sessions,
    }
  }

  listProfiles(): ProfileInfo[] {
    return CORRECTION_PROFILES.map((p) => ({ name: p.name, description: p.description }))
  }

  private parseOptions(opts: CorrectionOptions): ParseOptions {
    return {
      defaultDiscipline: this.config.defaultDiscipline,
      indoorProfile: opts.profile ? null : this.config.indoorProfile,
      outdoorProfile: opts.profile ? null : this.config.outdoorProfile,
      defaultYear: this.config.defaultYear,
      limits: this.config.limits,
    }
  }

  private finish(parsed: WorkoutResult, profile: string | undefined): ParsedWorkout {
    const result = profile ? normalizeWorkout(parsed, profile) : parsed

    const check = workoutResultSchema.safeParse(result)
    if (!check.success) {
      throw new InternalServerErrorException(
        `WorkoutResult validation failed: ${JSON.stringify(check.error.format())}`,
      )
    }

    this.logger.log(
      `Parsed ${result.code ?? 'workout'}: ${result.total.intervalCount} intervals, ${result.total.durationSeconds}s` +
        (result.profile ? ` (profile ${result.profile})` : ''),
    )
    if (result.findings.length > 0) {
      this.logger.warn(
        `${result.code ?? 'workout'}: ${result.findings.length} finding(s): ` +
          result.findings.map((f) => f.message).join('; '),
      )
    }

    return { result, records: toExportRecords(result.intervals) }
  }

  private assertSize(text: string): void {
    if (text.length > this.config.maxDocumentChars) {
      throw new PayloadTooLargeException(
        `Document has ${text.length} characters, limit is ${this.config.maxDocumentChars}`,
      )
    }
  }

  private assertProfile(profile: string | undefined): void {
    if (profile === undefined) return
    try {
      findProfile(profile)
    } catch (err) {
      if (err instanceof UnknownProfileError) {
        throw new BadRequestException(err.message)
      }
      throw err
    }
  }

  /**
   * SHA256 of the stable JSON request, so equal requests hash equally whatever the key order.
   */
  private calculateInputsHash(input: object): string {
    return createHash('sha256').update(stringify(input)).digest('hex')
  }
}
