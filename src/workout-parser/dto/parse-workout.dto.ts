import { Type } from 'class-transformer'
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Min,
  ValidateNested,
} from 'class-validator'
import type { Discipline } from '../workout-parser.types'

const DISCIPLINES: Discipline[] = ['cycling', 'running']

export class PhaseCountsDto {
  @IsOptional()
  @IsInt()
  @Min(0)
  warmup?: number

  @IsOptional()
  @IsInt()
  @Min(0)
  body?: number

  @IsOptional()
  @IsInt()
  @Min(0)
  recovery?: number
}

export class ExpectedCountsDto {
  @IsOptional()
  @IsInt()
  @Min(0)
  total?: number

  @IsOptional()
  @ValidateNested()
  @Type(() => PhaseCountsDto)
  phases?: PhaseCountsDto
}

export class ParseWorkoutDto {
  @IsString()
  @IsNotEmpty()
  text!: string

  @IsOptional()
  @IsIn(DISCIPLINES)
  discipline?: Discipline

  @IsOptional()
  @ValidateNested()
  @Type(() => ExpectedCountsDto)
  expected?: ExpectedCountsDto

  @IsOptional()
  @IsString()
  code?: string

  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  date?: string

  @IsOptional()
  @IsBoolean()
  indoor?: boolean

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  profile?: string
}

export class ParsePlanDto {
  @IsString()
  @IsNotEmpty()
  text!: string

  @IsOptional()
  @IsIn(DISCIPLINES)
  discipline?: Discipline

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  profile?: string
}
