import { Body, Controller, Get, HttpCode, Post, UsePipes, ValidationPipe } from '@nestjs/common'
import { ParsePlanDto, ParseWorkoutDto } from './dto/parse-workout.dto'
import { WorkoutParserService } from './workout-parser.service'
import type { WorkoutDocument } from './workout-parser.types'

@Controller('workout-parser')
export class WorkoutParserController {
  constructor(private readonly workoutParserService: WorkoutParserService) {}

  @Post('parse')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }))
  parse(@Body() dto: ParseWorkoutDto) {
    const { profile, ...fields } = dto
    const document: WorkoutDocument = { ...fields }
    return this.workoutParserService.parseDocument(document, { profile })
  }

  @Post('plan')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }))
  plan(@Body() dto: ParsePlanDto) {
    return this.workoutParserService.parsePlan(dto.text, { discipline: dto.discipline, profile: dto.profile })
  }

  @Get('profiles')
  profiles() {
    return this.workoutParserService.listProfiles()
  }
}
