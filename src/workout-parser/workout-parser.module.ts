import { Module } from '@nestjs/common'
import { CLOCK } from '../common/clock'
import type { Clock } from '../common/clock'
import { WORKOUT_PARSER_CONFIG, loadWorkoutParserConfig } from './workout-parser.config'
import { WorkoutParserController } from './workout-parser.controller'
import { WorkoutParserService } from './workout-parser.service'

// CLOCK comes from the global ClockModule.
@Module({
  providers: [
    {
      provide: WORKOUT_PARSER_CONFIG,
      useFactory: (clock: Clock) => loadWorkoutParserConfig(process.env, clock),
      inject: [CLOCK],
    },
    WorkoutParserService,
  ],
  controllers: [WorkoutParserController],
  exports: [WorkoutParserService],
})
export class WorkoutParserModule {}
