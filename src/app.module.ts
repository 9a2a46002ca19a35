import { Module } from '@nestjs/common'
import { AppController } from './app.controller'
import { ClockModule } from './common/clock.module'
import { WorkoutParserModule } from './workout-parser/workout-parser.module'

@Module({
  imports: [ClockModule, WorkoutParserModule],
  controllers: [AppController],
})
export class AppModule {}
