import { Controller, Get, Inject } from '@nestjs/common'
import { CLOCK } from './common/clock'
import type { Clock } from './common/clock'

@Controller()
export class AppController {
  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  @Get()
  getRoot() {
    return {
      service: 'workout-interval-parser',
      endpoints: ['POST /workout-parser/parse', 'POST /workout-parser/plan', 'GET /workout-parser/profiles'],
    }
  }

  @Get('health')
  health() {
    return { status: 'ok', checkedAtIso: this.clock.now().toISOString() }
  }
}
