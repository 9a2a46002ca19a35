import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import type { NestExpressApplication } from '@nestjs/platform-express'
import { AppModule } from './app.module'

const DEFAULT_PORT = 3000

function readPort(): number {
  const parsed = Number(process.env.PORT)
  if (Number.isInteger(parsed) && parsed > 0) return parsed
  return DEFAULT_PORT
}

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule)
  // Plans run to a few hundred kilobytes; the parser enforces its own character limit.
  app.useBodyParser('json', { limit: '1mb' })

  app.enableCors({
    origin: process.env.CORS_ORIGIN || 'http://localhost:5173',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  })

  const port = readPort()
  await app.listen(port)
  Logger.log(`Listening on port ${port}`, 'Bootstrap')
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack ?? err.message : String(err), 'Bootstrap')
  process.exit(1)
})
