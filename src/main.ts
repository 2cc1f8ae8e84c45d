import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import { BALANCE_CONFIG, type BalanceConfig } from './config/balance.config'

async function bootstrap() {
  const app = await NestFactory.create(AppModule)
  const config = app.get<BalanceConfig>(BALANCE_CONFIG)

  app.enableCors({
    origin: config.corsOrigin,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  })
  app.enableShutdownHooks()

  await app.listen(config.port)
  Logger.log(`Listening on port ${config.port} (sample source: ${config.sampleSource})`, 'Bootstrap')
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack ?? err.message : String(err), undefined, 'Bootstrap')
  process.exit(1)
})
