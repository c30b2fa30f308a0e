import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { OrchestratorConfig, orchestratorConfig } from './config/orchestrator.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get<OrchestratorConfig>(orchestratorConfig.KEY);

  app.useGlobalPipes(new ValidationPipe());
  app.enableCors({ origin: config.corsOrigin });
  // runs OnModuleDestroy so the scheduler stops and live sessions are closed
  app.enableShutdownHooks();

  await app.listen(config.port);
  Logger.log(`Lesson orchestrator listening on port ${config.port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(`Failed to start: ${error instanceof Error ? error.message : String(error)}`, 'Bootstrap');
  process.exit(1);
});
