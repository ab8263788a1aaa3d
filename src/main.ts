import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'log'],
  });

  // SIGTERM/SIGINT 시 onModuleDestroy로 어댑터 연결 해제
  app.enableShutdownHooks();

  const port = parseInt(app.get(ConfigService).get<string>('PORT') ?? '3000', 10);
  await app.listen(port);
  logger.log(`Ticker news aggregator listening on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start application:', error);
  process.exit(1);
});
