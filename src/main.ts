import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ApiExceptionFilter } from './common/exceptions/api-exception.filter';
import { validationExceptionFactory } from './common/exceptions/validation.exception';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);

  // Get ConfigService
  const configService = app.get(ConfigService);

  // Global pipes
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      exceptionFactory: validationExceptionFactory,
      stopAtFirstError: true,
    }),
  );

  // Global filters
  app.useGlobalFilters(new ApiExceptionFilter());

  // Global logger
  const isProd =
    configService.get<string>('app.env', 'development') === 'production';
  app.useLogger(
    isProd
      ? ['error', 'warn', 'log']
      : ['error', 'warn', 'log', 'debug', 'verbose'],
  );

  // CORS
  app.enableCors({
    origin: configService
      .get<string>('cors.origin', '')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
    credentials: true,
  });

  app.enableShutdownHooks();

  const port = configService.get<number>('app.port', 3000);
  await app.listen(port);

  Logger.log(
    `Application is running on: http://localhost:${port}`,
    'Bootstrap',
  );
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    'Application failed to start',
    error instanceof Error ? error.stack : String(error),
    'Bootstrap',
  );
  process.exit(1);
});
