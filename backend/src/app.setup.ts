import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';

/**
 * A `*` entry allows every origin. The cors middleware compares array
 * entries literally, so the wildcard becomes `true` (reflect the caller).
 */
export function corsOrigin(origins: string[]): boolean | string[] {
  return origins.includes('*') ? true : origins;
}

/**
 * Global prefix, validation, error shape and CORS. Shared by the server
 * bootstrap and the e2e suites so both see the same HTTP surface.
 */
export function configureApp(app: INestApplication): void {
  const configService = app.get(ConfigService);

  app.setGlobalPrefix('api');

  // Validation pipe with transform
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());

  app.enableCors({
    origin: corsOrigin(configService.get<string[]>('http.corsOrigins', ['*'])),
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    credentials: true,
  });
}
