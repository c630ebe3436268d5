import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { describeError } from './common/errors';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { abortOnError: false });

  // Global validation pipe for DTO validation
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // Swagger API Documentation
  const config = new DocumentBuilder()
    .setTitle('Crane Maintenance Engine API')
    .setDescription(
      'Crane and spreader telemetry ingestion with maintenance due-date prediction',
    )
    .setVersion('1.0')
    .addTag('ingestion', 'Batch log ingestion')
    .addTag('samples', 'Time-series queries')
    .addTag('service-log', 'Completed maintenance history')
    .addTag('assignments', 'Spreader to crane assignments')
    .addTag('tasks', 'Maintenance task registry')
    .addTag('predictions', 'Due-date forecasts')
    .addTag('maintenance-windows', 'Planned maintenance windows')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  const port = app.get(ConfigService).get<number>('PORT', 3000);
  await app.listen(port, '0.0.0.0');

  logger.log(`Crane Maintenance Engine running on: http://localhost:${port}`);
  logger.log(`API Documentation: http://localhost:${port}/api/docs`);
}

bootstrap().catch((error: unknown) => {
  logger.error(`Startup failed: ${describeError(error)}`);
  process.exitCode = 1;
});
