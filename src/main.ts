import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import type { Request, Response } from 'express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { WEBHOOK_SECRET_HEADER } from './auth/utils/secret.util';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const logger = app.get(Logger);

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Webhook Intake API')
    .setDescription('Receives webhook events and forwards text to a voice synthesis API')
    .setVersion('1.0.0')
    .addApiKey({ type: 'apiKey', in: 'header', name: WEBHOOK_SECRET_HEADER }, 'webhook-secret')
    .build();
  const swaggerDocument = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api/docs', app, swaggerDocument);
  app.use('/api/docs-json', (_req: Request, res: Response) => res.json(swaggerDocument));

  // CORS Configuration
  const allowedOrigins = configService.get<string[]>('cors.origins') ?? [];
  app.enableCors({
    origin: allowedOrigins.length > 0 ? allowedOrigins : '*',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', WEBHOOK_SECRET_HEADER],
  });

  configureApp(app);

  const port = configService.get<number>('app.port') ?? 3000;
  await app.listen(port, '0.0.0.0');

  logger.log(`🚀 Webhook intake running on: http://localhost:${port}`);
  logger.log(`📋 Health check: http://localhost:${port}/health`);
  logger.log(`📚 API docs: http://localhost:${port}/api/docs`);
  logger.log(`🔒 CORS enabled for: ${allowedOrigins.join(', ') || '*'}`);
}
void bootstrap();
