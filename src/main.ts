import 'reflect-metadata';
import { Logger as NestLogger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import appConfig, { AppSettings } from './config/app.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));

  app.setGlobalPrefix('api');
  app.enableCors();

  // Enable graceful shutdown
  app.enableShutdownHooks();

  const { port, host } = app.get<AppSettings>(appConfig.KEY);

  const config = new DocumentBuilder()
    .setTitle('Banking Knowledge Assistant API')
    .setDescription('Guardrailed retrieval-augmented answers to banking questions')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);

  await app.listen(port, host);

  const url = await app.getUrl();
  const logger = new NestLogger('Bootstrap');

  logger.log(`🚀 Application is running on: ${url}`);
  logger.log(`📚 Swagger UI available at: ${url}/docs`);
}

bootstrap().catch((error: unknown) => {
  new NestLogger('Bootstrap').error('Failed to start application', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
