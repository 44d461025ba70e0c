import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import appConfig, { AppSettings } from './config/app.config';
import { loadEnv } from './config/env.schema';
import guardrailsConfig from './config/guardrails.config';
import ingestionConfig from './config/ingestion.config';
import openaiConfig from './config/openai.config';
import ragConfig from './config/rag.config';
import { ApiModule } from './modules/api/api.module';
import { HealthModule } from './modules/health/health.module';
import { IngestionModule } from './modules/ingestion/ingestion.module';
import { MetricsModule } from './modules/metrics/metrics.module';

/**
 * App Module - Main application module
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: `.env`,
      load: [appConfig, openaiConfig, ragConfig, guardrailsConfig, ingestionConfig],
      validate: (config) => loadEnv(config),
    }),
    LoggerModule.forRootAsync({
      inject: [appConfig.KEY],
      useFactory: (app: AppSettings) => ({
        pinoHttp: {
          level: app.logLevel,
          autoLogging: app.nodeEnv !== 'test',
        },
      }),
    }),
    ApiModule,
    IngestionModule,
    MetricsModule,
    HealthModule,
  ],
})
export class AppModule { }
