import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import appConfig from './config/app.config';
import throttlerConfig from './config/throttler.config';
import { AllConfigType } from './config/config.type';
import vavExtractionConfig from './vav-extraction/config/vav-extraction.config';
import languageModelConfig from './vav-extraction/config/language-model.config';
import { ReportModule } from './report/report.module';
import { VavExtractionModule } from './vav-extraction/vav-extraction.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, throttlerConfig, vavExtractionConfig, languageModelConfig],
      envFilePath: ['.env'],
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => [
        {
          ttl: configService.getOrThrow('throttler.ttl', { infer: true }),
          limit: configService.getOrThrow('throttler.limit', { infer: true }),
        },
      ],
    }),
    VavExtractionModule,
    ReportModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
