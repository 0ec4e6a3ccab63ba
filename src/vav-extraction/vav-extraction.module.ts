import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { AllConfigType } from '../config/config.type';
import { ReportModule } from '../report/report.module';
import { ContextWindowBuilderDomainService } from './domain/services/context-window-builder.domain.service';
import { FallbackFieldClassifierDomainService } from './domain/services/fallback-field-classifier.domain.service';
import { HeuristicFieldClassifierDomainService } from './domain/services/heuristic-field-classifier.domain.service';
import { RecordAssemblerDomainService } from './domain/services/record-assembler.domain.service';
import { RecordValidatorDomainService } from './domain/services/record-validator.domain.service';
import { GeminiFieldExtractionAdapter } from './infrastructure/language-model/gemini-field-extraction.adapter';
import { Pdf2JsonTokenExtractorService } from './infrastructure/pdf-extraction/pdf2json-token-extractor.service';
import { VavExtractionController } from './vav-extraction.controller';
import { VavExtractionService } from './vav-extraction.service';

@Module({
  imports: [
    // File upload (memory storage, never written to disk)
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => ({
        limits: {
          fileSize:
            configService.getOrThrow('app.uploadMaxFileSizeMb', {
              infer: true,
            }) *
            1024 *
            1024,
          files: 1,
        },
      }),
    }),

    ReportModule,
  ],
  controllers: [VavExtractionController],
  providers: [
    // Application layer
    VavExtractionService,

    // Domain layer
    ContextWindowBuilderDomainService,
    HeuristicFieldClassifierDomainService,
    FallbackFieldClassifierDomainService,
    RecordAssemblerDomainService,
    RecordValidatorDomainService,

    // Infrastructure adapters (Hexagonal Architecture)
    {
      provide: 'TokenSourcePort',
      useClass: Pdf2JsonTokenExtractorService,
    },
    {
      provide: 'LanguageModelPort',
      useClass: GeminiFieldExtractionAdapter,
    },
    {
      provide: 'FieldClassifierPort',
      useExisting: FallbackFieldClassifierDomainService,
    },
  ],
  exports: [VavExtractionService],
})
export class VavExtractionModule {}
