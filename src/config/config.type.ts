import { AppConfig } from './app-config.type';
import { ThrottlerConfig } from './throttler-config.type';
import { VavExtractionConfig } from '../vav-extraction/config/vav-extraction-config.type';
import { LanguageModelConfig } from '../vav-extraction/config/language-model-config.type';

export type AllConfigType = {
  app: AppConfig;
  throttler: ThrottlerConfig;
  vavExtraction: VavExtractionConfig;
  languageModel: LanguageModelConfig;
};
