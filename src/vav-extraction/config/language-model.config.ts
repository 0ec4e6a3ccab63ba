import { registerAs } from '@nestjs/config';
import {
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
} from 'class-validator';
import { LanguageModelConfig } from './language-model-config.type';
import validateConfig from '../../utils/validate-config';

class EnvironmentVariablesValidator {
  @IsBoolean()
  LM_ENABLED: boolean = false;

  @IsUrl({ require_tld: false })
  LM_BASE_URL: string = 'https://generativelanguage.googleapis.com';

  @IsString()
  LM_MODEL: string = 'gemini-2.0-flash';

  @IsString()
  @IsOptional()
  LM_API_KEY?: string;

  @IsInt()
  @Min(100)
  @Max(120000)
  LM_TIMEOUT_MS: number = 15000;

  @IsInt()
  @Min(1)
  @Max(32)
  LM_MAX_CONCURRENCY: number = 4;
}

export default registerAs<LanguageModelConfig>('languageModel', () => {
  const validatedConfig = validateConfig(
    {
      LM_ENABLED: process.env.LM_ENABLED === 'true',
      LM_BASE_URL:
        process.env.LM_BASE_URL || 'https://generativelanguage.googleapis.com',
      LM_MODEL: process.env.LM_MODEL || 'gemini-2.0-flash',
      LM_API_KEY: process.env.LM_API_KEY || undefined,
      LM_TIMEOUT_MS: process.env.LM_TIMEOUT_MS
        ? parseInt(process.env.LM_TIMEOUT_MS, 10)
        : 15000,
      LM_MAX_CONCURRENCY: process.env.LM_MAX_CONCURRENCY
        ? parseInt(process.env.LM_MAX_CONCURRENCY, 10)
        : 4,
    },
    EnvironmentVariablesValidator,
  );

  if (validatedConfig.LM_ENABLED && !validatedConfig.LM_API_KEY) {
    throw new Error(
      'Language model config validation error: LM_API_KEY is required when LM_ENABLED=true',
    );
  }

  return {
    enabled: validatedConfig.LM_ENABLED,
    baseUrl: validatedConfig.LM_BASE_URL.replace(/\/+$/, ''),
    model: validatedConfig.LM_MODEL,
    apiKey: validatedConfig.LM_API_KEY,
    timeoutMs: validatedConfig.LM_TIMEOUT_MS,
    maxConcurrency: validatedConfig.LM_MAX_CONCURRENCY,
  };
});
