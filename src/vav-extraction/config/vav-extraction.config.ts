import { registerAs } from '@nestjs/config';
import {
  IsBoolean,
  IsInt,
  IsNumber,
  IsString,
  Max,
  Min,
  MinLength,
} from 'class-validator';
import { VavExtractionConfig } from './vav-extraction-config.type';
import validateConfig from '../../utils/validate-config';
import {
  DEFAULT_BOX_ID_PATTERN,
  DEFAULT_INLET_SIZE_PATTERN,
} from '../domain/utils/field-patterns.util';

class EnvironmentVariablesValidator {
  @IsNumber()
  @Min(1)
  @Max(2000)
  VAV_NEIGHBORHOOD_RADIUS_PT: number = 72;

  @IsNumber()
  @Min(0)
  @Max(4000)
  VAV_RECOVERY_RADIUS_PT: number = 144;

  @IsNumber()
  @Min(0)
  VAV_CFM_MIN: number = 25;

  @IsNumber()
  @Min(1)
  VAV_CFM_MAX: number = 20000;

  @IsString()
  @MinLength(1)
  VAV_BOX_ID_PATTERN: string = DEFAULT_BOX_ID_PATTERN;

  @IsString()
  @MinLength(1)
  VAV_INLET_SIZE_PATTERN: string = DEFAULT_INLET_SIZE_PATTERN;

  @IsInt()
  @Min(1)
  @Max(3)
  VAV_MIN_FIELD_COUNT: number = 2;

  @IsBoolean()
  VAV_ESTIMATE_INLET_FROM_CFM: boolean = false;

  @IsInt()
  @Min(1)
  VAV_MAX_PAGES: number = 500;
}

function assertCompilable(name: string, source: string): void {
  try {
    new RegExp(source, 'i');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`VAV extraction config validation error: ${name} ${reason}`);
  }
}

export default registerAs<VavExtractionConfig>('vavExtraction', () => {
  const env = process.env;
  const validatedConfig = validateConfig(
    {
      VAV_NEIGHBORHOOD_RADIUS_PT: env.VAV_NEIGHBORHOOD_RADIUS_PT
        ? parseFloat(env.VAV_NEIGHBORHOOD_RADIUS_PT)
        : 72,
      VAV_RECOVERY_RADIUS_PT: env.VAV_RECOVERY_RADIUS_PT
        ? parseFloat(env.VAV_RECOVERY_RADIUS_PT)
        : env.VAV_NEIGHBORHOOD_RADIUS_PT
          ? 2 * parseFloat(env.VAV_NEIGHBORHOOD_RADIUS_PT)
          : 144,
      VAV_CFM_MIN: env.VAV_CFM_MIN ? parseFloat(env.VAV_CFM_MIN) : 25,
      VAV_CFM_MAX: env.VAV_CFM_MAX ? parseFloat(env.VAV_CFM_MAX) : 20000,
      VAV_BOX_ID_PATTERN: env.VAV_BOX_ID_PATTERN || DEFAULT_BOX_ID_PATTERN,
      VAV_INLET_SIZE_PATTERN:
        env.VAV_INLET_SIZE_PATTERN || DEFAULT_INLET_SIZE_PATTERN,
      VAV_MIN_FIELD_COUNT: env.VAV_MIN_FIELD_COUNT
        ? parseInt(env.VAV_MIN_FIELD_COUNT, 10)
        : 2,
      VAV_ESTIMATE_INLET_FROM_CFM: env.VAV_ESTIMATE_INLET_FROM_CFM === 'true',
      VAV_MAX_PAGES: env.VAV_MAX_PAGES ? parseInt(env.VAV_MAX_PAGES, 10) : 500,
    },
    EnvironmentVariablesValidator,
  );

  if (validatedConfig.VAV_CFM_MIN >= validatedConfig.VAV_CFM_MAX) {
    throw new Error(
      'VAV extraction config validation error: VAV_CFM_MIN must be lower than VAV_CFM_MAX',
    );
  }
  assertCompilable('VAV_BOX_ID_PATTERN', validatedConfig.VAV_BOX_ID_PATTERN);
  assertCompilable(
    'VAV_INLET_SIZE_PATTERN',
    validatedConfig.VAV_INLET_SIZE_PATTERN,
  );

  return {
    neighborhoodRadiusPt: validatedConfig.VAV_NEIGHBORHOOD_RADIUS_PT,
    recoveryRadiusPt: validatedConfig.VAV_RECOVERY_RADIUS_PT,
    cfmRange: {
      min: validatedConfig.VAV_CFM_MIN,
      max: validatedConfig.VAV_CFM_MAX,
    },
    boxIdPattern: validatedConfig.VAV_BOX_ID_PATTERN,
    inletSizePattern: validatedConfig.VAV_INLET_SIZE_PATTERN,
    minFieldCount: validatedConfig.VAV_MIN_FIELD_COUNT,
    estimateInletFromCfm: validatedConfig.VAV_ESTIMATE_INLET_FROM_CFM,
    maxPages: validatedConfig.VAV_MAX_PAGES,
  };
});
