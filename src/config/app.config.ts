import { registerAs } from '@nestjs/config';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { AppConfig } from './app-config.type';
import validateConfig from '../utils/validate-config';

enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

class EnvironmentVariablesValidator {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.Development;

  @IsString()
  APP_NAME: string = 'vav-takeoff-api';

  @IsInt()
  @Min(0)
  @Max(65535)
  APP_PORT: number = 3000;

  @IsString()
  API_PREFIX: string = 'api';

  @IsInt()
  @Min(1)
  @Max(200)
  UPLOAD_MAX_FILE_SIZE_MB: number = 25;

  @IsBoolean()
  SWAGGER_ENABLED: boolean = true;
}

export default registerAs<AppConfig>('app', () => {
  const validatedConfig = validateConfig(
    {
      NODE_ENV: process.env.NODE_ENV || Environment.Development,
      APP_NAME: process.env.APP_NAME || 'vav-takeoff-api',
      APP_PORT: process.env.APP_PORT
        ? parseInt(process.env.APP_PORT, 10)
        : process.env.PORT
          ? parseInt(process.env.PORT, 10)
          : 3000,
      API_PREFIX: process.env.API_PREFIX || 'api',
      UPLOAD_MAX_FILE_SIZE_MB: process.env.UPLOAD_MAX_FILE_SIZE_MB
        ? parseInt(process.env.UPLOAD_MAX_FILE_SIZE_MB, 10)
        : 25,
      SWAGGER_ENABLED: process.env.SWAGGER_ENABLED !== 'false',
    },
    EnvironmentVariablesValidator,
  );

  return {
    nodeEnv: validatedConfig.NODE_ENV,
    name: validatedConfig.APP_NAME,
    port: validatedConfig.APP_PORT,
    apiPrefix: validatedConfig.API_PREFIX,
    uploadMaxFileSizeMb: validatedConfig.UPLOAD_MAX_FILE_SIZE_MB,
    swaggerEnabled: validatedConfig.SWAGGER_ENABLED,
  };
});
