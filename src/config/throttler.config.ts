import { registerAs } from '@nestjs/config';
import { IsInt, Min } from 'class-validator';
import { ThrottlerConfig } from './throttler-config.type';
import validateConfig from '../utils/validate-config';

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1)
  THROTTLE_TTL: number = 60000;

  @IsInt()
  @Min(1)
  THROTTLE_LIMIT: number = 30;
}

export default registerAs<ThrottlerConfig>('throttler', () => {
  const validatedConfig = validateConfig(
    {
      THROTTLE_TTL: parseInt(process.env.THROTTLE_TTL ?? '60000', 10), // milliseconds (default: 60s)
      THROTTLE_LIMIT: parseInt(process.env.THROTTLE_LIMIT ?? '30', 10), // requests per TTL
    },
    EnvironmentVariablesValidator,
  );

  return {
    ttl: validatedConfig.THROTTLE_TTL,
    limit: validatedConfig.THROTTLE_LIMIT,
  };
});
