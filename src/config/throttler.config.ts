import { registerAs } from '@nestjs/config';
import { ThrottlerConfig } from './throttler-config.type';
import { IsInt, IsOptional, Min } from 'class-validator';
import validateConfig from '../utils/validate-config';

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1)
  @IsOptional()
  THROTTLE_TTL?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  THROTTLE_LIMIT?: number;
}

export default registerAs<ThrottlerConfig>('throttler', () => {
  const validated = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    ttl: validated.THROTTLE_TTL ?? 60000, // milliseconds
    limit: validated.THROTTLE_LIMIT ?? 10, // requests per TTL
  };
});
