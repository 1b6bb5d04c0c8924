import { registerAs } from '@nestjs/config';
import { IsEnum, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { AppConfig } from './app-config.type';
import validateConfig from '../utils/validate-config';

enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

class EnvironmentVariablesValidator {
  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV?: Environment;

  @IsInt()
  @Min(0)
  @Max(65535)
  @IsOptional()
  APP_PORT?: number;

  @IsString()
  @IsOptional()
  APP_NAME?: string;

  @IsString()
  @IsOptional()
  API_PREFIX?: string;
}

export default registerAs<AppConfig>('app', () => {
  const validated = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    nodeEnv: validated.NODE_ENV || Environment.Development,
    name: validated.APP_NAME || 'document-extraction-api',
    port: validated.APP_PORT ?? 3000,
    apiPrefix: validated.API_PREFIX || 'api',
  };
});
