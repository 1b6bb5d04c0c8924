import { registerAs } from '@nestjs/config';
import {
  IsEnum,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
} from 'class-validator';
import { tmpdir } from 'os';
import { join } from 'path';
import { DocumentExtractionConfig } from './document-extraction-config.type';
import { ConfidencePaddingPolicy } from '../domain/enums/confidence-padding-policy.enum';
import validateConfig from '../../utils/validate-config';

class EnvironmentVariablesValidator {
  @IsUrl({ require_tld: false })
  @IsOptional()
  VLM_MODEL_URL?: string;

  @IsString()
  @IsOptional()
  API_KEY?: string;

  @IsString()
  @IsOptional()
  OPENAI_API_KEY?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  OPENAI_API_URL?: string;

  @IsString()
  @IsOptional()
  OPENROUTER_API_KEY?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  OPENROUTER_API_URL?: string;

  @IsString()
  @IsOptional()
  DEFAULT_MODEL?: string;

  @IsInt()
  @Min(64)
  @Max(8192)
  @IsOptional()
  MAX_IMAGE_SIZE?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  MAX_TOKENS?: number;

  @IsInt()
  @Min(1000)
  @IsOptional()
  MODEL_REQUEST_TIMEOUT_MS?: number;

  @IsString()
  @IsOptional()
  TEMP_DIR?: string;

  @IsIn(['true', 'false'])
  @IsOptional()
  CLEANUP_TEMP_FILES?: string;

  @IsEnum(ConfidencePaddingPolicy)
  @IsOptional()
  CONFIDENCE_PADDING_POLICY?: ConfidencePaddingPolicy;
}

// Empty values in .env files mean "unset"
function readEnvironment(): Record<string, string> {
  const environment: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && value !== '') {
      environment[key] = value;
    }
  }
  return environment;
}

export default registerAs<DocumentExtractionConfig>(
  'documentExtraction',
  () => {
    const validated = validateConfig(
      readEnvironment(),
      EnvironmentVariablesValidator,
    );

    return {
      defaultModel:
        validated.DEFAULT_MODEL || 'hosted_vllm/nanonets/Nanonets-OCR-s',
      maxImageSize: validated.MAX_IMAGE_SIZE ?? 1024,
      maxTokens: validated.MAX_TOKENS ?? 5000,
      requestTimeoutMs: validated.MODEL_REQUEST_TIMEOUT_MS ?? 120000,
      confidencePaddingPolicy:
        validated.CONFIDENCE_PADDING_POLICY ??
        ConfidencePaddingPolicy.REPEAT_FIRST,
      providers: {
        selfHosted: {
          baseUrl: validated.VLM_MODEL_URL || '',
          apiKey: validated.API_KEY || 'EMPTY',
        },
        openai: {
          baseUrl: validated.OPENAI_API_URL || 'https://api.openai.com/v1',
          apiKey: validated.OPENAI_API_KEY || '',
        },
        openrouter: {
          baseUrl:
            validated.OPENROUTER_API_URL || 'https://openrouter.ai/api/v1',
          apiKey: validated.OPENROUTER_API_KEY || '',
        },
      },
      tempFiles: {
        directory:
          validated.TEMP_DIR || join(tmpdir(), 'document-extraction'),
        cleanup: validated.CLEANUP_TEMP_FILES !== 'false',
      },
    };
  },
);
