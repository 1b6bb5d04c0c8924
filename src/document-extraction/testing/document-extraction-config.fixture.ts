import { ConfigService } from '@nestjs/config';
import { tmpdir } from 'os';
import { join } from 'path';
import { AllConfigType } from '../../config/config.type';
import { DocumentExtractionConfig } from '../config/document-extraction-config.type';
import { ConfidencePaddingPolicy } from '../domain/enums/confidence-padding-policy.enum';

export function buildDocumentExtractionConfig(
  overrides: Partial<DocumentExtractionConfig> = {},
): DocumentExtractionConfig {
  return {
    defaultModel: 'hosted_vllm/test-model',
    maxImageSize: 1024,
    maxTokens: 5000,
    requestTimeoutMs: 1000,
    confidencePaddingPolicy: ConfidencePaddingPolicy.REPEAT_FIRST,
    providers: {
      selfHosted: { baseUrl: 'http://localhost:8000/v1', apiKey: 'EMPTY' },
      openai: { baseUrl: 'https://api.openai.test/v1', apiKey: 'test-secret' },
      openrouter: {
        baseUrl: 'https://openrouter.test/api/v1',
        apiKey: 'test-secret',
      },
    },
    tempFiles: {
      directory: join(tmpdir(), 'document-extraction-test'),
      cleanup: true,
    },
    ...overrides,
  };
}

/**
 * Real ConfigService over an in-memory `documentExtraction` namespace
 */
export function createConfigService(
  config: DocumentExtractionConfig = buildDocumentExtractionConfig(),
): ConfigService<AllConfigType> {
  return new ConfigService<AllConfigType>({ documentExtraction: config });
}
