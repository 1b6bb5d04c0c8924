import { ConfidencePaddingPolicy } from '../domain/enums/confidence-padding-policy.enum';

export type DocumentExtractionConfig = {
  defaultModel: string;
  maxImageSize: number;
  maxTokens: number;
  requestTimeoutMs: number;
  confidencePaddingPolicy: ConfidencePaddingPolicy;
  providers: {
    selfHosted: {
      baseUrl: string; // Shared by hosted_vllm/ and ollama/ identifiers
      apiKey: string;
    };
    openai: {
      baseUrl: string;
      apiKey: string;
    };
    openrouter: {
      baseUrl: string;
      apiKey: string;
    };
  };
  tempFiles: {
    directory: string;
    cleanup: boolean;
  };
};
