import { Logger } from '@nestjs/common';
import { ConfigurationError } from '../../domain/errors/extraction.errors';
import {
  ModelMessage,
  ResponseSchema,
} from '../../domain/entities/model-message.entity';
import { buildDocumentExtractionConfig } from '../../testing/document-extraction-config.fixture';
import {
  ModelProvider,
  OllamaProfile,
  OpenAIProfile,
  OpenRouterProfile,
  resolveProviderProfile,
} from './provider-profiles';

describe('resolveProviderProfile', () => {
  const providers = buildDocumentExtractionConfig().providers;

  it('should route identifiers by prefix', () => {
    expect(resolveProviderProfile('hosted_vllm/qwen', providers).provider).toBe(
      ModelProvider.SELF_HOSTED,
    );
    expect(resolveProviderProfile('ollama/llava', providers).provider).toBe(
      ModelProvider.OLLAMA,
    );
    expect(
      resolveProviderProfile('openrouter/qwen/qwen2.5-vl', providers).provider,
    ).toBe(ModelProvider.OPENROUTER);
    expect(resolveProviderProfile('gpt-4o', providers).provider).toBe(
      ModelProvider.OPENAI,
    );
  });

  it('should keep slashes after the prefix in the model name', () => {
    expect(
      resolveProviderProfile('openrouter/qwen/qwen2.5-vl', providers).model,
    ).toBe('qwen/qwen2.5-vl');
  });

  it('should strip only the openai prefix from bare names', () => {
    expect(resolveProviderProfile('openai/gpt-4o', providers).model).toBe(
      'gpt-4o',
    );
    expect(resolveProviderProfile('gpt-4o-mini', providers).model).toBe(
      'gpt-4o-mini',
    );
  });

  it('should require VLM_MODEL_URL for self-hosted models', () => {
    const withoutUrl = {
      ...providers,
      selfHosted: { baseUrl: '', apiKey: 'EMPTY' },
    };

    expect(() => resolveProviderProfile('ollama/llava', withoutUrl)).toThrow(
      ConfigurationError,
    );
    expect(() => resolveProviderProfile('ollama/llava', withoutUrl)).toThrow(
      "VLM_MODEL_URL is required for model 'ollama/llava'",
    );
  });

  it('should require API keys for hosted providers', () => {
    const withoutKeys = {
      ...providers,
      openai: { ...providers.openai, apiKey: '' },
      openrouter: { ...providers.openrouter, apiKey: '' },
    };

    expect(() => resolveProviderProfile('gpt-4o', withoutKeys)).toThrow(
      "OPENAI_API_KEY is required for model 'gpt-4o'",
    );
    expect(() => resolveProviderProfile('openrouter/x', withoutKeys)).toThrow(
      "OPENROUTER_API_KEY is required for model 'openrouter/x'",
    );
  });

  it('should reject an empty identifier', () => {
    expect(() => resolveProviderProfile('  ', providers)).toThrow(
      'Model identifier is empty',
    );
  });
});

describe('provider request shapes', () => {
  const messages: ModelMessage[] = [
    {
      role: 'user',
      content: [
        { type: 'text', text: 'Return JSON only.' },
        { type: 'image_url', image_url: { url: 'data:image/jpeg;base64,AAAA' } },
      ],
    },
  ];

  it('should send images beside the text for Ollama', () => {
    const profile = new OllamaProfile('llava', 'http://localhost:11434/v1/', '');

    const request = profile.buildRequest(messages, {
      maxTokens: 100,
      completionsCount: 1,
    });

    expect(request.url).toBe('http://localhost:11434/api/chat');
    expect(request.body).toEqual({
      model: 'llava',
      messages: [
        { role: 'user', content: 'Return JSON only.', images: ['AAAA'] },
      ],
      stream: false,
      options: { temperature: 0, num_predict: 100 },
    });
  });

  it('should note that Ollama ignores extra completions', () => {
    const debugSpy = jest
      .spyOn(Logger.prototype, 'debug')
      .mockImplementation(() => undefined);
    const profile = new OllamaProfile('llava', 'http://localhost:11434', '');

    const request = profile.buildRequest(messages, {
      maxTokens: 100,
      completionsCount: 3,
    });

    expect(request.body).not.toHaveProperty('n');
    expect(debugSpy).toHaveBeenCalledWith(
      '[GATEWAY] Ollama returns a single choice, ignoring completionsCount=3',
    );
    debugSpy.mockRestore();
  });

  it('should request JSON mode only when the prompt mentions JSON', () => {
    const profile = new OpenAIProfile('gpt-4o', 'https://api.openai.test/v1', 'test-secret');
    const schema: ResponseSchema = {
      type: 'object',
      properties: { total: { type: 'string' } },
      required: ['total'],
      additionalProperties: false,
    };

    const withJson = profile.buildRequest(messages, {
      maxTokens: 10,
      completionsCount: 1,
      responseSchema: schema,
    });
    const withoutJson = profile.buildRequest(
      [{ role: 'user', content: 'Describe the page' }],
      { maxTokens: 10, completionsCount: 1, responseSchema: schema },
    );

    expect(withJson.body.response_format).toEqual({ type: 'json_object' });
    expect(withoutJson.body).not.toHaveProperty('response_format');
  });

  it('should send a strict json_schema to OpenRouter', () => {
    const profile = new OpenRouterProfile(
      'openai/gpt-4o',
      'https://openrouter.test/api/v1',
      'test-secret',
    );
    const schema: ResponseSchema = {
      type: 'object',
      properties: { total: { type: 'string' }, date: { type: 'string' } },
      required: ['total', 'date'],
      additionalProperties: false,
    };

    const request = profile.buildRequest(messages, {
      maxTokens: 10,
      completionsCount: 1,
      responseSchema: schema,
    });

    expect(request.url).toBe('https://openrouter.test/api/v1/chat/completions');
    expect(request.body.response_format).toEqual({
      type: 'json_schema',
      json_schema: {
        name: 'extraction',
        strict: true,
        schema: {
          type: 'object',
          properties: { total: { type: 'string' }, date: { type: 'string' } },
          required: ['total', 'date'],
          additionalProperties: false,
        },
      },
    });
  });

  it('should return null for malformed completions', () => {
    const profile = new OpenAIProfile('gpt-4o', 'https://api.openai.test/v1', 'test-secret');

    expect(profile.readCompletion({ choices: [] })).toBeNull();
    expect(profile.readCompletion({ choices: [{ message: 'text' }] })).toBeNull();
    expect(profile.readCompletion('oops')).toBeNull();
  });
});
