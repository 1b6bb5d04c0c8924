import { Logger } from '@nestjs/common';
import { DocumentExtractionConfig } from '../../config/document-extraction-config.type';
import {
  ModelMessage,
  ResponseSchema,
  messageText,
} from '../../domain/entities/model-message.entity';
import { ConfigurationError } from '../../domain/errors/extraction.errors';
import {
  ModelChoice,
  ModelCompletion,
} from '../../domain/ports/model-gateway.port';

export enum ModelProvider {
  SELF_HOSTED = 'hosted_vllm',
  OLLAMA = 'ollama',
  OPENROUTER = 'openrouter',
  OPENAI = 'openai',
}

export interface ProviderRequestOptions {
  maxTokens: number;
  completionsCount: number;
  responseSchema?: ResponseSchema;
}

export interface ProviderHttpRequest {
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

/**
 * Request-shaping policy for one family of model endpoints.
 * Built once per model identifier by `resolveProviderProfile`.
 */
export abstract class ProviderProfile {
  abstract readonly provider: ModelProvider;

  constructor(
    /** Model name as the provider knows it (prefix stripped) */
    readonly model: string,
    protected readonly baseUrl: string,
    protected readonly apiKey: string,
  ) {}

  abstract buildRequest(
    messages: ModelMessage[],
    options: ProviderRequestOptions,
  ): ProviderHttpRequest;

  /**
   * Normalize a provider response body to the chat-completion shape
   * @returns null when the body does not have the expected shape
   */
  abstract readCompletion(json: unknown): ModelCompletion | null;

  protected authorizationHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.apiKey}`,
    };
  }
}

/**
 * `/chat/completions` endpoints in the OpenAI wire format
 */
abstract class ChatCompletionsProfile extends ProviderProfile {
  buildRequest(
    messages: ModelMessage[],
    options: ProviderRequestOptions,
  ): ProviderHttpRequest {
    const body: Record<string, unknown> = {
      model: this.model,
      messages,
      max_tokens: options.maxTokens,
      n: options.completionsCount,
      temperature: 0,
    };

    const responseFormat = this.responseFormat(messages, options.responseSchema);
    if (responseFormat) {
      body.response_format = responseFormat;
    }

    return {
      url: `${trimTrailingSlash(this.baseUrl)}/chat/completions`,
      headers: this.authorizationHeaders(),
      body,
    };
  }

  readCompletion(json: unknown): ModelCompletion | null {
    if (!isRecord(json) || !Array.isArray(json.choices)) {
      return null;
    }

    const choices: ModelChoice[] = [];
    for (const [position, choice] of json.choices.entries()) {
      if (!isRecord(choice) || !isRecord(choice.message)) {
        return null;
      }
      const content = choice.message.content;
      if (typeof content !== 'string' && content !== null) {
        return null;
      }
      choices.push({
        index: typeof choice.index === 'number' ? choice.index : position,
        message: { role: 'assistant', content: content ?? '' },
        finishReason:
          typeof choice.finish_reason === 'string' ? choice.finish_reason : null,
      });
    }

    if (choices.length === 0) {
      return null;
    }

    return {
      id: typeof json.id === 'string' ? json.id : '',
      model: typeof json.model === 'string' ? json.model : this.model,
      choices,
    };
  }

  protected abstract responseFormat(
    messages: ModelMessage[],
    schema: ResponseSchema | undefined,
  ): Record<string, unknown> | null;
}

/**
 * vLLM-style OpenAI-compatible server (`hosted_vllm/` identifiers).
 * Guided decoding is not requested.
 */
export class SelfHostedProfile extends ChatCompletionsProfile {
  readonly provider = ModelProvider.SELF_HOSTED;

  protected responseFormat(): null {
    return null;
  }
}

export class OpenRouterProfile extends ChatCompletionsProfile {
  readonly provider = ModelProvider.OPENROUTER;

  protected responseFormat(
    _messages: ModelMessage[],
    schema: ResponseSchema | undefined,
  ): Record<string, unknown> | null {
    if (!schema) {
      return null;
    }
    return {
      type: 'json_schema',
      json_schema: { name: 'extraction', strict: true, schema },
    };
  }
}

/**
 * Hosted OpenAI-compatible APIs. JSON mode is only accepted by the API
 * when the conversation itself asks for JSON.
 */
export class OpenAIProfile extends ChatCompletionsProfile {
  readonly provider = ModelProvider.OPENAI;

  protected responseFormat(
    messages: ModelMessage[],
    schema: ResponseSchema | undefined,
  ): Record<string, unknown> | null {
    if (!schema) {
      return null;
    }
    const mentionsJson = messages.some((message) =>
      messageText(message).toLowerCase().includes('json'),
    );
    return mentionsJson ? { type: 'json_object' } : null;
  }
}

/**
 * Ollama's native chat API: images travel as raw base64 beside the text,
 * structured output goes in `format`. There is no `n`: one choice per call.
 */
export class OllamaProfile extends ProviderProfile {
  readonly provider = ModelProvider.OLLAMA;

  private readonly logger = new Logger(OllamaProfile.name);

  buildRequest(
    messages: ModelMessage[],
    options: ProviderRequestOptions,
  ): ProviderHttpRequest {
    if (options.completionsCount > 1) {
      this.logger.debug(
        `[GATEWAY] Ollama returns a single choice, ignoring completionsCount=${options.completionsCount}`,
      );
    }

    const body: Record<string, unknown> = {
      model: this.model,
      messages: messages.map((message) => toOllamaMessage(message)),
      stream: false,
      options: {
        temperature: 0,
        num_predict: options.maxTokens,
      },
    };
    if (options.responseSchema) {
      body.format = options.responseSchema;
    }

    const base = trimTrailingSlash(this.baseUrl).replace(/\/v1$/, '');
    return {
      url: `${base}/api/chat`,
      headers: this.authorizationHeaders(),
      body,
    };
  }

  readCompletion(json: unknown): ModelCompletion | null {
    if (!isRecord(json) || !isRecord(json.message)) {
      return null;
    }
    const content = json.message.content;
    if (typeof content !== 'string') {
      return null;
    }

    return {
      id: typeof json.created_at === 'string' ? json.created_at : '',
      model: typeof json.model === 'string' ? json.model : this.model,
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content },
          finishReason:
            typeof json.done_reason === 'string' ? json.done_reason : null,
        },
      ],
    };
  }
}

function toOllamaMessage(message: ModelMessage): Record<string, unknown> {
  if (typeof message.content === 'string') {
    return { role: message.role, content: message.content };
  }

  const images = message.content.flatMap((block) =>
    block.type === 'image_url'
      ? [block.image_url.url.replace(/^data:[^,]*,/, '')]
      : [],
  );
  const ollamaMessage: Record<string, unknown> = {
    role: message.role,
    content: messageText(message),
  };
  if (images.length > 0) {
    ollamaMessage.images = images;
  }
  return ollamaMessage;
}

/**
 * Pick the provider profile for a model identifier
 *
 * - `hosted_vllm/<model>` and `ollama/<model>` need VLM_MODEL_URL
 * - `openrouter/<model>` needs OPENROUTER_API_KEY
 * - `openai/<model>` or a bare name (`gpt-4o`) goes to the OpenAI-compatible
 *   API and needs OPENAI_API_KEY
 *
 * @throws ConfigurationError
 */
export function resolveProviderProfile(
  modelIdentifier: string,
  providers: DocumentExtractionConfig['providers'],
): ProviderProfile {
  const identifier = modelIdentifier.trim();
  if (!identifier) {
    throw new ConfigurationError('Model identifier is empty');
  }

  const [prefix, ...rest] = identifier.split('/');
  const model = rest.join('/');

  switch (prefix) {
    case ModelProvider.SELF_HOSTED:
    case ModelProvider.OLLAMA: {
      const { baseUrl, apiKey } = providers.selfHosted;
      if (!baseUrl) {
        throw new ConfigurationError(
          `VLM_MODEL_URL is required for model '${identifier}'. Set it to the URL of your VLM/Ollama server (e.g. 'http://localhost:8000/v1').`,
        );
      }
      return prefix === ModelProvider.OLLAMA
        ? new OllamaProfile(model, baseUrl, apiKey)
        : new SelfHostedProfile(model, baseUrl, apiKey);
    }
    case ModelProvider.OPENROUTER: {
      const { baseUrl, apiKey } = providers.openrouter;
      if (!apiKey) {
        throw new ConfigurationError(
          `OPENROUTER_API_KEY is required for model '${identifier}'`,
        );
      }
      return new OpenRouterProfile(model, baseUrl, apiKey);
    }
    default: {
      const { baseUrl, apiKey } = providers.openai;
      if (!apiKey) {
        throw new ConfigurationError(
          `OPENAI_API_KEY is required for model '${identifier}'`,
        );
      }
      return new OpenAIProfile(
        prefix === ModelProvider.OPENAI ? model : identifier,
        baseUrl,
        apiKey,
      );
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
