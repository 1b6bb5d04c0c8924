import { ProviderError } from '../errors/extraction.errors';
import { ModelMessage, ResponseSchema } from '../entities/model-message.entity';

export interface ModelRequestOptions {
  maxTokens?: number;
  /** Choices to request (`n`); Ollama always returns one */
  completionsCount?: number;
  /** Structured-output constraint; dropped for providers without support */
  responseSchema?: ResponseSchema;
}

export interface ModelChoice {
  index: number;
  message: {
    role: 'assistant';
    content: string;
  };
  finishReason: string | null;
}

/**
 * Provider completion envelope, normalized to the OpenAI chat shape.
 * Always holds at least one choice.
 */
export interface ModelCompletion {
  id: string;
  model: string;
  choices: ModelChoice[];
}

export interface ModelGatewayPort {
  /**
   * Send a chat request to the model behind `modelIdentifier`
   * (e.g. `hosted_vllm/nanonets/Nanonets-OCR-s`, `ollama/qwen2.5vl`,
   * `openrouter/google/gemma-3-27b-it`, `gpt-4o`).
   *
   * Decoding is deterministic (temperature 0).
   * @throws ConfigurationError | ConnectivityError | AuthError | ProviderError
   */
  send(
    messages: ModelMessage[],
    modelIdentifier: string,
    options?: ModelRequestOptions,
  ): Promise<ModelCompletion>;
}

/**
 * First choice text of a completion
 * @throws ProviderError when the completion has no choices
 */
export function firstChoiceContent(completion: ModelCompletion): string {
  const [choice] = completion.choices;
  if (!choice) {
    throw new ProviderError({
      message: 'Provider returned no choices',
      status: 502,
      requestId: completion.id,
    });
  }
  return choice.message.content;
}
