import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../../config/config.type';
import { ModelMessage } from '../../domain/entities/model-message.entity';
import {
  AuthError,
  ConnectivityError,
  ProviderError,
} from '../../domain/errors/extraction.errors';
import {
  ModelCompletion,
  ModelGatewayPort,
  ModelRequestOptions,
} from '../../domain/ports/model-gateway.port';
import { ProviderProfile, resolveProviderProfile } from './provider-profiles';

/**
 * Model gateway over HTTP (global fetch)
 *
 * Failures are normalized:
 * - network error / timeout -> ConnectivityError
 * - 401 / 403 -> AuthError
 * - other non-2xx, unreadable or malformed body -> ProviderError
 *
 * Never logs credentials or image payloads.
 */
@Injectable()
export class HttpModelGatewayAdapter implements ModelGatewayPort {
  private readonly logger = new Logger(HttpModelGatewayAdapter.name);

  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  async send(
    messages: ModelMessage[],
    modelIdentifier: string,
    options: ModelRequestOptions = {},
  ): Promise<ModelCompletion> {
    const config = this.configService.getOrThrow('documentExtraction', {
      infer: true,
    });

    let profile: ProviderProfile;
    try {
      profile = resolveProviderProfile(modelIdentifier, config.providers);
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`[MODEL] Configuration error: ${errorMessage}`);
      throw error;
    }

    const request = profile.buildRequest(messages, {
      maxTokens: options.maxTokens ?? config.maxTokens,
      completionsCount: options.completionsCount ?? 1,
      responseSchema: options.responseSchema,
    });
    const requestId = randomUUID();
    const startTime = Date.now();

    this.logger.debug(
      `[MODEL Request] POST ${request.url} | Provider: ${profile.provider} | Model: ${profile.model} | Messages: ${messages.length} | Params: ${JSON.stringify(summarizeBody(request.body))} | RequestId: ${requestId}`,
    );

    let response: Response;
    try {
      response = await fetch(request.url, {
        method: 'POST',
        headers: { ...request.headers, 'X-Request-Id': requestId },
        body: JSON.stringify(request.body),
        signal: AbortSignal.timeout(config.requestTimeoutMs),
      });
    } catch (error) {
      const duration = Date.now() - startTime;
      const reason = describeFetchFailure(error, config.requestTimeoutMs);
      this.logger.error(
        `[MODEL Error] ${profile.provider} | Duration: ${duration}ms | RequestId: ${requestId} | Error: ${reason}`,
      );
      throw new ConnectivityError(
        `Could not connect to model server for '${modelIdentifier}': ${reason}. Please ensure the server is running and accessible.`,
        { cause: error },
      );
    }

    const duration = Date.now() - startTime;

    if (response.status === 401 || response.status === 403) {
      this.logger.error(
        `[MODEL Response] ${profile.provider} | Status: ${response.status} | Duration: ${duration}ms | RequestId: ${requestId}`,
      );
      throw new AuthError(
        `Authentication failed for model '${modelIdentifier}' (HTTP ${response.status}). Please check your API key configuration.`,
        response.status,
      );
    }

    if (!response.ok) {
      const providerError = await ProviderError.fromResponse(response, requestId);
      this.logger.error(
        `[MODEL Response] ${profile.provider} | Status: ${response.status} | Duration: ${duration}ms | RequestId: ${requestId} | Error: ${providerError.upstreamBody ?? 'No error details'}`,
      );
      throw providerError;
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new ProviderError({
        message: 'Provider returned a body that is not JSON',
        status: 502,
        requestId,
        cause: error,
      });
    }

    const completion = profile.readCompletion(json);
    if (!completion) {
      this.logger.error(
        `[MODEL Response] ${profile.provider} | Malformed completion envelope | RequestId: ${requestId}`,
      );
      throw new ProviderError({
        message: 'Provider returned a malformed completion',
        status: 502,
        requestId,
        upstreamBody: json,
      });
    }

    this.logger.debug(
      `[MODEL Response] ${profile.provider} | Status: ${response.status} | Duration: ${duration}ms | Choices: ${completion.choices.length} | RequestId: ${requestId}`,
    );
    return completion;
  }
}

// Request parameters without messages (images) for debug logs
function summarizeBody(body: Record<string, unknown>): Record<string, unknown> {
  const summary: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    if (key !== 'messages') {
      summary[key] = value;
    }
  }
  return summary;
}

function describeFetchFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return `request timed out after ${timeoutMs}ms`;
    }
    const cause = error.cause;
    if (cause instanceof Error && cause.message) {
      return `${error.message} (${cause.message})`;
    }
    return error.message;
  }
  return 'Unknown error';
}
