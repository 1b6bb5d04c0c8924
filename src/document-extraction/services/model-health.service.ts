import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../config/config.type';
import { ModelGatewayPort } from '../domain/ports/model-gateway.port';

export interface ModelHealthResult {
  model: string;
  available: boolean;
  responseTimeMs: number;
  error?: string;
  timestamp: string;
}

/**
 * Checks that a model identifier resolves and answers, using a one-token
 * request through the model gateway
 */
@Injectable()
export class ModelHealthService {
  private readonly logger = new Logger(ModelHealthService.name);

  constructor(
    @Inject('ModelGatewayPort')
    private readonly modelGateway: ModelGatewayPort,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async checkModel(model?: string): Promise<ModelHealthResult> {
    const modelIdentifier =
      model?.trim() ||
      this.configService.getOrThrow('documentExtraction.defaultModel', {
        infer: true,
      });
    const startTime = Date.now();

    try {
      await this.modelGateway.send(
        [{ role: 'user', content: 'Hello' }],
        modelIdentifier,
        { maxTokens: 1 },
      );

      const responseTimeMs = Date.now() - startTime;
      this.logger.log(
        `[MODEL Health] ${modelIdentifier} is available | Response Time: ${responseTimeMs}ms`,
      );
      return {
        model: modelIdentifier,
        available: true,
        responseTimeMs,
        timestamp: new Date().toISOString(),
      };
    } catch (error) {
      const responseTimeMs = Date.now() - startTime;
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(
        `[MODEL Health] ${modelIdentifier} is not available: ${errorMessage}`,
      );
      return {
        model: modelIdentifier,
        available: false,
        responseTimeMs,
        error: errorMessage,
        timestamp: new Date().toISOString(),
      };
    }
  }
}
