/**
 * Extraction error taxonomy
 *
 * ValidationError is the only kind that leaves DocumentExtractionService.extract:
 * it marks caller misuse (bad schema, unsupported or missing files). Every other
 * kind is caught at the field/table path boundary and turned into an empty,
 * correctly shaped table.
 *
 * Messages never include API keys or image payloads.
 */
export enum ExtractionErrorKind {
  VALIDATION = 'ValidationError',
  CONFIGURATION = 'ConfigurationError',
  CONNECTIVITY = 'ConnectivityError',
  AUTH = 'AuthError',
  PROVIDER = 'ProviderError',
  PARSE = 'ParseError',
  PREPARATION = 'DocumentPreparationError',
}

export abstract class ExtractionError extends Error {
  abstract readonly kind: ExtractionErrorKind;

  readonly timestamp: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date().toISOString();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.kind,
      message: this.message,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Malformed schema or input files. Raised before any network call.
 */
export class ValidationError extends ExtractionError {
  readonly kind = ExtractionErrorKind.VALIDATION;

  /**
   * Offending entries, keyed by path (e.g. `fields[1].name`)
   */
  readonly details: Record<string, string>;

  constructor(message: string, details: Record<string, string> = {}) {
    super(message);
    this.details = details;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), details: this.details };
  }
}

/**
 * A required setting (endpoint, credential) is missing
 */
export class ConfigurationError extends ExtractionError {
  readonly kind = ExtractionErrorKind.CONFIGURATION;
}

/**
 * Model endpoint unreachable, refused the connection or timed out
 */
export class ConnectivityError extends ExtractionError {
  readonly kind = ExtractionErrorKind.CONNECTIVITY;
}

/**
 * Credential rejected by the provider (HTTP 401/403)
 */
export class AuthError extends ExtractionError {
  readonly kind = ExtractionErrorKind.AUTH;

  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.status = status;
  }
}

/**
 * Any other upstream failure: non-2xx status, unreadable or malformed
 * completion envelope.
 */
export class ProviderError extends ExtractionError {
  readonly kind = ExtractionErrorKind.PROVIDER;

  /**
   * HTTP status from the provider (502 when no response was readable)
   */
  readonly status: number;

  readonly requestId: string;

  /**
   * Truncated, sanitized upstream body (max 200 chars)
   */
  readonly upstreamBody: string | null;

  constructor(params: {
    message: string;
    status: number;
    requestId: string;
    upstreamBody?: unknown;
    cause?: unknown;
  }) {
    super(params.message, { cause: params.cause });
    this.status = params.status;
    this.requestId = params.requestId;
    this.upstreamBody = ProviderError.sanitizeBody(params.upstreamBody);
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      status: this.status,
      requestId: this.requestId,
    };
  }

  /**
   * Build from a non-OK fetch Response
   */
  static async fromResponse(
    response: Response,
    requestId: string,
  ): Promise<ProviderError> {
    let body: string;
    try {
      body = await response.text();
    } catch {
      body = '';
    }

    let message = `Provider error: ${response.status} ${response.statusText}`;
    try {
      const json: unknown = JSON.parse(body);
      const detail = ProviderError.readErrorMessage(json);
      if (detail) {
        message = `Provider error: ${response.status} ${detail}`;
      }
    } catch {
      // Non-JSON body: keep the status line
    }

    return new ProviderError({
      message,
      status: response.status,
      requestId,
      upstreamBody: body,
    });
  }

  private static readErrorMessage(json: unknown): string | null {
    if (!json || typeof json !== 'object') {
      return null;
    }
    const error = 'error' in json ? json.error : undefined;
    if (typeof error === 'string') {
      return error;
    }
    if (error && typeof error === 'object' && 'message' in error) {
      return typeof error.message === 'string' ? error.message : null;
    }
    const message = 'message' in json ? json.message : undefined;
    return typeof message === 'string' ? message : null;
  }

  /**
   * Drop credentials and inline images, truncate to 200 characters
   */
  private static sanitizeBody(body: unknown): string | null {
    if (body === undefined || body === null || body === '') {
      return null;
    }

    const text = typeof body === 'string' ? body : JSON.stringify(body);
    return text
      .replace(/data:image\/[a-z+.-]+;base64,[A-Za-z0-9+/=]+/g, '[IMAGE]')
      .replace(
        /("(?:api_?key|authorization|token|secret)"\s*:\s*)"[^"]*"/gi,
        '$1"[REDACTED]"',
      )
      .replace(/Bearer\s+[^\s"]+/g, 'Bearer [REDACTED]')
      .substring(0, 200);
  }
}

/**
 * Model output could not be interpreted as an object or a markdown table
 */
export class ParseError extends ExtractionError {
  readonly kind = ExtractionErrorKind.PARSE;

  /**
   * First 200 characters of the text that failed to parse
   */
  readonly excerpt: string;

  constructor(message: string, text: string, options?: { cause?: unknown }) {
    super(message, options);
    this.excerpt = text.substring(0, 200);
  }
}

/**
 * Rasterizing or resizing an input document failed
 */
export class DocumentPreparationError extends ExtractionError {
  readonly kind = ExtractionErrorKind.PREPARATION;

  readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.filePath = filePath;
  }
}
