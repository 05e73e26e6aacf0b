// Errors raised by the model and Slack clients
export type ExternalService = 'llm' | 'slack';

export class ExternalServiceError extends Error {
  constructor(
    message: string,
    public readonly service: ExternalService,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExternalServiceError';
  }
}

export class AuthError extends ExternalServiceError {
  constructor(message: string, service: ExternalService, options?: { cause?: unknown }) {
    super(message, service, options);
    this.name = 'AuthError';
  }
}

export class RateLimitError extends ExternalServiceError {
  constructor(
    message: string,
    service: ExternalService,
    public readonly retryAfter?: number,
    options?: { cause?: unknown }
  ) {
    super(message, service, options);
    this.name = 'RateLimitError';
  }
}

export class TimeoutError extends ExternalServiceError {
  constructor(message: string, service: ExternalService, options?: { cause?: unknown }) {
    super(message, service, options);
    this.name = 'TimeoutError';
  }
}

export class MalformedResponseError extends ExternalServiceError {
  constructor(message: string, service: ExternalService, options?: { cause?: unknown }) {
    super(message, service, options);
    this.name = 'MalformedResponseError';
  }
}

export class ChannelNotFoundError extends ExternalServiceError {
  constructor(
    message: string,
    public readonly channel: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'slack', options);
    this.name = 'ChannelNotFoundError';
  }
}

export class PermissionError extends ExternalServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'slack', options);
    this.name = 'PermissionError';
  }
}

export class PayloadTooLargeError extends ExternalServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'slack', options);
    this.name = 'PayloadTooLargeError';
  }
}

export class UpstreamError extends ExternalServiceError {
  constructor(message: string, service: ExternalService, options?: { cause?: unknown }) {
    super(message, service, options);
    this.name = 'UpstreamError';
  }
}

// Pipeline errors, one per failing step
export type BridgeErrorKind =
  | 'validation'
  | 'context_fetch_failed'
  | 'completion_failed'
  | 'delivery_failed';

export abstract class BridgeError extends Error {
  abstract readonly kind: BridgeErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ValidationError extends BridgeError {
  readonly kind = 'validation';

  constructor(public readonly issues: string[]) {
    super(`Invalid request: ${issues.join('; ')}`);
    this.name = 'ValidationError';
  }
}

export class ContextFetchError extends BridgeError {
  readonly kind = 'context_fetch_failed';

  constructor(
    public readonly channel: string,
    public readonly cause: ExternalServiceError
  ) {
    super(`Failed to fetch context from ${channel}: ${cause.message}`, { cause });
    this.name = 'ContextFetchError';
  }
}

export class CompletionError extends BridgeError {
  readonly kind = 'completion_failed';

  constructor(
    public readonly model: string,
    public readonly cause: ExternalServiceError
  ) {
    super(`Completion with ${model} failed: ${cause.message}`, { cause });
    this.name = 'CompletionError';
  }
}

export class DeliveryError extends BridgeError {
  readonly kind = 'delivery_failed';

  constructor(
    public readonly chunk: number,
    public readonly chunksTotal: number,
    public readonly cause: ExternalServiceError
  ) {
    super(`chunk ${chunk}/${chunksTotal} failed: ${cause.message}`, { cause });
    this.name = 'DeliveryError';
  }
}

/**
 * HTTP status for a failed ask. Rate limits and timeouts in the wrapped
 * client error win over the step's default.
 */
export function statusCodeFor(error: BridgeError): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof ContextFetchError || error instanceof CompletionError) {
    if (error.cause instanceof RateLimitError) return 429;
    if (error.cause instanceof TimeoutError) return 504;
    return 502;
  }
  return 500;
}
