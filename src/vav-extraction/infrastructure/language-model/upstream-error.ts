const SENSITIVE_FIELDS = [
  'key',
  'apiKey',
  'api_key',
  'x-goog-api-key',
  'authorization',
  'token',
  'access_token',
  'secret',
  'password',
];

/**
 * UpstreamError - Normalized error for language model API failures
 *
 * Never carries the API key; bodies are sanitized and truncated.
 */
export class UpstreamError extends Error {
  /**
   * HTTP status code from upstream response (or 502 for network errors)
   */
  readonly status: number;

  /**
   * Correlation ID for request tracing
   */
  readonly requestId: string;

  readonly upstreamPath: string;

  /**
   * Truncated, sanitized request body (max 200 chars)
   */
  readonly upstreamBody: string | null;

  readonly timestamp: string;

  constructor(params: {
    status: number;
    message: string;
    requestId: string;
    upstreamPath: string;
    upstreamBody?: unknown;
  }) {
    super(params.message);
    this.name = 'UpstreamError';
    this.status = params.status;
    this.requestId = params.requestId;
    this.upstreamPath = params.upstreamPath;
    this.timestamp = new Date().toISOString();
    this.upstreamBody = UpstreamError.sanitizeBody(params.upstreamBody);

    Object.setPrototypeOf(this, UpstreamError.prototype);
  }

  private static sanitizeBody(body: unknown): string | null {
    if (body === undefined || body === null || body === '') {
      return null;
    }

    let parsed: unknown = body;
    if (typeof body === 'string') {
      try {
        parsed = JSON.parse(body);
      } catch {
        return body.substring(0, 200);
      }
    }
    if (typeof parsed !== 'object' || parsed === null) {
      return String(parsed).substring(0, 200);
    }

    try {
      const sanitized: Record<string, unknown> = Object.fromEntries(
        Object.entries(parsed),
      );
      for (const field of SENSITIVE_FIELDS) {
        for (const variant of [field, field.toLowerCase()]) {
          if (variant in sanitized) {
            sanitized[variant] = '[REDACTED]';
          }
        }
      }
      return JSON.stringify(sanitized).substring(0, 200);
    } catch {
      return '[Unable to serialize body]';
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      error: 'UpstreamError',
      message: this.message,
      status: this.status,
      requestId: this.requestId,
      upstreamPath: this.upstreamPath,
      timestamp: this.timestamp,
    };
  }

  /**
   * Create UpstreamError from a fetch Response.
   * Understands the `{ error: { message } }` envelope of Google APIs.
   */
  static async fromResponse(
    response: Response,
    requestId: string,
    upstreamPath: string,
    requestBody?: unknown,
  ): Promise<UpstreamError> {
    let message = `Upstream error: ${response.status} ${response.statusText}`.trim();
    try {
      const json: unknown = JSON.parse(await response.text());
      const detail = UpstreamError.errorMessageOf(json);
      if (detail) {
        message = detail;
      }
    } catch {
      // body is not JSON, keep the status line
    }

    return new UpstreamError({
      status: response.status,
      message,
      requestId,
      upstreamPath,
      upstreamBody: requestBody,
    });
  }

  static fromNetworkError(
    error: Error,
    requestId: string,
    upstreamPath: string,
    requestBody?: unknown,
  ): UpstreamError {
    return new UpstreamError({
      status: 502, // Bad Gateway for network errors
      message: `Network error: ${error.message}`,
      requestId,
      upstreamPath,
      upstreamBody: requestBody,
    });
  }

  private static errorMessageOf(json: unknown): string | null {
    if (typeof json !== 'object' || json === null) {
      return null;
    }
    if ('error' in json) {
      const { error } = json;
      if (typeof error === 'string') {
        return error;
      }
      if (
        typeof error === 'object' &&
        error !== null &&
        'message' in error &&
        typeof error.message === 'string'
      ) {
        return error.message;
      }
    }
    if ('message' in json && typeof json.message === 'string') {
      return json.message;
    }
    return null;
  }
}
