/**
 * Error types surfaced by the sample server
 *
 * Each error carries the HTTP status the error middleware answers with.
 * Anything that is not an HttpError is reported as a 500.
 */

export class HttpError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/**
 * Thrown at startup when required environment variables are missing or invalid
 */
export class ConfigurationError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}

export class MissingParameterError extends HttpError {
  readonly parameter: string;

  constructor(parameter: string) {
    super(`Missing required query parameter: ${parameter}`, 400);
    this.parameter = parameter;
  }
}

/**
 * The token endpoint could not be reached or answered with a non-2xx status
 */
export class TokenExchangeError extends HttpError {
  readonly upstreamStatus?: number;

  constructor(message: string, upstreamStatus?: number) {
    super(message, 502);
    this.upstreamStatus = upstreamStatus;
  }
}

/**
 * A downstream data API could not be reached or answered with a non-2xx status
 */
export class RiotApiError extends HttpError {
  readonly upstreamStatus?: number;
  readonly url: string;

  constructor(message: string, url: string, upstreamStatus?: number) {
    super(message, 502);
    this.url = url;
    this.upstreamStatus = upstreamStatus;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
