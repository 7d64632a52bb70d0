/**
 * HTTP Error Type
 * Normalized error thrown by HttpClient implementations
 */
export class HttpError extends Error {
  /** HTTP status, absent for network errors and timeouts */
  status?: number;

  /** Low-level error code (e.g. "ECONNREFUSED", "ECONNABORTED", "ETIMEDOUT") */
  code?: string;

  /** True when the request was aborted by the client timeout */
  timedOut: boolean;

  response?: {
    status: number;
    statusText: string;
    data: unknown;
    headers?: Record<string, string | string[]>;
  };

  constructor(
    message: string,
    properties?: {
      status?: number;
      code?: string;
      timedOut?: boolean;
      response?: HttpError['response'];
    }
  ) {
    super(message);
    Object.setPrototypeOf(this, HttpError.prototype);
    this.name = 'HttpError';
    this.status = properties?.status;
    this.code = properties?.code;
    this.timedOut = properties?.timedOut ?? false;
    this.response = properties?.response;
  }
}
