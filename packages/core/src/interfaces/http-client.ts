/**
 * Standardized HTTP response
 *
 * HttpClient implementations normalize to this shape so provider adapters
 * never need to know which HTTP library is underneath.
 */
export interface HttpResponse<T = unknown> {
  /**
   * HTTP status code (e.g., 200, 404, 500)
   */
  status: number;

  /**
   * Response headers (values are strings or string arrays)
   */
  headers: Record<string, string | string[]>;

  /**
   * Parsed response body (JSON object for JSON responses, string otherwise)
   */
  body: T;
}

/**
 * HttpClient interface
 * Pluggable HTTP client that provider adapters use to make requests.
 *
 * Failed requests (non-2xx, network error, timeout) reject with an HttpError.
 */
export interface HttpClient {
  get<T = unknown>(url: string, config?: HttpClientConfig): Promise<HttpResponse<T>>;

  post<T = unknown>(url: string, data?: unknown, config?: HttpClientConfig): Promise<HttpResponse<T>>;
}

export interface HttpClientConfig {
  /**
   * Request headers to send
   */
  headers?: Record<string, string>;

  /**
   * Request timeout in milliseconds (overrides the client default)
   */
  timeout?: number;
}
