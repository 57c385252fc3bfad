/**
 * HTTP transport used by the Snyk client.
 *
 * The client only depends on the HttpTransport function type; fetchTransport is
 * the production implementation and tests substitute their own.
 */

export type HttpMethod = 'GET' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  /** Header names are lower-cased */
  headers: Record<string, string>;
  text: string;
}

/** Resolves for every HTTP status; rejects only when no response was received */
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

export function fetchTransport(timeoutMs = 30_000): HttpTransport {
  return async (request) => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return { status: response.status, headers, text: await response.text() };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Request timed out after ${timeoutMs}ms: ${request.method} ${request.url}`);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  };
}
