/**
 * Shared API Client for the fleetstat status API
 *
 * One client talks to the status API of one cluster.
 *
 * Usage:
 * ```typescript
 * const client = createApiClient({ baseUrl: 'http://fleetstat.norcal-prod.example:5054' });
 * const status = await client.instances.status('web', 'main', { useNew: true });
 * ```
 */

export interface ApiClientConfig {
  /** Status API of one cluster, e.g. 'http://localhost:5054' */
  baseUrl: string;

  /** Replaces global fetch; tests route requests straight into an app */
  fetchImpl?: typeof fetch;
}

/**
 * A non-2xx answer from the status API. `message` is the API's own error
 * message; `reason` is the HTTP reason phrase, empty when the transport
 * carries none.
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public reason = ''
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

function readErrorMessage(body: unknown): string | undefined {
  if (!body || typeof body !== 'object') {
    return undefined;
  }
  if ('error' in body && body.error && typeof body.error === 'object') {
    const error = body.error;
    if ('message' in error && typeof error.message === 'string') {
      return error.message;
    }
  }
  if ('message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return undefined;
}

/**
 * JSON request against `<baseUrl>/api<endpoint>`
 * @throws ApiError when the API answers with a non-2xx status
 */
export function createRequestFn(config: ApiClientConfig) {
  const fetchFn = config.fetchImpl || fetch;

  return async function request<T>(endpoint: string, options?: RequestInit): Promise<T> {
    const response = await fetchFn(`${config.baseUrl}/api${endpoint}`, {
      ...options,
      headers: { 'Content-Type': 'application/json', ...(options?.headers || {}) },
    });

    if (!response.ok) {
      let message: string;
      try {
        const body: unknown = await response.json();
        message = readErrorMessage(body) || `Request failed with status ${response.status}`;
      } catch {
        // empty or non-JSON body
        message = `Request failed with status ${response.status}: ${response.statusText || 'No response body'}`;
      }
      throw new ApiError(response.status, message, response.statusText);
    }

    return response.json();
  };
}

export type RequestFn = ReturnType<typeof createRequestFn>;
