/**
 * Error types raised while building instance statuses.
 *
 * Every class carries the HTTP status code the API answers with; the Hono
 * error handler and the CLI both read it through `getStatusCode`.
 */

export class StatusError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = 'StatusError';
  }
}

/** Unknown instance type, unresolvable locations, unreadable config files */
export class ConfigurationError extends StatusError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ConfigurationError';
  }
}

export class NotFoundError extends StatusError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

/** The instance type has no mesh status at all */
export class MeshNotSupportedError extends StatusError {
  constructor(instanceType: string) {
    super(`Mesh status not supported for instance type '${instanceType}'`, 405);
    this.name = 'MeshNotSupportedError';
  }
}

/** The instance type has mesh status, but this instance is not registered */
export class MeshNotConfiguredError extends StatusError {
  constructor(service: string, instance: string) {
    super(`${service}.${instance} is not configured for the service mesh`, 405);
    this.name = 'MeshNotConfiguredError';
  }
}

function readStatusCode(value: unknown): number | undefined {
  if (value && typeof value === 'object' && 'statusCode' in value) {
    const code = value.statusCode;
    return typeof code === 'number' ? code : undefined;
  }
  return undefined;
}

/**
 * Status code of an error, whether it is one of ours or a Kubernetes
 * client HttpError (which keeps it on `statusCode` or `response.statusCode`).
 */
export function getStatusCode(error: unknown): number | undefined {
  const direct = readStatusCode(error);
  if (direct !== undefined) {
    return direct;
  }
  if (error && typeof error === 'object' && 'response' in error) {
    return readStatusCode(error.response);
  }
  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return getStatusCode(error) === 404;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
