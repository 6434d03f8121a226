/**
 * Kubernetes API error handling
 *
 * The transport rejects non-2xx responses with {@link KubernetesApiResponseError}.
 * The helpers below also accept errors raised by @kubernetes/client-node, which
 * carry the status code in different places depending on the client version.
 */

import { type } from 'arktype';
import { ResourceApiError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';

const logger = getComponentLogger('kubernetes-errors');

/**
 * The `Status` object the API server returns with failed requests
 */
export interface KubernetesStatus {
  kind?: string;
  status?: string;
  code?: number;
  message?: string;
  reason?: string;
  details?: unknown;
}

const KubernetesStatusSchema = type({
  'kind?': 'string',
  'status?': 'string',
  'code?': 'number',
  'message?': 'string',
  'reason?': 'string',
  'details?': 'unknown',
});

/**
 * Decode a response body as a `Status`; undefined when it is not one
 */
export function parseStatus(body: Uint8Array): KubernetesStatus | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(body).toString('utf-8'));
  } catch {
    return undefined;
  }
  const result = KubernetesStatusSchema(parsed);
  return result instanceof type.errors ? undefined : result;
}

export class KubernetesApiResponseError extends ResourceApiError {
  constructor(
    public readonly statusCode: number,
    public readonly method: string,
    public readonly uri: string,
    public readonly body?: KubernetesStatus
  ) {
    super(
      `${method} ${uri} failed with ${statusCode}${body?.message ? `: ${body.message}` : ''}`,
      'KUBERNETES_API_ERROR',
      { statusCode, method, uri, reason: body?.reason }
    );
    this.name = 'KubernetesApiResponseError';
  }
}

function numberAt(value: unknown, key: string): number | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

function objectAt(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

/**
 * Extract the HTTP status code from an API error.
 *
 * Looks at, in order: `statusCode`, `code` (client-node 1.x ApiException),
 * `response.statusCode` and `body.code`.
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  if (error instanceof KubernetesApiResponseError) {
    return error.statusCode;
  }
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }

  const statusCode =
    numberAt(error, 'statusCode') ??
    numberAt(error, 'code') ??
    numberAt(objectAt(error, 'response'), 'statusCode') ??
    numberAt(objectAt(error, 'body'), 'code');

  if (statusCode === undefined) {
    logger.debug('Could not extract status code from error', {
      errorKeys: Object.keys(error),
    });
  }

  return statusCode;
}

export function isNotFoundError(error: unknown): boolean {
  return getErrorStatusCode(error) === 404;
}

/**
 * 409: the object already exists, or a resourceVersion precondition failed
 */
export function isConflictError(error: unknown): boolean {
  return getErrorStatusCode(error) === 409;
}

export function isUnauthorizedError(error: unknown): boolean {
  return getErrorStatusCode(error) === 401;
}

export function isForbiddenError(error: unknown): boolean {
  return getErrorStatusCode(error) === 403;
}

/**
 * Format an API error into a single line, e.g.
 * `Kubernetes API error (404): NotFound: foos.clux.dev "baz" not found`
 */
export function formatKubernetesError(error: unknown): string {
  if (typeof error !== 'object' || error === null) {
    return String(error);
  }

  const statusCode = getErrorStatusCode(error);
  const parts: string[] = [
    statusCode !== undefined ? `Kubernetes API error (${statusCode})` : 'Kubernetes API error',
  ];

  if (error instanceof KubernetesApiResponseError) {
    if (error.body?.reason) {
      parts.push(error.body.reason);
    }
    parts.push(error.body?.message ?? error.message);
    return parts.join(': ');
  }

  if (error instanceof Error) {
    parts.push(error.message);
  }
  return parts.join(': ');
}
