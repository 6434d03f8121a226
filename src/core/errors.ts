/**
 * Error types for resource definition and request synthesis.
 *
 * Every failure raised by this library is a programming-contract violation:
 * the caller passed an identity or request parameters that can never produce a
 * valid request. They are thrown immediately and never retried.
 */

import type { ArkErrors } from 'arktype';

export class ResourceApiError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ResourceApiError';
  }
}

/**
 * Raised when a resource identity (kind, group, version, namespace) is malformed
 * or incomplete.
 */
export class ResourceDefinitionError extends ResourceApiError {
  constructor(
    message: string,
    public readonly resourceKind: string,
    public readonly field?: string,
    public readonly suggestions?: string[]
  ) {
    super(message, 'RESOURCE_DEFINITION_ERROR', {
      resourceKind,
      field,
      suggestions,
    });
    this.name = 'ResourceDefinitionError';
  }
}

/**
 * Raised when a request cannot be synthesized from the given descriptor,
 * verb and parameters.
 */
export class RequestSpecError extends ResourceApiError {
  constructor(
    message: string,
    public readonly verb: string,
    public readonly parameter?: string,
    public readonly suggestions?: string[]
  ) {
    super(message, 'REQUEST_SPEC_ERROR', {
      verb,
      parameter,
      suggestions,
    });
    this.name = 'RequestSpecError';
  }
}

/**
 * Format arktype validation errors for a resource identity.
 */
export function formatArktypeError(errors: ArkErrors, resourceKind: string): ResourceDefinitionError {
  const problems = [...errors];
  const first = problems[0];

  if (!first) {
    return new ResourceDefinitionError(
      `Invalid identity for ${resourceKind}: ${errors.summary}`,
      resourceKind,
      undefined,
      ['Check kind, group, version and namespace']
    );
  }

  const fieldPath = first.path.length > 0 ? first.path.join('.') : 'root';
  let message = `Invalid identity for ${resourceKind} at field '${fieldPath}':`;
  message += `\n  Expected: ${first.expected}`;
  message += `\n  Received: ${first.actual}`;

  const suggestions: string[] = [];
  if (first.code === 'required') {
    suggestions.push(`Set '${fieldPath}' before building the ${resourceKind} descriptor`);
  } else {
    suggestions.push(`Change '${fieldPath}' to be ${first.expected}`);
  }

  if (problems.length > 1) {
    message += `\n\nAdditional validation errors:`;
    problems.slice(1).forEach((problem, index) => {
      const path = problem.path.length > 0 ? problem.path.join('.') : 'root';
      message += `\n  ${index + 2}. ${path}: ${problem.message}`;
    });
  }

  return new ResourceDefinitionError(message, resourceKind, fieldPath, suggestions);
}
