/**
 * Verb-specific query parameters.
 *
 * Each encoder appends parameters in a fixed order and skips absent options,
 * so an empty option set encodes to the empty string.
 */

import { RequestSpecError } from '../errors.js';

export type FieldValidation = 'Ignore' | 'Warn' | 'Strict';

export type PropagationPolicy = 'Orphan' | 'Background' | 'Foreground';

export type ResourceVersionMatch = 'NotOlderThan' | 'Exact';

export type PatchStrategy = 'merge' | 'json' | 'strategic' | 'apply';

/**
 * Parameters for create and replace
 */
export interface PostParams {
  dryRun?: boolean;
  fieldManager?: string;
  fieldValidation?: FieldValidation;
}

export interface PatchParams extends PostParams {
  /**
   * How the server interprets the patch body
   */
  patch: PatchStrategy;
  /**
   * Take ownership of conflicting fields; server-side apply only
   */
  force?: boolean;
}

export interface ListParams {
  labelSelector?: string;
  fieldSelector?: string;
  resourceVersion?: string;
  resourceVersionMatch?: ResourceVersionMatch;
  timeoutSeconds?: number;
  limit?: number;
  continueToken?: string;
}

export interface WatchParams {
  labelSelector?: string;
  fieldSelector?: string;
  resourceVersion?: string;
  timeoutSeconds?: number;
  allowWatchBookmarks?: boolean;
}

export interface DeleteParams {
  dryRun?: boolean;
  gracePeriodSeconds?: number;
  propagationPolicy?: PropagationPolicy;
}

export const PATCH_CONTENT_TYPES: Readonly<Record<PatchStrategy, string>> = {
  merge: 'application/merge-patch+json',
  json: 'application/json-patch+json',
  strategic: 'application/strategic-merge-patch+json',
  apply: 'application/apply-patch+yaml',
};

function assertCount(verb: string, parameter: string, value: number, minimum: number): void {
  if (!Number.isInteger(value) || value < minimum) {
    throw new RequestSpecError(
      `${parameter} must be an integer >= ${minimum}, got ${value}`,
      verb,
      parameter
    );
  }
}

function appendPostParams(query: URLSearchParams, params: PostParams): void {
  if (params.dryRun) {
    query.append('dryRun', 'All');
  }
  if (params.fieldManager !== undefined) {
    query.append('fieldManager', params.fieldManager);
  }
  if (params.fieldValidation !== undefined) {
    query.append('fieldValidation', params.fieldValidation);
  }
}

export function encodePostParams(params: PostParams = {}): string {
  const query = new URLSearchParams();
  appendPostParams(query, params);
  return query.toString();
}

export function encodePatchParams(params: PatchParams): string {
  if (params.force && params.patch !== 'apply') {
    throw new RequestSpecError(
      `force is only valid for server-side apply, not '${params.patch}' patches`,
      'patch',
      'force',
      ["Use { patch: 'apply', force: true, fieldManager: '...' }"]
    );
  }
  if (params.patch === 'apply' && !params.fieldManager) {
    throw new RequestSpecError('Server-side apply requires a fieldManager', 'patch', 'fieldManager', [
      'Set fieldManager to the name of the controller or tool applying the change',
    ]);
  }

  const query = new URLSearchParams();
  appendPostParams(query, params);
  if (params.force) {
    query.append('force', 'true');
  }
  return query.toString();
}

function appendSelectors(
  query: URLSearchParams,
  params: { labelSelector?: string; fieldSelector?: string }
): void {
  if (params.labelSelector !== undefined) {
    query.append('labelSelector', params.labelSelector);
  }
  if (params.fieldSelector !== undefined) {
    query.append('fieldSelector', params.fieldSelector);
  }
}

export function encodeListParams(params: ListParams = {}, verb = 'list'): string {
  const query = new URLSearchParams();
  appendSelectors(query, params);
  if (params.resourceVersion !== undefined) {
    query.append('resourceVersion', params.resourceVersion);
  }
  if (params.resourceVersionMatch !== undefined) {
    query.append('resourceVersionMatch', params.resourceVersionMatch);
  }
  if (params.timeoutSeconds !== undefined) {
    assertCount(verb, 'timeoutSeconds', params.timeoutSeconds, 0);
    query.append('timeoutSeconds', String(params.timeoutSeconds));
  }
  if (params.limit !== undefined) {
    assertCount(verb, 'limit', params.limit, 1);
    query.append('limit', String(params.limit));
  }
  if (params.continueToken !== undefined) {
    query.append('continue', params.continueToken);
  }
  return query.toString();
}

export function encodeWatchParams(params: WatchParams = {}): string {
  const query = new URLSearchParams();
  query.append('watch', 'true');
  appendSelectors(query, params);
  if (params.resourceVersion !== undefined) {
    query.append('resourceVersion', params.resourceVersion);
  }
  if (params.timeoutSeconds !== undefined) {
    assertCount('watch', 'timeoutSeconds', params.timeoutSeconds, 0);
    query.append('timeoutSeconds', String(params.timeoutSeconds));
  }
  if (params.allowWatchBookmarks) {
    query.append('allowWatchBookmarks', 'true');
  }
  return query.toString();
}

export function encodeDeleteParams(params: DeleteParams = {}): string {
  const query = new URLSearchParams();
  if (params.dryRun) {
    query.append('dryRun', 'All');
  }
  if (params.gracePeriodSeconds !== undefined) {
    assertCount('delete', 'gracePeriodSeconds', params.gracePeriodSeconds, 0);
    query.append('gracePeriodSeconds', String(params.gracePeriodSeconds));
  }
  if (params.propagationPolicy !== undefined) {
    query.append('propagationPolicy', params.propagationPolicy);
  }
  return query.toString();
}

/**
 * Join already-encoded query strings, skipping empty ones
 */
export function joinQueries(...queries: string[]): string {
  return queries.filter((query) => query !== '').join('&');
}
