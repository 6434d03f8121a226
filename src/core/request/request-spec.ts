/**
 * Request synthesis for a resource descriptor.
 *
 * Routing follows the API server's layout:
 *
 *   /api/{version}/...                  core group
 *   /apis/{group}/{version}/...         named groups
 *   .../namespaces/{namespace}/{plural} namespace-scoped
 *   .../{plural}                        cluster-scoped
 *
 * Every operation is a pure function of the descriptor and its arguments.
 */

import { RequestSpecError } from '../errors.js';
import { getResourceLogger, type ResourceLogger } from '../logging/index.js';
import type { ResourceDescriptor } from '../resource/descriptor.js';
import {
  type DeleteParams,
  encodeDeleteParams,
  encodeListParams,
  encodePatchParams,
  encodePostParams,
  encodeWatchParams,
  joinQueries,
  type ListParams,
  PATCH_CONTENT_TYPES,
  type PatchParams,
  type PostParams,
  type WatchParams,
} from './params.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type Subresource = 'status' | 'scale';

export const JSON_CONTENT_TYPE = 'application/json';

/**
 * A fully routed request, ready to hand to a transport
 */
export interface RequestSpec {
  readonly method: HttpMethod;
  /**
   * Absolute, percent-encoded path
   */
  readonly path: string;
  /**
   * Encoded query string without the leading '?'; empty when there are no options
   */
  readonly query: string;
  readonly body?: Uint8Array;
  readonly contentType?: string;
}

export function requestUri(request: RequestSpec): string {
  return request.query === '' ? request.path : `${request.path}?${request.query}`;
}

export function apiPrefix(group: string): string {
  return group === '' ? '/api' : '/apis';
}

/**
 * Path of the resource collection described by a descriptor
 */
export function collectionPath(descriptor: ResourceDescriptor): string {
  const root = `${apiPrefix(descriptor.group)}/${descriptor.apiVersion}`;
  return descriptor.namespace !== undefined
    ? `${root}/namespaces/${encodeURIComponent(descriptor.namespace)}/${descriptor.plural}`
    : `${root}/${descriptor.plural}`;
}

function assertWellFormed(descriptor: ResourceDescriptor): void {
  const missing: string[] = [];
  for (const field of ['kind', 'version', 'apiVersion', 'plural'] as const) {
    if (typeof descriptor[field] !== 'string' || descriptor[field] === '') {
      missing.push(field);
    }
  }
  if (descriptor.namespace === '') {
    missing.push('namespace');
  }
  if (missing.length > 0) {
    throw new RequestSpecError(
      `Malformed resource descriptor: missing ${missing.join(', ')}`,
      'construct',
      missing[0],
      ['Build descriptors with customResource() or defineResource()']
    );
  }
}

/**
 * Builds {@link RequestSpec}s for one resource type.
 *
 * `K` is the object type the requests address. It carries no runtime data and
 * only keeps requests for different resource types apart at compile time.
 */
export class ResourceRequests<K = unknown> {
  private declare readonly resourceType?: K;

  readonly collectionPath: string;

  private readonly logger: ResourceLogger;

  constructor(readonly descriptor: ResourceDescriptor) {
    assertWellFormed(descriptor);
    this.collectionPath = collectionPath(descriptor);
    this.logger = getResourceLogger(descriptor.kind, descriptor.apiVersion, descriptor.namespace, {
      component: 'request-spec',
    });
  }

  create(params: PostParams, body: Uint8Array): RequestSpec {
    return this.request('create', 'POST', this.collectionPath, encodePostParams(params), body);
  }

  get(name: string): RequestSpec {
    return this.request('get', 'GET', this.itemPath('get', name), '');
  }

  list(params: ListParams = {}): RequestSpec {
    return this.request('list', 'GET', this.collectionPath, encodeListParams(params));
  }

  watch(params: WatchParams = {}): RequestSpec {
    return this.request('watch', 'GET', this.collectionPath, encodeWatchParams(params));
  }

  watchOne(name: string, params: WatchParams = {}): RequestSpec {
    return this.request('watch', 'GET', this.itemPath('watch', name), encodeWatchParams(params));
  }

  /**
   * The body is sent as-is with the content type of the chosen patch strategy
   */
  patch(name: string, params: PatchParams, body: Uint8Array): RequestSpec {
    return this.patchRequest(name, params, body);
  }

  replace(name: string, params: PostParams, body: Uint8Array): RequestSpec {
    return this.replaceRequest(name, params, body);
  }

  delete(name: string, params: DeleteParams = {}): RequestSpec {
    return this.request('delete', 'DELETE', this.itemPath('delete', name), encodeDeleteParams(params));
  }

  deleteCollection(deleteParams: DeleteParams = {}, listParams: ListParams = {}): RequestSpec {
    const query = joinQueries(
      encodeDeleteParams(deleteParams),
      encodeListParams(listParams, 'deleteCollection')
    );
    return this.request('deleteCollection', 'DELETE', this.collectionPath, query);
  }

  getStatus(name: string): RequestSpec {
    return this.request('get', 'GET', this.itemPath('get', name, 'status'), '');
  }

  patchStatus(name: string, params: PatchParams, body: Uint8Array): RequestSpec {
    return this.patchRequest(name, params, body, 'status');
  }

  replaceStatus(name: string, params: PostParams, body: Uint8Array): RequestSpec {
    return this.replaceRequest(name, params, body, 'status');
  }

  getScale(name: string): RequestSpec {
    return this.request('get', 'GET', this.itemPath('get', name, 'scale'), '');
  }

  patchScale(name: string, params: PatchParams, body: Uint8Array): RequestSpec {
    return this.patchRequest(name, params, body, 'scale');
  }

  replaceScale(name: string, params: PostParams, body: Uint8Array): RequestSpec {
    return this.replaceRequest(name, params, body, 'scale');
  }

  private patchRequest(
    name: string,
    params: PatchParams,
    body: Uint8Array,
    subresource?: Subresource
  ): RequestSpec {
    const path = this.itemPath('patch', name, subresource);
    return this.request(
      'patch',
      'PATCH',
      path,
      encodePatchParams(params),
      body,
      PATCH_CONTENT_TYPES[params.patch]
    );
  }

  private replaceRequest(
    name: string,
    params: PostParams,
    body: Uint8Array,
    subresource?: Subresource
  ): RequestSpec {
    const path = this.itemPath('replace', name, subresource);
    return this.request('replace', 'PUT', path, encodePostParams(params), body);
  }

  private itemPath(verb: string, name: string, subresource?: Subresource): string {
    if (name === '') {
      throw new RequestSpecError(
        `${verb} on ${this.descriptor.kind} requires a resource name`,
        verb,
        'name'
      );
    }
    const path = `${this.collectionPath}/${encodeURIComponent(name)}`;
    return subresource ? `${path}/${subresource}` : path;
  }

  private request(
    verb: string,
    method: HttpMethod,
    path: string,
    query: string,
    body?: Uint8Array,
    contentType: string = JSON_CONTENT_TYPE
  ): RequestSpec {
    const spec: RequestSpec = Object.freeze({
      method,
      path,
      query,
      ...(body !== undefined && { body, contentType }),
    });

    this.logger.trace('Request synthesized', {
      verb,
      method,
      uri: requestUri(spec),
    });

    return spec;
  }
}

/**
 * Create the request builder for a descriptor
 */
export function requestsFor<K = unknown>(descriptor: ResourceDescriptor): ResourceRequests<K> {
  return new ResourceRequests<K>(descriptor);
}
