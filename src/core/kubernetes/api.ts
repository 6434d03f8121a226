/**
 * Typed access to one resource type through a transport.
 *
 * `ResourceApi<K>` pairs a descriptor with a transport handle. Responses are
 * parsed as JSON and returned as `K` without any schema validation.
 */

import type { KubernetesObject, V1Scale } from '@kubernetes/client-node';
import { RequestSpecError } from '../errors.js';
import type { DeleteParams, ListParams, PatchParams, PostParams, WatchParams } from '../request/params.js';
import { ResourceRequests } from '../request/request-spec.js';
import type { ResourceDescriptor } from '../resource/descriptor.js';
import type { KubernetesStatus } from './errors.js';
import type { RequestTransport, TransportResponse } from './transport.js';

export interface ObjectList<K> {
  apiVersion?: string;
  kind?: string;
  metadata?: {
    resourceVersion?: string;
    continue?: string;
    remainingItemCount?: number;
  };
  items: K[];
}

/**
 * A patch body: raw bytes go out untouched, strings as UTF-8 (e.g. apply YAML),
 * anything else as JSON
 */
export type PatchBody = Uint8Array | string | object;

/**
 * Watch parameters with a server-side bound. The transport resolves only once
 * the server closes the stream, so every watch must carry `timeoutSeconds`.
 */
export type BoundedWatchParams = WatchParams & { timeoutSeconds: number };

function assertBounded(verb: string, params: BoundedWatchParams): void {
  if (!Number.isInteger(params.timeoutSeconds) || params.timeoutSeconds < 1) {
    throw new RequestSpecError(
      `${verb} requires timeoutSeconds >= 1, got ${params.timeoutSeconds}`,
      verb,
      'timeoutSeconds',
      ['The response resolves when the server closes the stream after timeoutSeconds']
    );
  }
}

export function encodeJsonBody(value: unknown): Uint8Array {
  return Buffer.from(JSON.stringify(value), 'utf-8');
}

function encodePatchBody(patch: PatchBody): Uint8Array {
  if (patch instanceof Uint8Array) {
    return patch;
  }
  if (typeof patch === 'string') {
    return Buffer.from(patch, 'utf-8');
  }
  return encodeJsonBody(patch);
}

function decodeJson<T>(response: TransportResponse): T {
  return JSON.parse(Buffer.from(response.body).toString('utf-8'));
}

export class ResourceApi<K = KubernetesObject> {
  readonly requests: ResourceRequests<K>;

  constructor(
    readonly descriptor: ResourceDescriptor,
    readonly transport: RequestTransport
  ) {
    this.requests = new ResourceRequests<K>(descriptor);
  }

  async create(params: PostParams, object: K): Promise<K> {
    const response = await this.transport.send(this.requests.create(params, encodeJsonBody(object)));
    return decodeJson<K>(response);
  }

  async get(name: string): Promise<K> {
    return decodeJson<K>(await this.transport.send(this.requests.get(name)));
  }

  async list(params?: ListParams): Promise<ObjectList<K>> {
    return decodeJson<ObjectList<K>>(await this.transport.send(this.requests.list(params)));
  }

  async patch(name: string, params: PatchParams, patch: PatchBody): Promise<K> {
    const response = await this.transport.send(
      this.requests.patch(name, params, encodePatchBody(patch))
    );
    return decodeJson<K>(response);
  }

  async replace(name: string, params: PostParams, object: K): Promise<K> {
    const response = await this.transport.send(
      this.requests.replace(name, params, encodeJsonBody(object))
    );
    return decodeJson<K>(response);
  }

  /**
   * Resolves with the deleted object, or a `Status` when deletion is still in progress
   */
  async delete(name: string, params?: DeleteParams): Promise<K | KubernetesStatus> {
    return decodeJson<K | KubernetesStatus>(await this.transport.send(this.requests.delete(name, params)));
  }

  async deleteCollection(
    deleteParams?: DeleteParams,
    listParams?: ListParams
  ): Promise<ObjectList<K> | KubernetesStatus> {
    const response = await this.transport.send(
      this.requests.deleteCollection(deleteParams, listParams)
    );
    return decodeJson<ObjectList<K> | KubernetesStatus>(response);
  }

  /**
   * Returns the raw response once the server ends the stream after
   * `timeoutSeconds`; decoding the buffered events is up to the caller
   */
  watch(params: BoundedWatchParams): Promise<TransportResponse> {
    assertBounded('watch', params);
    return this.transport.send(this.requests.watch(params));
  }

  watchOne(name: string, params: BoundedWatchParams): Promise<TransportResponse> {
    assertBounded('watch', params);
    return this.transport.send(this.requests.watchOne(name, params));
  }

  async getStatus(name: string): Promise<K> {
    return decodeJson<K>(await this.transport.send(this.requests.getStatus(name)));
  }

  async patchStatus(name: string, params: PatchParams, patch: PatchBody): Promise<K> {
    const response = await this.transport.send(
      this.requests.patchStatus(name, params, encodePatchBody(patch))
    );
    return decodeJson<K>(response);
  }

  async replaceStatus(name: string, params: PostParams, object: K): Promise<K> {
    const response = await this.transport.send(
      this.requests.replaceStatus(name, params, encodeJsonBody(object))
    );
    return decodeJson<K>(response);
  }

  async getScale(name: string): Promise<V1Scale> {
    return decodeJson<V1Scale>(await this.transport.send(this.requests.getScale(name)));
  }

  async patchScale(name: string, params: PatchParams, patch: PatchBody): Promise<V1Scale> {
    const response = await this.transport.send(
      this.requests.patchScale(name, params, encodePatchBody(patch))
    );
    return decodeJson<V1Scale>(response);
  }

  async replaceScale(name: string, params: PostParams, scale: V1Scale): Promise<V1Scale> {
    const response = await this.transport.send(
      this.requests.replaceScale(name, params, encodeJsonBody(scale))
    );
    return decodeJson<V1Scale>(response);
  }
}

export function bindResource<K = KubernetesObject>(
  descriptor: ResourceDescriptor,
  transport: RequestTransport
): ResourceApi<K> {
  return new ResourceApi<K>(descriptor, transport);
}
