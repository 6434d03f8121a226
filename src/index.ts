/**
 * Descriptors and request routing for Kubernetes custom resources.
 *
 * @example
 * ```typescript
 * import { customResource, requestsFor, requestUri } from 'kube-custom-resource';
 *
 * const foos = customResource('Foo').group('clux.dev').version('v1').within('myns').build();
 * const request = requestsFor(foos).get('baz');
 * requestUri(request); // '/apis/clux.dev/v1/namespaces/myns/foos/baz'
 * ```
 */

export * from './core.js';
export * from './utils/index.js';
