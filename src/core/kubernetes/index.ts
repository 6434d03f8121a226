/**
 * Kubernetes Module
 *
 * Transport, typed resource access and API error handling.
 */

export { bindResource, encodeJsonBody, ResourceApi } from './api.js';
export type { BoundedWatchParams, ObjectList, PatchBody } from './api.js';

export {
  formatKubernetesError,
  getErrorStatusCode,
  isConflictError,
  isForbiddenError,
  isNotFoundError,
  isUnauthorizedError,
  KubernetesApiResponseError,
  parseStatus,
} from './errors.js';
export type { KubernetesStatus } from './errors.js';

export { KubeConfigTransport, loadTransportConfigFromEnv } from './transport.js';
export type { RequestTransport, TransportEnvConfig, TransportResponse } from './transport.js';
