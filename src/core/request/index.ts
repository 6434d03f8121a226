export {
  encodeDeleteParams,
  encodeListParams,
  encodePatchParams,
  encodePostParams,
  encodeWatchParams,
  joinQueries,
  PATCH_CONTENT_TYPES,
} from './params.js';
export type {
  DeleteParams,
  FieldValidation,
  ListParams,
  PatchParams,
  PatchStrategy,
  PostParams,
  PropagationPolicy,
  ResourceVersionMatch,
  WatchParams,
} from './params.js';
export {
  apiPrefix,
  collectionPath,
  JSON_CONTENT_TYPE,
  ResourceRequests,
  requestsFor,
  requestUri,
} from './request-spec.js';
export type { HttpMethod, RequestSpec, Subresource } from './request-spec.js';
