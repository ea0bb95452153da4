export {
  FreshsalesHttpGateway,
  FRESHSALES_SERVICE,
  FRESHSALES_TIMEOUTS,
  encodeQueryParams,
  parseClientConfig,
  type FetchFn,
  type FreshsalesGatewayOptions,
  type HttpMethod,
} from './http-gateway.js';
export { collectionOf, expectEnvelope, findById, isRecord, unwrapCollection, unwrapRecord } from './envelope.js';
export { NORMALIZERS, type Normalizer, type NormalizerKind } from './normalizers.js';
export { ViewCursor, ViewPager, type ViewPagerOptions } from './view-pager.js';
export {
  ResourceClient,
  parseSharedConfig,
  type ResourceCapabilities,
  type ResourceClientOptions,
  type ResourceClientSharedOptions,
} from './resource-client.js';
export {
  AccountsClient,
  ContactsClient,
  DealsClient,
  LeadsClient,
  RESOURCE_DESCRIPTORS,
  createResourceClient,
  type AccountBulkDeleteOptions,
  type ResourceDescriptor,
} from './resources.js';
export { SelectorClient, type SelectorClientOptions } from './selector-client.js';
export {
  FreshsalesClient,
  createFreshsalesClient,
  getFreshsalesCredentials,
  type FreshsalesClientOptions,
} from './client.js';
