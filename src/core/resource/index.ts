export {
  CustomResourceBuilder,
  customResource,
  defineResource,
  formatApiVersion,
  isNamespaced,
} from './descriptor.js';
export type { DescriptorOptions, ResourceDescriptor, ResourceIdentity } from './descriptor.js';
