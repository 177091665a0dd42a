// Interfaces
export * from "./interface/networking-client";

// Errors
export * from "./utils/cloud-errors";

// OpenStack
export { OpenStackNetworkingClient } from "./openstack/openstack-client";
export { KeystoneSession, buildAuthRequest } from "./openstack/keystone";
export type { FetchFn, ServiceType } from "./openstack/keystone";
export {
  readCloudConfig,
  extractGlobalSection,
  toAuthOptions,
} from "./openstack/cloud-config";
export type {
  OpenStackAuthOptions,
  PasswordCredentials,
  ApplicationCredentials,
} from "./openstack/cloud-config";
