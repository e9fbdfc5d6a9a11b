/**
 * IDirectoryServiceClient — read-only port onto the identity directory.
 *
 * Implementations:
 *   - GraphDirectoryClient    (Microsoft Graph v1.0)
 *   - InMemoryDirectoryClient (testing / lightweight deployments)
 *
 * Listing operations exhaust every page before resolving. Lookups of a
 * missing object reject with DirectoryObjectNotFoundError; every other
 * failure rejects with DirectoryRequestError.
 */
import type {
  DeviceProfile,
  DirectoryObjectRef,
  GroupProfile,
  ServicePrincipalProfile,
  UserProfile,
} from '../models/directory-object.model';

export interface IDirectoryServiceClient {
  /** Find a group by its exact display name, or null when there is none. */
  getGroupByName(name: string): Promise<GroupProfile | null>;

  /** Direct members of a group, in the order the directory returns them. */
  getGroupMembers(groupId: string): Promise<DirectoryObjectRef[]>;

  getUser(userId: string): Promise<UserProfile>;

  getDevice(deviceId: string): Promise<DeviceProfile>;

  getServicePrincipal(servicePrincipalId: string): Promise<ServicePrincipalProfile>;

  /** Registered owners of a device, of any kind. */
  getDeviceRegisteredOwners(deviceId: string): Promise<DirectoryObjectRef[]>;

  getGroup(groupId: string): Promise<GroupProfile>;
}
