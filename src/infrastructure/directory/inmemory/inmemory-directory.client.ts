/**
 * InMemoryDirectoryClient — IDirectoryServiceClient backed by in-memory Maps.
 *
 * Suitable for testing and lightweight deployments; it can be seeded from a
 * JSON snapshot (see directory-snapshot.ts). Member and owner lists keep
 * insertion order, which is the order callers observe.
 */
import { Injectable } from '@nestjs/common';
import type { IDirectoryServiceClient } from '../../../domain/directory/directory-service.client.interface';
import { DirectoryObjectNotFoundError } from '../../../domain/directory/directory-errors';
import type {
  DeviceProfile,
  DirectoryObjectRef,
  GroupProfile,
  ServicePrincipalProfile,
  UserProfile,
} from '../../../domain/models/directory-object.model';
import type { DirectorySnapshot } from './directory-snapshot';

@Injectable()
export class InMemoryDirectoryClient implements IDirectoryServiceClient {
  private readonly users: Map<string, UserProfile> = new Map();
  private readonly devices: Map<string, DeviceProfile> = new Map();
  private readonly servicePrincipals: Map<string, ServicePrincipalProfile> = new Map();
  private readonly groups: Map<string, GroupProfile> = new Map();
  private readonly groupMembers: Map<string, DirectoryObjectRef[]> = new Map();
  private readonly deviceOwners: Map<string, DirectoryObjectRef[]> = new Map();

  // ─── Seeding ───────────────────────────────────────────────────────

  addUser(user: UserProfile): this {
    this.users.set(user.id, { ...user });
    return this;
  }

  addDevice(device: DeviceProfile, owners: DirectoryObjectRef[] = []): this {
    this.devices.set(device.id, { ...device });
    this.deviceOwners.set(device.id, owners.map((o) => ({ ...o })));
    return this;
  }

  addServicePrincipal(servicePrincipal: ServicePrincipalProfile): this {
    this.servicePrincipals.set(servicePrincipal.id, { ...servicePrincipal });
    return this;
  }

  addGroup(group: GroupProfile, members: DirectoryObjectRef[] = []): this {
    this.groups.set(group.id, { ...group });
    this.groupMembers.set(group.id, members.map((m) => ({ ...m })));
    return this;
  }

  /** Load every object in a snapshot, on top of what is already stored. */
  load(snapshot: DirectorySnapshot): this {
    for (const user of snapshot.users) this.addUser(user);
    for (const sp of snapshot.servicePrincipals) this.addServicePrincipal(sp);
    for (const { owners, ...device } of snapshot.devices) this.addDevice(device, owners);
    for (const { members, ...group } of snapshot.groups) this.addGroup(group, members);
    return this;
  }

  /** Clear all data — useful in test teardowns. */
  clear(): void {
    this.users.clear();
    this.devices.clear();
    this.servicePrincipals.clear();
    this.groups.clear();
    this.groupMembers.clear();
    this.deviceOwners.clear();
  }

  // ─── IDirectoryServiceClient ───────────────────────────────────────

  async getGroupByName(name: string): Promise<GroupProfile | null> {
    for (const group of this.groups.values()) {
      if (group.displayName === name) {
        return { ...group };
      }
    }
    return null;
  }

  async getGroupMembers(groupId: string): Promise<DirectoryObjectRef[]> {
    const members = this.groupMembers.get(groupId);
    if (!members) {
      throw new DirectoryObjectNotFoundError('group', groupId);
    }
    return members.map((m) => ({ ...m }));
  }

  async getUser(userId: string): Promise<UserProfile> {
    return { ...this.require(this.users, 'user', userId) };
  }

  async getDevice(deviceId: string): Promise<DeviceProfile> {
    return { ...this.require(this.devices, 'device', deviceId) };
  }

  async getServicePrincipal(servicePrincipalId: string): Promise<ServicePrincipalProfile> {
    return { ...this.require(this.servicePrincipals, 'servicePrincipal', servicePrincipalId) };
  }

  async getDeviceRegisteredOwners(deviceId: string): Promise<DirectoryObjectRef[]> {
    const owners = this.deviceOwners.get(deviceId);
    if (!owners) {
      throw new DirectoryObjectNotFoundError('device', deviceId);
    }
    return owners.map((o) => ({ ...o }));
  }

  async getGroup(groupId: string): Promise<GroupProfile> {
    return { ...this.require(this.groups, 'group', groupId) };
  }

  private require<T>(store: Map<string, T>, kind: DirectoryObjectRef['kind'], id: string): T {
    const found = store.get(id);
    if (found === undefined) {
      throw new DirectoryObjectNotFoundError(kind, id);
    }
    return found;
  }
}
