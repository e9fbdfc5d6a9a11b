/**
 * JSON snapshot format used to seed the in-memory directory.
 *
 * {
 *   "users":             [{ "id", "displayName", "userPrincipalName" }],
 *   "devices":           [{ "id", "displayName", "owners": [{ "id", "kind" }] }],
 *   "servicePrincipals": [{ "id", "displayName" }],
 *   "groups":            [{ "id", "displayName", "members": [{ "id", "kind" }] }]
 * }
 *
 * Every top-level array is optional; `owners` and `members` default to [].
 */
import { readFileSync } from 'node:fs';
import {
  isDirectoryObjectKind,
  type DeviceProfile,
  type DirectoryObjectRef,
  type GroupProfile,
  type ServicePrincipalProfile,
  type UserProfile,
} from '../../../domain/models/directory-object.model';

export interface DirectorySnapshot {
  users: UserProfile[];
  devices: Array<DeviceProfile & { owners: DirectoryObjectRef[] }>;
  servicePrincipals: ServicePrincipalProfile[];
  groups: Array<GroupProfile & { members: DirectoryObjectRef[] }>;
}

export class DirectorySnapshotError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DirectorySnapshotError';
  }
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(obj: JsonObject, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value === '') {
    throw new DirectorySnapshotError(`${where}: "${key}" must be a non-empty string`);
  }
  return value;
}

function optionalArray(obj: JsonObject, key: string, where: string): unknown[] {
  const value = obj[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new DirectorySnapshotError(`${where}: "${key}" must be an array`);
  }
  return value;
}

function parseEntries<T>(root: JsonObject, key: string, parse: (entry: JsonObject, where: string) => T): T[] {
  return optionalArray(root, key, 'snapshot').map((entry, index) => {
    const where = `${key}[${index}]`;
    if (!isObject(entry)) {
      throw new DirectorySnapshotError(`${where}: must be an object`);
    }
    return parse(entry, where);
  });
}

function parseRefs(obj: JsonObject, key: string, where: string): DirectoryObjectRef[] {
  return optionalArray(obj, key, where).map((ref, index) => {
    const refWhere = `${where}.${key}[${index}]`;
    if (!isObject(ref)) {
      throw new DirectorySnapshotError(`${refWhere}: must be an object`);
    }
    const kind = ref.kind;
    if (!isDirectoryObjectKind(kind)) {
      throw new DirectorySnapshotError(
        `${refWhere}: "kind" must be one of user, device, servicePrincipal, group`,
      );
    }
    return { id: requireString(ref, 'id', refWhere), kind };
  });
}

/** Validate an already-parsed JSON value as a snapshot. */
export function parseDirectorySnapshot(raw: unknown): DirectorySnapshot {
  if (!isObject(raw)) {
    throw new DirectorySnapshotError('snapshot: root must be an object');
  }
  return {
    users: parseEntries(raw, 'users', (e, where) => ({
      id: requireString(e, 'id', where),
      displayName: requireString(e, 'displayName', where),
      userPrincipalName: requireString(e, 'userPrincipalName', where),
    })),
    devices: parseEntries(raw, 'devices', (e, where) => ({
      id: requireString(e, 'id', where),
      displayName: requireString(e, 'displayName', where),
      owners: parseRefs(e, 'owners', where),
    })),
    servicePrincipals: parseEntries(raw, 'servicePrincipals', (e, where) => ({
      id: requireString(e, 'id', where),
      displayName: requireString(e, 'displayName', where),
    })),
    groups: parseEntries(raw, 'groups', (e, where) => ({
      id: requireString(e, 'id', where),
      displayName: requireString(e, 'displayName', where),
      members: parseRefs(e, 'members', where),
    })),
  };
}

export function loadDirectorySnapshot(filePath: string): DirectorySnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DirectorySnapshotError(`Cannot read directory snapshot ${filePath}: ${reason}`);
  }
  return parseDirectorySnapshot(raw);
}
