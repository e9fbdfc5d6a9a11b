/**
 * Domain models for directory objects reachable through group membership.
 *
 * The directory collaborator returns bare profiles plus `{ id, kind }`
 * references; the membership resolver assembles them into the closed
 * `DirectoryObject` union and flattens that into `MemberRecord` rows.
 */

export const DIRECTORY_OBJECT_KINDS = ['user', 'device', 'servicePrincipal', 'group'] as const;

/** Kind tag supplied by the directory for every member / owner reference. */
export type DirectoryObjectKind = typeof DIRECTORY_OBJECT_KINDS[number];

export function isDirectoryObjectKind(value: unknown): value is DirectoryObjectKind {
  return typeof value === 'string' && (DIRECTORY_OBJECT_KINDS as readonly string[]).includes(value);
}

export interface DirectoryObjectRef {
  id: string;
  kind: DirectoryObjectKind;
}

export interface UserProfile {
  id: string;
  displayName: string;
  userPrincipalName: string;
}

export interface DeviceProfile {
  id: string;
  displayName: string;
}

export interface ServicePrincipalProfile {
  id: string;
  displayName: string;
}

export interface GroupProfile {
  id: string;
  displayName: string;
}

export interface DirectoryUser extends UserProfile {
  kind: 'user';
}

export interface DirectoryDevice extends DeviceProfile {
  kind: 'device';
  /** UPNs of registered owners of kind user, in owner-fetch order. */
  primaryUserPrincipalNames: string[];
}

export interface DirectoryServicePrincipal extends ServicePrincipalProfile {
  kind: 'servicePrincipal';
}

export interface DirectoryGroup extends GroupProfile {
  kind: 'group';
}

export type DirectoryObject =
  | DirectoryUser
  | DirectoryDevice
  | DirectoryServicePrincipal
  | DirectoryGroup;

export type MemberKind = 'User' | 'Device' | 'ServicePrincipal' | 'Group';

/**
 * One flattened output row. `userPrincipalName` and `primaryUser` are empty
 * strings when they do not apply to the member's kind.
 */
export interface MemberRecord {
  id: string;
  name: string;
  kind: MemberKind;
  userPrincipalName: string;
  primaryUser: string;
}

export const PRIMARY_USER_SEPARATOR = ', ';

export function toMemberRecord(object: DirectoryObject): MemberRecord {
  switch (object.kind) {
    case 'user':
      return {
        id: object.id,
        name: object.displayName,
        kind: 'User',
        userPrincipalName: object.userPrincipalName,
        primaryUser: '',
      };
    case 'device':
      return {
        id: object.id,
        name: object.displayName,
        kind: 'Device',
        userPrincipalName: '',
        primaryUser: object.primaryUserPrincipalNames.join(PRIMARY_USER_SEPARATOR),
      };
    case 'servicePrincipal':
      return {
        id: object.id,
        name: object.displayName,
        kind: 'ServicePrincipal',
        userPrincipalName: '',
        primaryUser: '',
      };
    case 'group':
      return {
        id: object.id,
        name: object.displayName,
        kind: 'Group',
        userPrincipalName: '',
        primaryUser: '',
      };
    default: {
      const unreachable: never = object;
      throw new Error(`Unsupported directory object: ${JSON.stringify(unreachable)}`);
    }
  }
}
