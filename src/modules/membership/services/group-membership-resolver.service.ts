import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DIRECTORY_SERVICE_CLIENT } from '../../../domain/directory/directory.tokens';
import type { IDirectoryServiceClient } from '../../../domain/directory/directory-service.client.interface';
import { DirectoryObjectNotFoundError } from '../../../domain/directory/directory-errors';
import {
  toMemberRecord,
  type DirectoryDevice,
  type DirectoryObject,
  type DirectoryObjectRef,
  type GroupProfile,
  type MemberRecord,
} from '../../../domain/models/directory-object.model';
import { AppLogger } from '../../logging/app-logger.service';
import { LogCategory } from '../../logging/log-levels';
import {
  MEMBER_LOOKUP_FAILURE_POLICIES,
  type MemberLookupFailurePolicy,
  type MembershipResolution,
  type SkippedMember,
} from '../common/membership.types';

/** A group whose direct members are still being walked. */
interface PendingGroup {
  groupId: string;
  members: DirectoryObjectRef[];
  next: number;
}

/**
 * Keep one record per id. The survivor is the last record emitted for that
 * id, placed where that last occurrence was emitted.
 */
export function dedupeById(records: MemberRecord[]): MemberRecord[] {
  const seen = new Set<string>();
  const result: MemberRecord[] = [];
  for (let i = records.length - 1; i >= 0; i--) {
    const record = records[i];
    if (!seen.has(record.id)) {
      seen.add(record.id);
      result.push(record);
    }
  }
  return result.reverse();
}

export function parseFailurePolicy(raw: string | undefined): MemberLookupFailurePolicy {
  if (raw === undefined || raw.trim() === '') return 'skip';
  const normalized = raw.trim().toLowerCase();
  const policy = MEMBER_LOOKUP_FAILURE_POLICIES.find((p) => p === normalized);
  if (!policy) {
    throw new Error(
      `MEMBER_LOOKUP_FAILURE_POLICY must be one of ${MEMBER_LOOKUP_FAILURE_POLICIES.join(', ')} (got '${raw}')`,
    );
  }
  return policy;
}

/**
 * Resolves the transitive membership of a directory group.
 *
 * Depth-first over nested groups, driven by an explicit stack so deep
 * hierarchies do not grow the call stack. A group id enters the visited set
 * before its members are fetched, so cycles and diamonds expand each group
 * once. A nested group's own record is emitted before its members. The root
 * group is never emitted. One directory request is in flight at a time.
 */
@Injectable()
export class GroupMembershipResolverService {
  private readonly failurePolicy: MemberLookupFailurePolicy;

  constructor(
    @Inject(DIRECTORY_SERVICE_CLIENT) private readonly directory: IDirectoryServiceClient,
    private readonly config: ConfigService,
    private readonly logger: AppLogger,
  ) {
    this.failurePolicy = parseFailurePolicy(this.config.get<string>('MEMBER_LOOKUP_FAILURE_POLICY'));
  }

  /** Flattened, deduplicated members of `rootGroupId`. */
  async resolve(rootGroupId: string): Promise<MemberRecord[]> {
    const resolution = await this.expand(rootGroupId);
    return resolution.members;
  }

  /** Same run as `resolve`, with the root group, traversal and skip bookkeeping. */
  async expand(rootGroupId: string): Promise<MembershipResolution> {
    let rootGroup: GroupProfile;
    try {
      rootGroup = await this.directory.getGroup(rootGroupId);
    } catch (err) {
      throw this.rootNotFound(err, `Group ${rootGroupId} not found.`);
    }
    return this.traverse(rootGroup);
  }

  async resolveByName(groupName: string): Promise<MembershipResolution> {
    const rootGroup = await this.directory.getGroupByName(groupName);
    if (!rootGroup) {
      this.logger.debug(LogCategory.MEMBERSHIP, 'Group name not found', { groupName });
      throw new NotFoundException(`Group '${groupName}' not found.`);
    }
    return this.traverse(rootGroup);
  }

  // ─── Traversal ─────────────────────────────────────────────────────

  private async traverse(rootGroup: GroupProfile): Promise<MembershipResolution> {
    const rootId = rootGroup.id;
    const visited = new Set<string>([rootId]);
    const emitted: MemberRecord[] = [];
    const skipped: SkippedMember[] = [];
    const startedAt = Date.now();

    this.logger.enrichContext({ groupId: rootId });
    this.logger.info(LogCategory.MEMBERSHIP, 'Resolving group membership', {
      groupId: rootId,
      displayName: rootGroup.displayName,
      failurePolicy: this.failurePolicy,
    });

    let rootMembers: DirectoryObjectRef[];
    try {
      rootMembers = await this.directory.getGroupMembers(rootId);
    } catch (err) {
      throw this.rootNotFound(err, `Group ${rootId} not found.`);
    }
    const stack: PendingGroup[] = [{ groupId: rootId, members: rootMembers, next: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.next >= frame.members.length) {
        stack.pop();
        continue;
      }
      const ref = frame.members[frame.next++];

      if (ref.kind === 'group' && ref.id === rootId) {
        this.logger.trace(LogCategory.MEMBERSHIP, 'Root group re-entered; not emitted', { parentId: frame.groupId });
        continue;
      }

      const object = await this.tolerate(ref, frame.groupId, skipped, () => this.load(ref, skipped));
      if (!object) continue;
      emitted.push(toMemberRecord(object));

      if (object.kind !== 'group') continue;
      if (visited.has(object.id)) {
        this.logger.trace(LogCategory.MEMBERSHIP, 'Group already expanded', { groupId: object.id });
        continue;
      }

      visited.add(object.id);
      this.logger.debug(LogCategory.MEMBERSHIP, 'Expanding nested group', {
        groupId: object.id,
        parentId: frame.groupId,
        depth: stack.length,
      });
      const members = await this.tolerate(ref, frame.groupId, skipped, () =>
        this.directory.getGroupMembers(object.id),
      );
      if (members) {
        stack.push({ groupId: object.id, members, next: 0 });
      }
    }

    const members = dedupeById(emitted);
    this.logger.info(LogCategory.MEMBERSHIP, 'Group membership resolved', {
      groupId: rootId,
      members: members.length,
      emitted: emitted.length,
      groups: visited.size,
      skipped: skipped.length,
      durationMs: Date.now() - startedAt,
    });

    return {
      rootGroup,
      members,
      traversedGroupIds: [...visited],
      skipped,
    };
  }

  private async load(ref: DirectoryObjectRef, skipped: SkippedMember[]): Promise<DirectoryObject> {
    switch (ref.kind) {
      case 'user': {
        const user = await this.directory.getUser(ref.id);
        return { kind: 'user', ...user };
      }
      case 'servicePrincipal': {
        const servicePrincipal = await this.directory.getServicePrincipal(ref.id);
        return { kind: 'servicePrincipal', ...servicePrincipal };
      }
      case 'group': {
        const group = await this.directory.getGroup(ref.id);
        return { kind: 'group', ...group };
      }
      case 'device':
        return this.loadDevice(ref.id, skipped);
    }
  }

  /** Device profile plus the UPNs of its registered owners that are users. */
  private async loadDevice(deviceId: string, skipped: SkippedMember[]): Promise<DirectoryDevice> {
    const device = await this.directory.getDevice(deviceId);
    const owners = await this.directory.getDeviceRegisteredOwners(deviceId);

    const primaryUserPrincipalNames: string[] = [];
    for (const owner of owners) {
      if (owner.kind !== 'user') continue;
      const user = await this.tolerate(owner, deviceId, skipped, () => this.directory.getUser(owner.id));
      if (user) {
        primaryUserPrincipalNames.push(user.userPrincipalName);
      }
    }

    this.logger.trace(LogCategory.MEMBERSHIP, 'Resolved device owners', {
      deviceId,
      owners: owners.length,
      userOwners: primaryUserPrincipalNames.length,
    });
    return { kind: 'device', ...device, primaryUserPrincipalNames };
  }

  // ─── Failure handling ──────────────────────────────────────────────

  /**
   * Run a per-member lookup. Under the `skip` policy a missing object is
   * recorded and yields null; everything else propagates.
   */
  private async tolerate<T>(
    ref: DirectoryObjectRef,
    parentId: string,
    skipped: SkippedMember[],
    run: () => Promise<T>,
  ): Promise<T | null> {
    try {
      return await run();
    } catch (err) {
      if (!(err instanceof DirectoryObjectNotFoundError) || this.failurePolicy === 'abort') {
        throw err;
      }
      this.logger.warn(LogCategory.MEMBERSHIP, 'Skipping unresolvable directory object', {
        id: ref.id,
        kind: ref.kind,
        parentId,
        reason: err.message,
      });
      skipped.push({ id: ref.id, kind: ref.kind, parentId, reason: err.message });
      return null;
    }
  }

  private rootNotFound(err: unknown, detail: string): unknown {
    if (err instanceof DirectoryObjectNotFoundError) {
      this.logger.debug(LogCategory.MEMBERSHIP, 'Root group not found', { groupId: err.objectId });
      return new NotFoundException(detail);
    }
    return err;
  }
}
