import type {
  DirectoryObjectKind,
  GroupProfile,
  MemberRecord,
} from '../../../domain/models/directory-object.model';

/**
 * What the resolver does when a single member (or a device owner) cannot be
 * looked up because the directory no longer has it:
 *   - skip:  log a warning, record it in `skipped`, keep traversing
 *   - abort: propagate the error and fail the whole resolution
 */
export type MemberLookupFailurePolicy = 'skip' | 'abort';

export const MEMBER_LOOKUP_FAILURE_POLICIES: readonly MemberLookupFailurePolicy[] = ['skip', 'abort'];

export interface SkippedMember {
  id: string;
  kind: DirectoryObjectKind;
  /** Group (or device, for owners) that referenced the object. */
  parentId: string;
  reason: string;
}

export interface MembershipResolution {
  rootGroup: GroupProfile;
  /** One record per distinct id; the root group itself never appears. */
  members: MemberRecord[];
  /** Every group expanded during the run, in visit order, root first. */
  traversedGroupIds: string[];
  skipped: SkippedMember[];
}
