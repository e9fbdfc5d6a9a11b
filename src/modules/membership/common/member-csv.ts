import type { MemberRecord } from '../../../domain/models/directory-object.model';

export const MEMBER_CSV_HEADER = ['Name', 'Kind', 'UserPrincipalName', 'PrimaryUser', 'Id'] as const;

const CSV_LINE_BREAK = '\r\n';
const NEEDS_QUOTING = /[",\r\n]/;

/** RFC 4180 field: quoted only when it holds a quote, comma or line break. */
export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Render member records as CSV. Always ends with a line break, even when empty. */
export function toCsv(records: readonly MemberRecord[]): string {
  const lines = [MEMBER_CSV_HEADER.join(',')];
  for (const record of records) {
    lines.push(
      [record.name, record.kind, record.userPrincipalName, record.primaryUser, record.id]
        .map(escapeCsvField)
        .join(','),
    );
  }
  return lines.join(CSV_LINE_BREAK) + CSV_LINE_BREAK;
}

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * `<group>-members-<YYYY-MM-DD_HH-mm-ss>.csv`, timestamp in UTC.
 * Characters outside `[A-Za-z0-9._-]` become `_`.
 */
export function buildExportFileName(groupName: string, now: Date = new Date()): string {
  const safeName = groupName.replace(/[^A-Za-z0-9._-]/g, '_') || 'group';
  const stamp =
    `${now.getUTCFullYear()}-${pad(now.getUTCMonth() + 1)}-${pad(now.getUTCDate())}` +
    `_${pad(now.getUTCHours())}-${pad(now.getUTCMinutes())}-${pad(now.getUTCSeconds())}`;
  return `${safeName}-members-${stamp}.csv`;
}
