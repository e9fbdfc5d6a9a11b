import { BadRequestException, Injectable } from '@nestjs/common';

import type { GroupProfile, MemberRecord } from '../../../domain/models/directory-object.model';
import { AppLogger } from '../../logging/app-logger.service';
import { LogCategory } from '../../logging/log-levels';
import { buildExportFileName, toCsv } from '../common/member-csv';
import type { MembershipResolution, SkippedMember } from '../common/membership.types';

export const EXPORT_FORMATS = ['json', 'csv'] as const;
export type ExportFormat = typeof EXPORT_FORMATS[number];

export interface MembersResponse {
  group: GroupProfile;
  totalResults: number;
  members: MemberRecord[];
  traversedGroups: number;
  skipped: SkippedMember[];
}

export interface CsvExport {
  fileName: string;
  content: string;
}

/** Query value → export format. Missing means json. */
export function parseExportFormat(raw: string | undefined): ExportFormat {
  if (raw === undefined || raw === '') return 'json';
  const normalized = raw.toLowerCase();
  const format = EXPORT_FORMATS.find((f) => f === normalized);
  if (!format) {
    throw new BadRequestException(`Unsupported format '${raw}'. Use one of: ${EXPORT_FORMATS.join(', ')}.`);
  }
  return format;
}

@Injectable()
export class MemberExportService {
  constructor(private readonly logger: AppLogger) {}

  toResponse(resolution: MembershipResolution): MembersResponse {
    return {
      group: { id: resolution.rootGroup.id, displayName: resolution.rootGroup.displayName },
      totalResults: resolution.members.length,
      members: resolution.members,
      traversedGroups: resolution.traversedGroupIds.length,
      skipped: resolution.skipped,
    };
  }

  toCsvExport(resolution: MembershipResolution, now: Date = new Date()): CsvExport {
    const fileName = buildExportFileName(resolution.rootGroup.displayName, now);
    const content = toCsv(resolution.members);
    this.logger.info(LogCategory.EXPORT, 'Rendered member CSV', {
      groupId: resolution.rootGroup.id,
      fileName,
      rows: resolution.members.length,
      bytes: Buffer.byteLength(content, 'utf8'),
    });
    return { fileName, content };
  }
}
