import { Controller, Get, Param, Query, Res } from '@nestjs/common';
import type { Response } from 'express';

import type { MembershipResolution } from '../common/membership.types';
import { GroupMembershipResolverService } from '../services/group-membership-resolver.service';
import { MemberExportService, parseExportFormat, type MembersResponse } from '../services/member-export.service';

/**
 * Transitive group membership.
 * Routes: /api/groups/{groupId}/members, /api/groups/by-name/{groupName}/members
 *
 * `?format=csv` returns a file download instead of the JSON summary.
 */
@Controller('groups')
export class GroupMembershipController {
  constructor(
    private readonly resolver: GroupMembershipResolverService,
    private readonly exporter: MemberExportService,
  ) {}

  @Get('by-name/:groupName/members')
  async getMembersByName(
    @Param('groupName') groupName: string,
    @Res({ passthrough: true }) res: Response,
    @Query('format') format?: string,
  ): Promise<MembersResponse | string> {
    const exportFormat = parseExportFormat(format);
    const resolution = await this.resolver.resolveByName(groupName);
    return exportFormat === 'csv' ? this.sendCsv(resolution, res) : this.exporter.toResponse(resolution);
  }

  @Get(':groupId/members')
  async getMembers(
    @Param('groupId') groupId: string,
    @Res({ passthrough: true }) res: Response,
    @Query('format') format?: string,
  ): Promise<MembersResponse | string> {
    const exportFormat = parseExportFormat(format);
    const resolution = await this.resolver.expand(groupId);
    return exportFormat === 'csv' ? this.sendCsv(resolution, res) : this.exporter.toResponse(resolution);
  }

  private sendCsv(resolution: MembershipResolution, res: Response): string {
    const { fileName, content } = this.exporter.toCsvExport(resolution);
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="${fileName}"`);
    return content;
  }
}
