import { Module } from '@nestjs/common';

import { DirectoryClientModule } from '../../infrastructure/directory/directory-client.module';
import { GroupMembershipController } from './controllers/group-membership.controller';
import { HealthController } from './controllers/health.controller';
import { GroupMembershipResolverService } from './services/group-membership-resolver.service';
import { MemberExportService } from './services/member-export.service';

@Module({
  imports: [DirectoryClientModule.register()],
  controllers: [GroupMembershipController, HealthController],
  providers: [GroupMembershipResolverService, MemberExportService],
  exports: [GroupMembershipResolverService],
})
export class MembershipModule {}
