import { Module } from '@nestjs/common';
import { UsersModule } from '@users/presentation/users.module';
import { StaffInvitationService } from '../application/staff-invitation.service';
import { StaffRegistrationService } from '../application/staff-registration.service';
import { StaffInvitationRepository } from '../application/ports/staff-invitation-repository';
import { KyselyStaffInvitationRepository } from '../infrastructure/kysely-staff-invitation.repository';
import { StaffInvitationController } from './staff-invitation.controller';

@Module({
  imports: [UsersModule],
  controllers: [StaffInvitationController],
  providers: [
    StaffInvitationService,
    StaffRegistrationService,
    {
      provide: StaffInvitationRepository,
      useClass: KyselyStaffInvitationRepository,
    },
  ],
})
export class StaffModule {}
