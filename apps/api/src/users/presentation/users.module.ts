import { Inject, Module, type OnModuleInit } from '@nestjs/common';
import { EventProcessor } from '@platform/application/events/event-processor';
import { CredentialService } from '../application/credential.service';
import { StudentQueryService } from '../application/student-query.service';
import { StudentRegistrationHandler } from '../application/student-registration.handler';
import { StaffRepository } from '../application/ports/staff-repository';
import { StudentRepository } from '../application/ports/student-repository';
import { UserDirectory } from '../application/ports/user-directory';
import { KyselyStaffRepository } from '../infrastructure/kysely-staff.repository';
import { KyselyStudentRepository } from '../infrastructure/kysely-student.repository';
import { KyselyUserDirectory } from '../infrastructure/kysely-user-directory';
import { AuthController } from './auth.controller';
import { StudentController } from './student.controller';

@Module({
  controllers: [AuthController, StudentController],
  providers: [
    CredentialService,
    StudentQueryService,
    StudentRegistrationHandler,
    { provide: StudentRepository, useClass: KyselyStudentRepository },
    { provide: StaffRepository, useClass: KyselyStaffRepository },
    { provide: UserDirectory, useClass: KyselyUserDirectory },
  ],
  exports: [StaffRepository, UserDirectory],
})
export class UsersModule implements OnModuleInit {
  constructor(
    @Inject(EventProcessor) private readonly processor: EventProcessor,
    @Inject(StudentRegistrationHandler)
    private readonly studentRegistration: StudentRegistrationHandler
  ) {}

  onModuleInit(): void {
    this.processor.addHandler(this.studentRegistration.asEventHandler());
  }
}
