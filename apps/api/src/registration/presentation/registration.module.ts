import { Module } from '@nestjs/common';
import { UsersModule } from '@users/presentation/users.module';
import { RegistrationService } from '../application/registration.service';
import { RegistrationRepository } from '../application/ports/registration-repository';
import { KyselyRegistrationRepository } from '../infrastructure/kysely-registration.repository';
import { RegistrationController } from './registration.controller';

@Module({
  imports: [UsersModule],
  controllers: [RegistrationController],
  providers: [
    RegistrationService,
    {
      provide: RegistrationRepository,
      useClass: KyselyRegistrationRepository,
    },
  ],
})
export class RegistrationModule {}
