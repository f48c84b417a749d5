import { Inject, Module, type OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../../config/app.config';
import { EventProcessor } from '@platform/application/events/event-processor';
import {
  MAIL_OPTIONS,
  MailEventHandlers,
  REGISTRATION_MAIL_GROUP,
  STAFF_INVITATION_MAIL_GROUP,
  type MailOptions,
} from '../application/mail-event.handlers';
import { MailSender } from '../application/ports/mail-sender';
import { LoggingMailSender } from '../infrastructure/logging-mail.sender';

@Module({
  providers: [
    MailEventHandlers,
    { provide: MailSender, useClass: LoggingMailSender },
    {
      provide: MAIL_OPTIONS,
      useFactory: (config: ConfigService<AppConfig, true>): MailOptions => ({
        staffInvitationBaseUrl: config
          .get('STAFF_INVITATION_BASE_URL', { infer: true })
          .replace(/\/+$/, ''),
      }),
      inject: [ConfigService],
    },
  ],
})
export class MailModule implements OnModuleInit {
  constructor(
    @Inject(EventProcessor) private readonly processor: EventProcessor,
    @Inject(MailEventHandlers) private readonly handlers: MailEventHandlers
  ) {}

  onModuleInit(): void {
    this.processor.addHandlersGroup(
      REGISTRATION_MAIL_GROUP,
      this.handlers.registrationHandlers()
    );
    this.processor.addHandlersGroup(
      STAFF_INVITATION_MAIL_GROUP,
      this.handlers.staffInvitationHandlers()
    );
    this.processor.addHandler(this.handlers.studentWelcomeHandler());
  }
}
