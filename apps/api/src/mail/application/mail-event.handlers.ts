import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  registrationEventTypes,
  staffInvitationEventTypes,
  userEventTypes,
} from '@campus-id/domain';
import {
  defineEventHandler,
  type EventHandler,
} from '@platform/application/events/event-handler';
import { redactEmail } from '@platform/logging/redact';
import { MailSender } from './ports/mail-sender';

export const MAIL_OPTIONS = Symbol('MAIL_OPTIONS');

export type MailOptions = Readonly<{
  /** Accept link prefix; the invitation code is appended as a path segment. */
  staffInvitationBaseUrl: string;
}>;

export const REGISTRATION_MAIL_GROUP = 'mail.registration';
export const STAFF_INVITATION_MAIL_GROUP = 'mail.staff-invitation';
export const STUDENT_WELCOME_MAIL_HANDLER = 'SendStudentWelcomeMail';

export class RecipientsDeliveryError extends Error {
  constructor(
    readonly failed: ReadonlyArray<string>,
    readonly total: number
  ) {
    super(`Mail delivery failed for ${failed.length} of ${total} recipient(s)`);
    this.name = 'RecipientsDeliveryError';
  }
}

/**
 * Outgoing mail triggered by registration, invitation and user events.
 */
@Injectable()
export class MailEventHandlers {
  private readonly logger = new Logger(MailEventHandlers.name);

  constructor(
    @Inject(MailSender) private readonly sender: MailSender,
    @Inject(MAIL_OPTIONS) private readonly options: MailOptions
  ) {}

  registrationHandlers(): EventHandler[] {
    return [
      defineEventHandler(
        'SendRegistrationCode',
        registrationEventTypes.registrationStarted,
        (event, signal) =>
          this.sendVerificationCode(event.email, event.verificationCode, signal)
      ),
      defineEventHandler(
        'SendResentRegistrationCode',
        registrationEventTypes.registrationCodeResent,
        (event, signal) =>
          this.sendVerificationCode(event.email, event.verificationCode, signal)
      ),
    ];
  }

  staffInvitationHandlers(): EventHandler[] {
    return [
      defineEventHandler(
        'SendStaffInvitation',
        staffInvitationEventTypes.staffInvitationCreated,
        (event, signal) =>
          this.sendInvitations(event.code, event.recipientsEmail, signal)
      ),
      defineEventHandler(
        'SendStaffInvitationToAdded',
        staffInvitationEventTypes.staffInvitationRecipientsUpdated,
        (event, signal) =>
          this.sendInvitations(event.code, event.addedRecipientsEmail, signal)
      ),
    ];
  }

  studentWelcomeHandler(): EventHandler {
    return defineEventHandler(
      STUDENT_WELCOME_MAIL_HANDLER,
      userEventTypes.studentRegistered,
      (event, signal) =>
        this.sender.send(
          {
            to: event.email,
            subject: 'Welcome to Campus ID',
            body: `Hello ${event.firstName} ${event.lastName},\n\nYour registration is complete.`,
          },
          signal
        )
    );
  }

  invitationLink(code: string, email: string): string {
    return `${this.options.staffInvitationBaseUrl}/${code}?email=${encodeURIComponent(email)}`;
  }

  private async sendVerificationCode(
    email: string,
    code: string,
    signal: AbortSignal
  ): Promise<void> {
    await this.sender.send(
      {
        to: email,
        subject: 'Email Verification Code',
        body: `Your email verification code is: ${code}`,
      },
      signal
    );
  }

  private async sendInvitations(
    code: string,
    recipients: ReadonlyArray<string>,
    signal: AbortSignal
  ): Promise<void> {
    if (recipients.length === 0) {
      this.logger.debug('No recipients to invite');
      return;
    }
    const failed: string[] = [];
    for (const email of recipients) {
      try {
        await this.sender.send(
          {
            to: email,
            subject: 'Staff Invitation',
            body:
              'You have been invited to join as staff. ' +
              'Use the following link to accept the invitation:\n\n' +
              this.invitationLink(code, email),
          },
          signal
        );
      } catch (error) {
        failed.push(redactEmail(email));
        this.logger.error(
          `Staff invitation mail to ${redactEmail(email)} failed`,
          error instanceof Error ? error.stack : String(error)
        );
      }
    }
    if (failed.length > 0) {
      throw new RecipientsDeliveryError(failed, recipients.length);
    }
  }
}
