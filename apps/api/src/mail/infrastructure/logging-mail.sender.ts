import { Injectable, Logger } from '@nestjs/common';
import { redactEmail } from '@platform/logging/redact';
import { MailSender, type MailMessage } from '../application/ports/mail-sender';

/**
 * Writes outgoing mail to the application log instead of delivering it.
 */
@Injectable()
export class LoggingMailSender extends MailSender {
  private readonly logger = new Logger(LoggingMailSender.name);

  async send(message: MailMessage, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.logger.log(
      `Mail to ${redactEmail(message.to)}: "${message.subject}"\n${message.body}`
    );
  }
}
