export type MailMessage = Readonly<{
  to: string;
  subject: string;
  body: string;
}>;

export abstract class MailSender {
  abstract send(message: MailMessage, signal?: AbortSignal): Promise<void>;
}
