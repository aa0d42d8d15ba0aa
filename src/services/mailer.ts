import nodemailer, { Transporter } from 'nodemailer';
import { env } from '../config/env';

export type MailAttachment = { filename: string; content: Buffer };

export interface Mailer {
  send(message: { to: string; subject: string; text: string; attachments?: MailAttachment[] }): Promise<void>;
}

export class SmtpNotConfiguredError extends Error {
  constructor() {
    super('SMTP not configured. Set SMTP_HOST, SMTP_USER, SMTP_PASS env vars.');
    this.name = 'SmtpNotConfiguredError';
  }
}

export class NodemailerMailer implements Mailer {
  constructor(
    private readonly transporter: Transporter | null,
    private readonly from: string
  ) {}

  async send(message: { to: string; subject: string; text: string; attachments?: MailAttachment[] }): Promise<void> {
    if (!this.transporter) throw new SmtpNotConfiguredError();
    await this.transporter.sendMail({ from: this.from, ...message });
  }
}

export function createMailerFromEnv(): Mailer {
  if (!env.SMTP_HOST || !env.SMTP_USER || !env.SMTP_PASS) {
    console.warn('SMTP not configured; payslip emails are disabled');
    return new NodemailerMailer(null, '');
  }
  const transporter = nodemailer.createTransport({
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    secure: env.SMTP_PORT === 465,
    auth: { user: env.SMTP_USER, pass: env.SMTP_PASS }
  });
  return new NodemailerMailer(transporter, env.SMTP_FROM ?? env.SMTP_USER);
}
