import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import { IEmailSender } from '../types';
import logger from '../../../utils/logger';

const SMTP_TIMEOUT_MS = 10_000;

export interface SmtpConfig {
  host: string;
  port: number;
  user: string | null;
  password: string | null;
}

/** The part of a nodemailer transporter the sender needs */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

/**
 * Sends plain-text alert emails over SMTP. Port 465 uses implicit TLS;
 * any other port must upgrade with STARTTLS.
 */
export class EmailSender implements IEmailSender {
  private transport: MailTransport | null;

  constructor(private readonly config: SmtpConfig, transport?: MailTransport) {
    this.transport = transport ?? null;
  }

  async sendEmail(recipients: readonly string[], subject: string, body: string): Promise<boolean> {
    const { user, password } = this.config;
    if (!user || !password) {
      logger.warn('email credentials not configured');
      return false;
    }

    if (recipients.length === 0) {
      logger.warn('no email recipients configured');
      return false;
    }

    await this.getTransport(user, password).sendMail({
      from: user,
      to: recipients.join(', '),
      subject,
      text: body,
    });

    logger.info({ recipients: recipients.length }, 'alert email sent');
    return true;
  }

  private getTransport(user: string, password: string): MailTransport {
    if (!this.transport) {
      const secure = this.config.port === 465;
      this.transport = nodemailer.createTransport({
        host: this.config.host,
        port: this.config.port,
        secure,
        requireTLS: !secure,
        auth: { user, pass: password },
        connectionTimeout: SMTP_TIMEOUT_MS,
        greetingTimeout: SMTP_TIMEOUT_MS,
        socketTimeout: SMTP_TIMEOUT_MS,
      });
    }
    return this.transport;
  }
}
