import { Inject, Injectable, Logger } from '@nestjs/common';
import * as nodemailer from 'nodemailer';
import { Transporter } from 'nodemailer';
import { mailConfig, MailConfig } from '../config/configuration';

export interface MailMessage {
  to: string | string[];
  subject: string;
  text: string;
  html?: string;
}

@Injectable()
export class MailService {
  private readonly logger = new Logger(MailService.name);
  private readonly transporter: Transporter | null;

  constructor(
    @Inject(mailConfig.KEY)
    private readonly config: MailConfig,
  ) {
    this.transporter = config.enabled
      ? nodemailer.createTransport({
          host: config.host,
          port: config.port,
          secure: config.secure,
          auth: config.user ? { user: config.user, pass: config.password } : undefined,
        })
      : null;
    if (!this.transporter) {
      this.logger.log('Mail delivery disabled');
    }
  }

  get enabled(): boolean {
    return this.transporter !== null;
  }

  /** Resolves to false when delivery is disabled or there is nobody to send to. */
  async send(message: MailMessage): Promise<boolean> {
    const recipients = (Array.isArray(message.to) ? message.to : [message.to]).filter(
      (address) => address.length > 0,
    );
    if (!this.transporter || recipients.length === 0) return false;

    await this.transporter.sendMail({
      from: this.config.from,
      to: recipients,
      subject: message.subject,
      text: message.text,
      html: message.html,
    });
    return true;
  }
}
