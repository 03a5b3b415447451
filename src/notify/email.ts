// This module delivers email notifications over SMTP through nodemailer.

import nodemailer, { type SendMailOptions } from 'nodemailer';
import type { SmtpSettings } from '../config/settings.js';
import type { DeliveryOutcome, EmailPayload } from '../types/domain.js';
import { errorMessage } from '../utils/errors.js';

// This is the slice of a nodemailer transporter the channel uses; tests provide an in-memory one.
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<{ messageId: string }>;
}

export interface EmailChannelOptions {
  settings: SmtpSettings;
  transport?: MailTransport;
}

export class EmailChannel {
  private readonly settings: SmtpSettings;
  private transport?: MailTransport;

  public constructor(options: EmailChannelOptions) {
    this.settings = options.settings;
    this.transport = options.transport;
  }

  // The SMTP transport is created on first use so a gateway without SMTP still starts.
  private resolveTransport(): MailTransport | null {
    if (this.transport) {
      return this.transport;
    }

    if (!this.settings.host) {
      return null;
    }

    const transport: MailTransport = nodemailer.createTransport({
      host: this.settings.host,
      port: this.settings.port,
      secure: this.settings.port === 465,
      auth: this.settings.user ? { user: this.settings.user, pass: this.settings.password } : undefined
    });
    this.transport = transport;
    return transport;
  }

  public async deliver(payload: EmailPayload): Promise<DeliveryOutcome> {
    const transport = this.resolveTransport();
    if (!transport) {
      return { status: 'failure', reason: 'SMTP configuration not available' };
    }

    try {
      await transport.sendMail({
        from: this.settings.user,
        to: payload.to,
        cc: payload.cc.length > 0 ? payload.cc : undefined,
        bcc: payload.bcc.length > 0 ? payload.bcc : undefined,
        subject: payload.subject,
        ...(payload.isHtml ? { html: payload.body } : { text: payload.body }),
        attachments: payload.attachments.map((attachment) => ({
          filename: attachment.filename,
          content: Buffer.from(attachment.content, 'base64'),
          contentType: attachment.contentType
        }))
      });
    } catch (error) {
      return { status: 'failure', reason: errorMessage(error) };
    }

    return { status: 'success', detail: `Email sent successfully to ${payload.to}` };
  }
}
