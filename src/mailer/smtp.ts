import nodemailer, { type SendMailOptions } from "nodemailer";
import MimeNode from "nodemailer/lib/mime-node/index.js";

export interface SmtpConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  timeoutMs: number;
}

export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

export function createSmtpTransport(config: SmtpConfig): MailTransport {
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    // Implicit TLS from the first byte (SMTPS)
    secure: true,
    auth: {
      user: config.user,
      pass: config.password,
    },
    connectionTimeout: config.timeoutMs,
    greetingTimeout: config.timeoutMs,
    socketTimeout: config.timeoutMs,
  });
}

export interface DigestMessage {
  from: string;
  to: string[];
  subject: string;
  html: string;
}

/**
 * Build a multipart/alternative message whose only alternative is the
 * HTML body.
 */
export function composeDigestMessage(message: DigestMessage): Promise<Buffer> {
  const root = new MimeNode("multipart/alternative");
  root.setHeader("From", message.from);
  root.setHeader("To", message.to.join(", "));
  root.setHeader("Subject", message.subject);
  root.createChild("text/html; charset=utf-8").setContent(message.html);

  return new Promise((resolve, reject) => {
    root.build((error, raw) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(raw);
    });
  });
}

export class DigestMailer {
  constructor(
    private readonly transport: MailTransport,
    private readonly from: string
  ) {}

  /**
   * Send one HTML message addressed to every recipient at once.
   * Transport errors propagate to the caller.
   */
  async send(subject: string, html: string, recipients: string[]): Promise<void> {
    if (recipients.length === 0) {
      throw new Error("No recipients to send the digest to");
    }

    const raw = await composeDigestMessage({ from: this.from, to: recipients, subject, html });

    await this.transport.sendMail({
      envelope: { from: this.from, to: recipients },
      raw,
    });

    console.log(`Digest "${subject}" sent to ${recipients.length} recipients`);
  }
}
