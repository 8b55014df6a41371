/**
 * Email Service
 *
 * Delivers the digest through an authenticated SMTP transport (nodemailer).
 * A fresh transporter is created for every attempt and closed afterwards;
 * transient transport failures get one more attempt before the send is
 * reported as a DeliveryError.
 */

import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import { RETRY_DEFAULTS } from '../../config/constants.js';
import type { EmailConfig } from '../../config/env.js';
import { DeliveryError } from '../../types/errors.js';
import { describeError } from '../../utils/errorSanitizer.js';
import { createChildLogger } from '../../utils/logger.js';
import { retryWithBackoff, RetryError, type RetryPolicy } from '../../utils/retry.js';
import { TimeoutError, withTimeout } from '../../utils/withTimeout.js';

const log = createChildLogger({ component: 'EmailService' });

/**
 * The part of a nodemailer Transporter the service relies on
 */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId: string }>;
  close(): void;
}

export type TransportFactory = (config: EmailConfig) => MailTransport;

export interface EmailAttachment {
  filename: string;
  content: string;
  contentType?: string;
}

export interface EmailExtras {
  html?: string;
  attachments?: EmailAttachment[];
}

/**
 * Email service interface
 */
export interface IEmailService {
  /**
   * Send one message
   * @throws DeliveryError once the retry budget is spent
   */
  send(recipient: string, subject: string, body: string, extras?: EmailExtras): Promise<void>;
}

/** Connection-level failures worth another attempt */
const TRANSIENT_CODES = new Set(['ETIMEDOUT', 'ECONNECTION', 'ESOCKET', 'EDNS', 'ECONNRESET', 'ECONNREFUSED']);

function errorCode(error: unknown): unknown {
  return error && typeof error === 'object' && 'code' in error ? error.code : undefined;
}

function responseCodeOf(error: unknown): unknown {
  return error && typeof error === 'object' && 'responseCode' in error ? error.responseCode : undefined;
}

/**
 * SMTP 4xx replies and connection problems are transient; 5xx replies
 * (rejected credentials, refused recipient) and EAUTH without a reply
 * (missing or unsupported credentials) are not.
 */
export function isTransientSmtpError(error: unknown): boolean {
  if (error instanceof TimeoutError) return true;

  const responseCode = responseCodeOf(error);
  if (typeof responseCode === 'number') {
    return responseCode >= 400 && responseCode < 500;
  }

  const code = errorCode(error);
  return typeof code === 'string' && TRANSIENT_CODES.has(code);
}

/**
 * SMTP over TLS on 465, STARTTLS required on any other port
 */
export const createSmtpTransport: TransportFactory = (config) =>
  nodemailer.createTransport({
    host: config.smtpHost,
    port: config.smtpPort,
    secure: config.smtpPort === 465,
    requireTLS: config.smtpPort !== 465,
    auth: {
      user: config.senderEmail,
      pass: config.senderCredential,
    },
    connectionTimeout: config.timeoutMs,
    greetingTimeout: config.timeoutMs,
    socketTimeout: config.timeoutMs,
  });

export interface EmailServiceOptions {
  createTransport?: TransportFactory;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Nodemailer-based email service implementation
 */
export class NodemailerEmailService implements IEmailService {
  private readonly createTransport: TransportFactory;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly policy: RetryPolicy;

  constructor(private readonly config: EmailConfig, options: EmailServiceOptions = {}) {
    this.createTransport = options.createTransport ?? createSmtpTransport;
    this.sleep = options.sleep;
    this.policy = {
      maxAttempts: config.maxAttempts,
      initialDelay: config.retryBaseDelayMs,
      maxDelay: RETRY_DEFAULTS.MAX_DELAY_MS,
      multiplier: RETRY_DEFAULTS.MULTIPLIER,
      isRetryable: isTransientSmtpError,
    };
  }

  async send(recipient: string, subject: string, body: string, extras: EmailExtras = {}): Promise<void> {
    const mail: SendMailOptions = {
      from: this.config.senderEmail,
      to: recipient,
      subject,
      text: body,
      ...(extras.html !== undefined && { html: extras.html }),
      ...(extras.attachments && extras.attachments.length > 0 && { attachments: extras.attachments }),
    };
    const secrets = [this.config.senderCredential];

    log.info(
      { to: recipient, subject, textLength: body.length, attachments: extras.attachments?.length ?? 0 },
      'Sending email via SMTP'
    );

    try {
      const info = await retryWithBackoff(
        () => this.attempt(mail),
        this.policy,
        {
          context: 'SMTP send',
          sleep: this.sleep,
          formatError: (error) => describeError(error, secrets),
        }
      );
      log.info({ messageId: info.messageId, to: recipient }, 'Email sent successfully');
    } catch (error) {
      const attempts = error instanceof RetryError ? error.attempts : 1;
      const cause = error instanceof RetryError ? error.lastError : error;
      const reason = describeError(cause, secrets);

      log.error(
        { to: recipient, attempts, code: errorCode(cause), responseCode: responseCodeOf(cause), error: reason },
        'Failed to send email'
      );
      throw new DeliveryError(`Email delivery failed after ${attempts} attempt(s): ${reason}`, attempts);
    }
  }

  private async attempt(mail: SendMailOptions): Promise<{ messageId: string }> {
    const transport = this.createTransport(this.config);
    try {
      return await withTimeout(transport.sendMail(mail), this.config.timeoutMs, 'Email send');
    } finally {
      transport.close();
    }
  }
}
