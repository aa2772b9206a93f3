/**
 * Email delivery for owner notifications and admin reports.
 *
 * Three senders share the EmailSender interface:
 * - LogOnlyEmailSender when SEND_EMAIL is off (bodies go to the log)
 * - SmtpEmailSender when SMTP_HOST is set (works with the SES SMTP interface)
 * - SesEmailSender otherwise, through the SES API
 *
 * A failed delivery is logged and reported as `false`.
 */

import { SESClient, SendEmailCommand } from '@aws-sdk/client-ses';
import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import type { Config, EmailMessage, EmailSender } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('power-control:email');

export const SES_CONFIGURATION_SET_HEADER = 'X-SES-CONFIGURATION-SET';

export class LogOnlyEmailSender implements EmailSender {
  async send(message: EmailMessage): Promise<boolean> {
    logger.warn(
      { to: message.to, subject: message.subject, body: message.html },
      `Not sending email to ${message.to}`
    );
    return true;
  }
}

type SmtpSettings = Pick<
  Config,
  'smtpHost' | 'smtpPort' | 'smtpUsername' | 'smtpPassword' | 'awsSesConfigurationSet'
>;

export class SmtpEmailSender implements EmailSender {
  private readonly transporter: Transporter<SMTPTransport.SentMessageInfo>;
  private readonly configurationSet: string;

  constructor(settings: SmtpSettings) {
    this.configurationSet = settings.awsSesConfigurationSet;
    this.transporter = nodemailer.createTransport({
      host: settings.smtpHost,
      port: settings.smtpPort,
      // implicit TLS on 465, STARTTLS elsewhere
      secure: settings.smtpPort === 465,
      auth: settings.smtpUsername
        ? { user: settings.smtpUsername, pass: settings.smtpPassword }
        : undefined,
    });
  }

  async send(message: EmailMessage): Promise<boolean> {
    logger.warn(`Sending email to ${message.to}`);

    try {
      const info = await this.transporter.sendMail({
        from: message.from,
        to: message.to,
        subject: message.subject,
        html: message.html,
        headers: this.configurationSet
          ? { [SES_CONFIGURATION_SET_HEADER]: this.configurationSet }
          : undefined,
      });

      if (info.rejected.length > 0) {
        logger.error({ to: message.to, rejected: info.rejected }, 'SMTP server rejected recipient');
        return false;
      }

      logger.debug({ to: message.to, messageId: info.messageId }, 'Email sent via SMTP');
      return true;
    } catch (error) {
      logger.error({ to: message.to, error: String(error) }, 'Failed to send email via SMTP');
      return false;
    }
  }
}

type SesSettings = Pick<Config, 'awsDefaultRegion' | 'awsSesConfigurationSet'>;

export class SesEmailSender implements EmailSender {
  private readonly client: SESClient;
  private readonly configurationSet: string;

  /**
   * @param settings - Region and optional configuration set
   * @param client - Optional SES client for testing
   */
  constructor(settings: SesSettings, client?: SESClient) {
    this.configurationSet = settings.awsSesConfigurationSet;
    this.client = client ?? new SESClient({ region: settings.awsDefaultRegion });
  }

  async send(message: EmailMessage): Promise<boolean> {
    logger.warn(`Sending email to ${message.to}`);

    try {
      const response = await this.client.send(
        new SendEmailCommand({
          Source: message.from,
          Destination: { ToAddresses: [message.to] },
          Message: {
            Subject: { Data: message.subject, Charset: 'UTF-8' },
            Body: { Html: { Data: message.html, Charset: 'UTF-8' } },
          },
          ConfigurationSetName: this.configurationSet || undefined,
        })
      );

      logger.debug({ to: message.to, messageId: response.MessageId }, 'Email sent via SES');
      return true;
    } catch (error) {
      logger.error(
        {
          to: message.to,
          errorName: error instanceof Error ? error.name : undefined,
          error: String(error),
        },
        'Failed to send email via SES'
      );
      return false;
    }
  }
}

/**
 * Pick the sender matching the configuration.
 */
export function createEmailSender(config: Config): EmailSender {
  if (!config.sendEmail) {
    return new LogOnlyEmailSender();
  }
  if (config.smtpHost) {
    logger.debug({ host: config.smtpHost, port: config.smtpPort }, 'Using SMTP transport');
    return new SmtpEmailSender(config);
  }
  logger.debug({ region: config.awsDefaultRegion }, 'Using SES transport');
  return new SesEmailSender(config);
}
