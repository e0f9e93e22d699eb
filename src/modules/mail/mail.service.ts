import { ValidationType } from '@/modules/validation/types/validation.type';
import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { I18nService } from 'nestjs-i18n';
import * as nodemailer from 'nodemailer';
import { Transporter } from 'nodemailer';

@Injectable()
export class MailService implements OnModuleInit {
  private readonly logger = new Logger(MailService.name);
  private transporter: Transporter | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly i18n: I18nService,
  ) {}

  onModuleInit(): void {
    const host = this.configService.get<string>('mail.host');
    const port = this.configService.get<number>('mail.port');
    const user = this.configService.get<string>('mail.user');
    const password = this.configService.get<string>('mail.password');

    if (!host || !port || !user || !password) {
      this.logger.warn(
        'Email configuration is incomplete. Email service will be disabled.',
      );
      return;
    }

    this.transporter = nodemailer.createTransport({
      host,
      port,
      secure: port === 465,
      auth: {
        user,
        pass: password,
      },
    });

    this.logger.log('Email service initialized');
  }

  /**
   * Sends the validation code for a registration or password reset, plus a
   * link carrying the same values for the frontend.
   *
   * A transport failure is logged and rethrown; the token row is left in place.
   */
  async sendValidationEmail(
    email: string,
    token: string,
    type: ValidationType,
  ): Promise<void> {
    if (!this.transporter) {
      this.logger.warn(
        `Email transporter not initialized, skipping ${type} email to ${email}`,
      );
      return;
    }

    const fromEmail =
      this.configService.get<string>('mail.from') ?? 'noreply@example.com';
    const link = this.buildValidationLink(email, token, type);

    const { subject, heading, body } = this.validationCopy(type);

    try {
      await this.transporter.sendMail({
        from: fromEmail,
        to: email,
        subject,
        html: `
          <h1>${heading}</h1>
          <p>${body}</p>
          <p><strong>${token}</strong></p>
          <a href="${link}">${link}</a>
        `,
      });
      this.logger.log(`Validation email (${type}) sent to ${email}`);
    } catch (error) {
      this.logger.error(
        `Failed to send validation email to ${email}:`,
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }

  private validationCopy(type: ValidationType): {
    subject: string;
    heading: string;
    body: string;
  } {
    switch (type) {
      case ValidationType.REGISTER:
        return {
          subject: this.i18n.translate('mail.validation.register.subject'),
          heading: this.i18n.translate('mail.validation.register.heading'),
          body: this.i18n.translate('mail.validation.register.body'),
        };
      case ValidationType.RESET_PASSWORD:
        return {
          subject: this.i18n.translate('mail.validation.reset_password.subject'),
          heading: this.i18n.translate('mail.validation.reset_password.heading'),
          body: this.i18n.translate('mail.validation.reset_password.body'),
        };
    }
  }

  buildValidationLink(
    email: string,
    token: string,
    type: ValidationType,
  ): string {
    const base = this.configService.get<string>(
      'frontend.url',
      'http://localhost:5173',
    );
    const query = new URLSearchParams({ email, token, type });

    return `${base.replace(/\/+$/, '')}/validate?${query.toString()}`;
  }
}
