import {
  EmailAlreadyRegisteredException,
  EmailNotFoundException,
} from '@/common/exceptions/domain.exception';
import { normalizeEmail } from '@/common/utils/email';
import { User } from '@/database/entities';
import { MailService } from '@/modules/mail/mail.service';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { I18nService } from 'nestjs-i18n';
import { Repository } from 'typeorm';
import { RequestValidationDto } from './dto/validation.dto';
import {
  ValidationRequestResponse,
  ValidationType,
} from './types/validation.type';
import { ValidationTokenService } from './validation-token.service';

@Injectable()
export class ValidationService {
  constructor(
    @InjectRepository(User) private readonly users: Repository<User>,
    private readonly tokens: ValidationTokenService,
    private readonly mailService: MailService,
    private readonly i18n: I18nService,
  ) {}

  /**
   * Issues a validation token and emails it.
   *
   * Steps:
   *  1. Registration requires the email to be unused; reset requires it to exist.
   *  2. Persist the token (committed before delivery).
   *  3. Hand the email to the transport. A delivery failure propagates as a
   *     server error; the token stays valid for its window.
   *
   * @throws EmailAlreadyRegisteredException  type=register, email taken.
   * @throws EmailNotFoundException           type=reset_password, no such account.
   */
  async requestValidation(
    dto: RequestValidationDto,
  ): Promise<ValidationRequestResponse> {
    const email = normalizeEmail(dto.email);
    await this.assertPrecondition(email, dto.type);

    const token = await this.tokens.issue(email);
    await this.mailService.sendValidationEmail(email, token, dto.type);

    return {
      email,
      type: dto.type,
      message: this.i18n.translate('auth.success.validationSent', {
        args: { email },
      }),
    };
  }

  /**
   * @throws EmailAlreadyRegisteredException
   * @throws EmailNotFoundException
   */
  async assertPrecondition(email: string, type: ValidationType): Promise<void> {
    const exists = await this.users.existsBy({ email: normalizeEmail(email) });

    if (type === ValidationType.REGISTER && exists) {
      throw new EmailAlreadyRegisteredException(
        this.i18n.translate('auth.errors.emailExists'),
      );
    }

    if (type === ValidationType.RESET_PASSWORD && !exists) {
      throw new EmailNotFoundException(
        this.i18n.translate('auth.errors.emailNotFound'),
      );
    }
  }
}
