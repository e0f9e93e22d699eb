import { Public } from '@/common/decorators/public.decorator';
import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { RequestValidationDto } from './dto/validation.dto';
import { ValidationRequestResponse } from './types/validation.type';
import { ValidationService } from './validation.service';

/**
 *  POST /validation   ← email a single-use token for register / reset_password
 *
 * The token is redeemed by POST /users (register) or POST /password-reset.
 */
@Controller('validation')
export class ValidationController {
  constructor(private readonly validationService: ValidationService) {}

  @Public()
  @Post()
  @HttpCode(HttpStatus.OK)
  request(
    @Body() dto: RequestValidationDto,
  ): Promise<ValidationRequestResponse> {
    return this.validationService.requestValidation(dto);
  }
}
