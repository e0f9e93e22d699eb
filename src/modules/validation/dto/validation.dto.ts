import { Transform } from 'class-transformer';
import { IsEmail, IsEnum, MaxLength } from 'class-validator';
import { ValidationType } from '../types/validation.type';

const trimLower = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

/**
 * DTO for POST /validation
 */
export class RequestValidationDto {
  @IsEmail()
  @MaxLength(254)
  @Transform(trimLower)
  email!: string;

  @IsEnum(ValidationType)
  type!: ValidationType;
}
