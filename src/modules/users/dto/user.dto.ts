import { AUTH_CONSTANTS } from '@/common/constants/auth.constants';
import { Transform } from 'class-transformer';
import {
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  MinLength,
} from 'class-validator';

/**
 * Custom transform functions
 */
const trim = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;

const trimLower = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

const USERNAME_PATTERN = /^[\w.@+-]+$/;

/**
 * DTO for POST /users
 */
export class RegisterDto {
  @IsEmail()
  @MaxLength(254)
  @Transform(trimLower)
  email!: string;

  @Matches(USERNAME_PATTERN, {
    message:
      'username may contain only letters, digits and @/./+/-/_ characters',
  })
  @MaxLength(150)
  @IsNotEmpty()
  @Transform(trim)
  username!: string;

  @MaxLength(AUTH_CONSTANTS.PASSWORD_MAX_LENGTH)
  @MinLength(AUTH_CONSTANTS.PASSWORD_MIN_LENGTH)
  @IsString()
  password!: string;

  /** Validation token emailed by POST /validation (type=register). */
  @IsNotEmpty()
  @IsString()
  @Transform(trim)
  token!: string;

  @IsOptional()
  @MaxLength(150)
  @IsString()
  @Transform(trim)
  firstName?: string;

  @IsOptional()
  @MaxLength(150)
  @IsString()
  @Transform(trim)
  lastName?: string;
}

/**
 * DTO for PATCH /users/:id
 */
export class UpdateUserDto {
  @IsOptional()
  @Matches(USERNAME_PATTERN, {
    message:
      'username may contain only letters, digits and @/./+/-/_ characters',
  })
  @MaxLength(150)
  @IsNotEmpty()
  @Transform(trim)
  username?: string;

  @IsOptional()
  @MaxLength(150)
  @IsString()
  @Transform(trim)
  firstName?: string;

  @IsOptional()
  @MaxLength(150)
  @IsString()
  @Transform(trim)
  lastName?: string;

  @IsOptional()
  @MaxLength(AUTH_CONSTANTS.PASSWORD_MAX_LENGTH)
  @MinLength(AUTH_CONSTANTS.PASSWORD_MIN_LENGTH)
  @IsString()
  password?: string;
}

/**
 * DTO for POST /password-reset
 */
export class ResetPasswordDto {
  @IsEmail()
  @Transform(trimLower)
  email!: string;

  @IsNotEmpty()
  @IsString()
  @Transform(trim)
  token!: string;

  @MaxLength(AUTH_CONSTANTS.PASSWORD_MAX_LENGTH)
  @MinLength(AUTH_CONSTANTS.PASSWORD_MIN_LENGTH)
  @IsString()
  newPassword!: string;
}

/**
 * Query for GET /users
 */
export class ListUsersQueryDto {
  @IsOptional()
  @IsString()
  page?: string;

  @IsOptional()
  @IsString()
  page_size?: string;
}
