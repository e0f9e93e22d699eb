import { Transform } from 'class-transformer';
import { IsEmail, IsNotEmpty, IsString, MaxLength } from 'class-validator';

const trimLower = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

/**
 * DTO for POST /auth/token
 */
export class LoginDto {
  @IsEmail()
  @IsNotEmpty()
  @Transform(trimLower)
  email!: string;

  @MaxLength(128)
  @IsNotEmpty()
  @IsString()
  password!: string;
}

/**
 * DTO for POST /auth/token/refresh
 */
export class RefreshTokenDto {
  @IsNotEmpty()
  @IsString()
  refreshToken!: string;
}

/**
 * DTO for POST /auth/google
 */
export class GoogleLoginDto {
  /** Google ID token from the client-side sign-in flow. */
  @IsNotEmpty()
  @IsString()
  credential!: string;
}
