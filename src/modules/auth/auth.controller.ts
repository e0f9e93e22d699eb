import { Public } from '@/common/decorators/public.decorator';
import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { AuthService } from './auth.service';
import { GoogleLoginDto, LoginDto, RefreshTokenDto } from './dto/auth.dto';
import { AuthTokens } from './types/auth.type';

/**
 *  POST /auth/token           ← email + password
 *  POST /auth/token/refresh   ← refresh token → new pair
 *  POST /auth/google          ← Google ID token
 */
@Public()
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('token')
  @HttpCode(HttpStatus.OK)
  login(@Body() dto: LoginDto): Promise<AuthTokens> {
    return this.authService.login(dto);
  }

  @Post('token/refresh')
  @HttpCode(HttpStatus.OK)
  refresh(@Body() dto: RefreshTokenDto): Promise<AuthTokens> {
    return this.authService.refresh(dto);
  }

  @Post('google')
  @HttpCode(HttpStatus.OK)
  loginWithGoogle(@Body() dto: GoogleLoginDto): Promise<AuthTokens> {
    return this.authService.loginWithGoogle(dto);
  }
}
