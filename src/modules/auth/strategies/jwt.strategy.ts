import { NotAuthenticatedException } from '@/common/exceptions/domain.exception';
import { AuthUser, JwtPayload, TokenType } from '@/common/types/jwt.type';
import { User } from '@/database/entities';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { InjectRepository } from '@nestjs/typeorm';
import { I18nService } from 'nestjs-i18n';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { Repository } from 'typeorm';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(
    private readonly i18n: I18nService,
    @InjectRepository(User) private readonly users: Repository<User>,
    configService: ConfigService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.get<string>('jwt.secret') ?? '',
    });
  }

  async validate(payload: JwtPayload): Promise<AuthUser> {
    // Refresh tokens only work at /auth/token/refresh
    if (payload.type !== TokenType.ACCESS) {
      throw new NotAuthenticatedException(
        this.i18n.translate('auth.errors.notAuthenticated'),
      );
    }

    // Fresh row, so staff changes and deactivation apply immediately
    const user = await this.users.findOneBy({
      id: Number(payload.sub),
      isActive: true,
    });

    if (!user) {
      throw new NotAuthenticatedException(
        this.i18n.translate('auth.errors.notAuthenticated'),
      );
    }

    return {
      id: user.id,
      email: user.email,
      username: user.username,
      isStaff: user.isStaff,
    };
  }
}
