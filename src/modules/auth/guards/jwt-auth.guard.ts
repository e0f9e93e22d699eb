import { IS_PUBLIC_KEY } from '@/common/decorators/public.decorator';
import { NotAuthenticatedException } from '@/common/exceptions/domain.exception';
import { AuthUser } from '@/common/types/jwt.type';
import { ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthGuard } from '@nestjs/passport';
import { I18nService } from 'nestjs-i18n';
import { Observable } from 'rxjs';

/**
 * Global guard: every route needs a valid access token unless marked
 * `@Public()`.
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  constructor(
    private readonly reflector: Reflector,
    private readonly i18n: I18nService,
  ) {
    super();
  }

  canActivate(
    context: ExecutionContext,
  ): boolean | Promise<boolean> | Observable<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) return true;

    return super.canActivate(context);
  }

  handleRequest<TUser = AuthUser>(err: unknown, user: TUser | false): TUser {
    if (err instanceof NotAuthenticatedException) throw err;
    if (err || !user) {
      throw new NotAuthenticatedException(
        this.i18n.translate('auth.errors.notAuthenticated'),
      );
    }
    return user;
  }
}
