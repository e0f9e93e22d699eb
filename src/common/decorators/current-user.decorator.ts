import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { AuthUser } from '../types/jwt.type';

/**
 * Injects the authenticated user (or one of its fields) into a handler.
 * Resolves to undefined on public routes reached without a bearer token.
 */
export const CurrentUser = createParamDecorator(
  (
    field: keyof AuthUser | undefined,
    ctx: ExecutionContext,
  ): AuthUser | AuthUser[keyof AuthUser] | undefined => {
    const { user } = ctx.switchToHttp().getRequest<{ user?: AuthUser }>();

    if (!user) return undefined;
    return field ? user[field] : user;
  },
);
