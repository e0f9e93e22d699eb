import { POLICY_KEY } from '@/common/decorators/policy.decorator';
import { AuthUser } from '@/common/types/jwt.type';
import { PolicyAction } from '@/modules/policy/policy';
import { PolicyService } from '@/modules/policy/policy.service';
import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';

/**
 * Enforces `@Policy(action)` for actions decided by the actor alone.
 * Ownership checks need the loaded resource and stay in the services.
 */
@Injectable()
export class PolicyGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly policy: PolicyService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const action = this.reflector.getAllAndOverride<PolicyAction | undefined>(
      POLICY_KEY,
      [context.getHandler(), context.getClass()],
    );
    if (!action) return true;

    const { user } = context.switchToHttp().getRequest<{ user?: AuthUser }>();
    this.policy.assert(user, action);
    return true;
  }
}
