import { PolicyAction } from '@/modules/policy/policy';
import { CustomDecorator, SetMetadata } from '@nestjs/common';

export const POLICY_KEY = 'policy';

/**
 * Declares the action a route performs. PolicyGuard evaluates it against the
 * authenticated user before the handler runs.
 */
export const Policy = (action: PolicyAction): CustomDecorator<string> =>
  SetMetadata(POLICY_KEY, action);
