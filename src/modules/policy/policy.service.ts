import { PermissionDeniedException } from '@/common/exceptions/domain.exception';
import { Injectable } from '@nestjs/common';
import { I18nService } from 'nestjs-i18n';
import { authorize, OwnedSubject, PolicyAction, PolicyActor } from './policy';

@Injectable()
export class PolicyService {
  constructor(private readonly i18n: I18nService) {}

  can(
    actor: PolicyActor | null | undefined,
    action: PolicyAction,
    subject?: OwnedSubject,
  ): boolean {
    return authorize(actor, action, subject);
  }

  /**
   * @throws PermissionDeniedException
   */
  assert(
    actor: PolicyActor | null | undefined,
    action: PolicyAction,
    subject?: OwnedSubject,
  ): void {
    if (!authorize(actor, action, subject)) {
      throw new PermissionDeniedException(
        this.i18n.translate('auth.errors.permissionDenied'),
      );
    }
  }
}
