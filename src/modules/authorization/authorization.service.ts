import { ForbiddenException, HttpException, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { AppConfigService } from '../app/app-config.service';
import type { Viewer } from '../viewer/viewer';
import {
  authorize,
  type AuthorizationDecision,
  type AuthorizationPolicy,
  type MutationAction,
  type OwnedEntity,
} from './ownership';
import { RedirectException } from './redirect.exception';

export type DeniedDecision = Exclude<AuthorizationDecision, 'allowed'>;

/**
 * Holds the authorization policy, resolved once from config, and is the single place
 * a denied decision turns into an HTTP outcome.
 */
@Injectable()
export class AuthorizationService {
  private readonly logger = new Logger(AuthorizationService.name);
  readonly policy: AuthorizationPolicy;

  constructor(appConfig: AppConfigService) {
    this.policy = appConfig.authorizationPolicy();
  }

  authorize(viewer: Viewer | null, entity: OwnedEntity, action: MutationAction): AuthorizationDecision {
    const decision = authorize(viewer, entity, action, this.policy);
    if (decision !== 'allowed') {
      this.logger.debug(`${action} denied (${decision}) viewer=${viewer?.id ?? 'anon'} author=${entity.authorId}`);
    }
    return decision;
  }

  denialException(decision: DeniedDecision, params: { redirectTo: string; message: string }): HttpException {
    if (decision === 'denied_unauthenticated') return new UnauthorizedException('Sign in to continue.');
    if (this.policy.denialMode === 'redirect') return new RedirectException(params.redirectTo, params.message);
    return new ForbiddenException(params.message);
  }
}
