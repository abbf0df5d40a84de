import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { getSessionCookie } from '../../common/session-cookie';
import type { ViewerRequest } from '../viewer/viewer.decorator';
import { AuthService } from './auth.service';

@Injectable()
export class OptionalAuthGuard implements CanActivate {
  constructor(private readonly auth: AuthService) {}

  async canActivate(context: ExecutionContext) {
    const req = context.switchToHttp().getRequest<ViewerRequest>();
    const token = getSessionCookie(req);
    req.viewer = await this.auth.viewerFromSessionToken(token);
    return true;
  }
}
