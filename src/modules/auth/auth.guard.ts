import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { getSessionCookie } from '../../common/session-cookie';
import type { ViewerRequest } from '../viewer/viewer.decorator';
import { AuthService } from './auth.service';

@Injectable()
export class AuthGuard implements CanActivate {
  constructor(private readonly auth: AuthService) {}

  async canActivate(context: ExecutionContext) {
    const req = context.switchToHttp().getRequest<ViewerRequest>();
    const token = getSessionCookie(req);
    const viewer = await this.auth.viewerFromSessionToken(token);
    if (!viewer) throw new UnauthorizedException();
    req.viewer = viewer;
    return true;
  }
}
