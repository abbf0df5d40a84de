import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { AppConfigService } from '../app/app-config.service';
import { BLOG_STORE, type BlogStore } from '../store/blog-store';
import { toViewer, type Viewer } from '../viewer/viewer';
import { AUTH_COOKIE_NAME } from './auth.constants';
import { hmacSha256Hex } from './auth.utils';

/**
 * Consumes sessions issued elsewhere. Only the HMAC of a session token is stored,
 * so a leaked sessions table can't be replayed as cookies.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @Inject(BLOG_STORE) private readonly store: BlogStore,
    private readonly appConfig: AppConfigService,
  ) {}

  hashSessionToken(token: string) {
    return hmacSha256Hex(this.appConfig.sessionHmacSecret(), token);
  }

  async viewerFromSessionToken(token: string | undefined): Promise<Viewer | null> {
    if (!token) return null;
    const account = await this.store.findAccountBySessionTokenHash(this.hashSessionToken(token), new Date());
    return account ? toViewer(account) : null;
  }

  async logout(token: string | undefined, res: Pick<Response, 'clearCookie'>) {
    if (token) {
      await this.store.revokeSession(this.hashSessionToken(token), new Date());
      this.logger.debug('session revoked');
    }

    this.clearAuthCookie(res);
    return { success: true };
  }

  private clearAuthCookie(res: Pick<Response, 'clearCookie'>) {
    const domain = this.appConfig.isProd() ? this.appConfig.cookieDomain() : undefined;
    res.clearCookie(AUTH_COOKIE_NAME, { path: '/', domain });
  }
}
