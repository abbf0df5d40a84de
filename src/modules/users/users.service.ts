import { Inject, Injectable, Logger, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { BLOG_STORE, type Account, type BlogStore, type PostRecord, type UpdateProfileData } from '../store/blog-store';
import { VisibilityService } from '../visibility/visibility.service';
import { isViewerAccount, type Viewer } from '../viewer/viewer';
import type { Page, PageRequest } from '../../common/pagination/page';

export type Profile = {
  account: Account;
  isOwner: boolean;
  page: Page<PostRecord>;
};

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @Inject(BLOG_STORE) private readonly store: BlogStore,
    private readonly visibility: VisibilityService,
  ) {}

  /**
   * An account's posts as the viewer may see them. The owner gets every post of theirs,
   * drafts and scheduled ones included, through the visibility author clause.
   */
  async getProfile(params: { viewer: Viewer | null; username: string; page: PageRequest }): Promise<Profile> {
    const username = params.username.trim();
    const account = username ? await this.store.findAccountByUsername(username) : null;
    if (!account) throw new NotFoundException('User not found.');

    const isOwner = isViewerAccount(params.viewer, account.id);
    const { page } = await this.visibility.resolvePage(params.viewer, { authorId: account.id }, params.page);
    return { account, isOwner, page };
  }

  async me(viewer: Viewer | null): Promise<Account> {
    if (!viewer) throw new UnauthorizedException();
    const account = await this.store.findAccountById(viewer.id);
    // Session outlived its account.
    if (!account) throw new UnauthorizedException();
    return account;
  }

  /** Always targets the viewer's own account; there is no way to address another. */
  async updateOwnProfile(viewer: Viewer | null, data: UpdateProfileData): Promise<Account> {
    if (!viewer) throw new UnauthorizedException();
    const updated = await this.store.updateAccountProfile(viewer.id, data);
    if (!updated) throw new UnauthorizedException();
    this.logger.log(`profile updated account=${viewer.id}`);
    return updated;
  }
}
