import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { AppConfigService } from '../app/app-config.service';
import { BLOG_STORE, type BlogStore, type Category, type PostRecord, type PostScope } from '../store/blog-store';
import { paginate, type Page, type PageRequest } from '../../common/pagination/page';
import type { Viewer } from '../viewer/viewer';
import {
  comparePostsNewestFirst,
  isCategoryVisibleTo,
  isVisibleTo,
  type VisibilityPolicy,
} from './visibility.rules';

export type VisibilityScope = {
  categorySlug?: string;
  authorId?: number;
};

export type ResolvedPosts = {
  /** Set when the scope named a category. */
  category: Category | null;
  posts: PostRecord[];
};

@Injectable()
export class VisibilityService {
  private readonly policy: VisibilityPolicy;

  constructor(
    @Inject(BLOG_STORE) private readonly store: BlogStore,
    appConfig: AppConfigService,
  ) {
    this.policy = appConfig.visibilityPolicy();
  }

  isVisible(viewer: Viewer | null, post: PostRecord, now = new Date()): boolean {
    return isVisibleTo(viewer, post, now, this.policy);
  }

  /**
   * Posts the viewer may see within the scope, newest first.
   * A hidden or missing category is NotFound regardless of the posts inside it.
   */
  async resolve(viewer: Viewer | null, scope: VisibilityScope = {}): Promise<ResolvedPosts> {
    const storeScope: PostScope = {};
    let category: Category | null = null;

    if (scope.categorySlug !== undefined) {
      const slug = scope.categorySlug.trim();
      category = slug ? await this.store.findCategoryBySlug(slug) : null;
      if (!category || !isCategoryVisibleTo(viewer, category, this.policy)) {
        throw new NotFoundException('Category not found.');
      }
      storeScope.categoryId = category.id;
    }
    if (scope.authorId !== undefined) storeScope.authorId = scope.authorId;

    const now = new Date();
    const candidates = await this.store.listPosts(storeScope);
    const posts = candidates.filter((p) => isVisibleTo(viewer, p, now, this.policy)).sort(comparePostsNewestFirst);
    return { category, posts };
  }

  async resolvePage(
    viewer: Viewer | null,
    scope: VisibilityScope,
    req: PageRequest,
  ): Promise<{ category: Category | null; page: Page<PostRecord> }> {
    const { category, posts } = await this.resolve(viewer, scope);
    return { category, page: paginate(posts, req) };
  }

  /** Missing and hidden posts are indistinguishable to the caller. */
  async getVisiblePost(viewer: Viewer | null, postId: number): Promise<PostRecord> {
    const post = await this.store.findPostById(postId);
    if (!post || !this.isVisible(viewer, post)) throw new NotFoundException('Post not found.');
    return post;
  }
}
