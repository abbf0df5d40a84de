import { BadRequestException, Inject, Injectable, Logger, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { AuthorizationService } from '../authorization/authorization.service';
import type { MutationAction } from '../authorization/ownership';
import { CommentsService } from '../comments/comments.service';
import {
  BLOG_STORE,
  type BlogStore,
  type Category,
  type CommentRecord,
  type PostRecord,
  type UpdatePostData,
} from '../store/blog-store';
import { VisibilityService } from '../visibility/visibility.service';
import type { Viewer } from '../viewer/viewer';
import type { Page, PageRequest } from '../../common/pagination/page';

export type PostInput = {
  title: string;
  text: string;
  imageRef?: string | null;
  pubDate?: Date;
  isPublished?: boolean;
  categoryId?: number | null;
  locationId?: number | null;
};

export type PostPatch = Partial<PostInput>;

@Injectable()
export class PostsService {
  private readonly logger = new Logger(PostsService.name);

  constructor(
    @Inject(BLOG_STORE) private readonly store: BlogStore,
    private readonly visibility: VisibilityService,
    private readonly authorization: AuthorizationService,
    private readonly comments: CommentsService,
  ) {}

  async listIndex(params: { viewer: Viewer | null; page: PageRequest }): Promise<Page<PostRecord>> {
    const res = await this.visibility.resolvePage(params.viewer, {}, params.page);
    return res.page;
  }

  async listForCategory(params: {
    viewer: Viewer | null;
    slug: string;
    page: PageRequest;
  }): Promise<{ category: Category; page: Page<PostRecord> }> {
    const res = await this.visibility.resolvePage(params.viewer, { categorySlug: params.slug }, params.page);
    if (!res.category) throw new NotFoundException('Category not found.');
    return { category: res.category, page: res.page };
  }

  async getDetail(params: { viewer: Viewer | null; postId: number }): Promise<{ post: PostRecord; comments: CommentRecord[] }> {
    const post = await this.visibility.getVisiblePost(params.viewer, params.postId);
    const comments = await this.comments.listThread(post.id);
    return { post, comments };
  }

  async createPost(params: { viewer: Viewer | null; input: PostInput }): Promise<PostRecord> {
    const { viewer, input } = params;
    if (!viewer) throw new UnauthorizedException('Sign in to create posts.');
    await this.assertReferencesExist(input);

    const created = await this.store.createPost({
      title: input.title,
      text: input.text,
      imageRef: input.imageRef ?? null,
      pubDate: input.pubDate ?? new Date(),
      isPublished: input.isPublished ?? true,
      // Ownership is fixed here and never changes afterwards.
      authorId: viewer.id,
      categoryId: input.categoryId ?? null,
      locationId: input.locationId ?? null,
    });
    this.logger.log(`post created id=${created.id} author=${viewer.id}`);
    return created;
  }

  async updatePost(params: { viewer: Viewer | null; postId: number; patch: PostPatch }): Promise<PostRecord> {
    const { viewer, postId, patch } = params;
    const post = await this.getAuthorizedPost({ viewer, postId, action: 'edit' });
    await this.assertReferencesExist(patch);

    const data: UpdatePostData = {
      title: patch.title,
      text: patch.text,
      imageRef: patch.imageRef,
      pubDate: patch.pubDate,
      isPublished: patch.isPublished,
      categoryId: patch.categoryId,
      locationId: patch.locationId,
    };
    const updated = await this.store.updatePost(post.id, data);
    if (!updated) throw new NotFoundException('Post not found.');
    return updated;
  }

  async deletePost(params: { viewer: Viewer | null; postId: number }): Promise<{ success: true }> {
    const post = await this.getAuthorizedPost({ ...params, action: 'delete' });

    // A concurrent delete may have won; the second caller sees NotFound.
    const deleted = await this.store.deletePost(post.id);
    if (!deleted) throw new NotFoundException('Post not found.');
    this.logger.log(`post deleted id=${post.id} by=${params.viewer?.id ?? 'anon'}`);
    return { success: true };
  }

  private async getAuthorizedPost(params: { viewer: Viewer | null; postId: number; action: MutationAction }): Promise<PostRecord> {
    const { viewer, postId, action } = params;
    const post = await this.store.findPostById(postId);
    if (!post) throw new NotFoundException('Post not found.');

    const decision = this.authorization.authorize(viewer, post, action);
    if (decision === 'allowed') return post;
    // Don't confirm that a hidden post exists to someone who could not see it anyway.
    if (decision === 'denied_not_owner' && !this.visibility.isVisible(viewer, post)) {
      throw new NotFoundException('Post not found.');
    }
    throw this.authorization.denialException(decision, {
      redirectTo: `/posts/${post.id}`,
      message: `Not allowed to ${action} this post.`,
    });
  }

  private async assertReferencesExist(input: Pick<PostPatch, 'categoryId' | 'locationId'>) {
    if (input.categoryId != null && !(await this.store.findCategoryById(input.categoryId))) {
      throw new BadRequestException('Unknown category.');
    }
    if (input.locationId != null && !(await this.store.findLocationById(input.locationId))) {
      throw new BadRequestException('Unknown location.');
    }
  }
}
