import { BadRequestException, Inject, Injectable, Logger, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { AuthorizationService } from '../authorization/authorization.service';
import type { MutationAction } from '../authorization/ownership';
import { BLOG_STORE, type BlogStore, type CommentRecord } from '../store/blog-store';
import { VisibilityService } from '../visibility/visibility.service';
import type { Viewer } from '../viewer/viewer';

/** createdAt ASC, id ASC: conversational order. */
export function compareCommentsOldestFirst(a: CommentRecord, b: CommentRecord): number {
  const byDate = a.createdAt.getTime() - b.createdAt.getTime();
  if (byDate !== 0) return byDate;
  return a.id - b.id;
}

@Injectable()
export class CommentsService {
  private readonly logger = new Logger(CommentsService.name);

  constructor(
    @Inject(BLOG_STORE) private readonly store: BlogStore,
    private readonly visibility: VisibilityService,
    private readonly authorization: AuthorizationService,
  ) {}

  private normalizeText(text: string): string {
    const trimmed = (text ?? '').trim();
    if (!trimmed) throw new BadRequestException('Comment text is required.');
    return trimmed;
  }

  async listThread(postId: number): Promise<CommentRecord[]> {
    const comments = await this.store.listComments(postId);
    return comments.sort(compareCommentsOldestFirst);
  }

  /** Thread of a post the viewer is allowed to see. */
  async listForPost(params: { viewer: Viewer | null; postId: number }): Promise<CommentRecord[]> {
    const post = await this.visibility.getVisiblePost(params.viewer, params.postId);
    return await this.listThread(post.id);
  }

  /**
   * Gated only by viewer identity and post existence: commenting does not depend on
   * whether the post is currently public.
   */
  async addComment(params: { viewer: Viewer | null; postId: number; text: string }): Promise<CommentRecord> {
    const { viewer, postId } = params;
    if (!viewer) throw new UnauthorizedException('Sign in to comment.');
    const text = this.normalizeText(params.text);

    const post = await this.store.findPostById(postId);
    if (!post) throw new NotFoundException('Post not found.');

    const created = await this.store.createComment({ postId: post.id, authorId: viewer.id, text });
    this.logger.log(`comment created id=${created.id} post=${post.id} author=${viewer.id}`);
    return created;
  }

  async editComment(params: { viewer: Viewer | null; postId: number; commentId: number; text: string }): Promise<CommentRecord> {
    const comment = await this.getAuthorizedComment({ ...params, action: 'edit' });
    const text = this.normalizeText(params.text);

    const updated = await this.store.updateComment(comment.id, text);
    if (!updated) throw new NotFoundException('Comment not found.');
    return updated;
  }

  async deleteComment(params: { viewer: Viewer | null; postId: number; commentId: number }): Promise<{ success: true }> {
    const comment = await this.getAuthorizedComment({ ...params, action: 'delete' });

    const deleted = await this.store.deleteComment(comment.id);
    if (!deleted) throw new NotFoundException('Comment not found.');
    this.logger.log(`comment deleted id=${comment.id} post=${comment.postId} by=${params.viewer?.id ?? 'anon'}`);
    return { success: true };
  }

  private async getAuthorizedComment(params: {
    viewer: Viewer | null;
    postId: number;
    commentId: number;
    action: MutationAction;
  }): Promise<CommentRecord> {
    const { viewer, postId, commentId, action } = params;
    const comment = await this.store.findCommentById(commentId);
    // A comment addressed through the wrong post does not exist at that address.
    if (!comment || comment.postId !== postId) throw new NotFoundException('Comment not found.');

    const decision = this.authorization.authorize(viewer, comment, action);
    if (decision === 'allowed') return comment;
    // Comments on a post the viewer cannot see are as absent as the post itself.
    if (decision === 'denied_not_owner') {
      const post = await this.store.findPostById(postId);
      if (!post || !this.visibility.isVisible(viewer, post)) throw new NotFoundException('Comment not found.');
    }
    throw this.authorization.denialException(decision, {
      redirectTo: `/posts/${postId}`,
      message: `Not allowed to ${action} this comment.`,
    });
  }
}
