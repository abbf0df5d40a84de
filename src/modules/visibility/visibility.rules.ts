import type { Category, PostRecord } from '../store/blog-store';
import { isViewerAccount, type Viewer } from '../viewer/viewer';

export type VisibilityPolicy = {
  /** Staff accounts see every post and every category regardless of publication state. */
  staffSeesAll: boolean;
};

export type VisibilityFields = Pick<PostRecord, 'isPublished' | 'pubDate' | 'authorId'> & {
  category: Pick<Category, 'isPublished'> | null;
};

/**
 * Published, in a published category (or none), and already past its publish time.
 */
export function isPubliclyVisible(post: VisibilityFields, now: Date): boolean {
  if (!post.isPublished) return false;
  if (post.category && !post.category.isPublished) return false;
  return post.pubDate.getTime() <= now.getTime();
}

export function viewerSeesAll(viewer: Viewer | null, policy: VisibilityPolicy): boolean {
  return Boolean(policy.staffSeesAll && viewer?.isStaff);
}

export function isVisibleTo(viewer: Viewer | null, post: VisibilityFields, now: Date, policy: VisibilityPolicy): boolean {
  // Authors always see their own posts, scheduled and unpublished included.
  if (isViewerAccount(viewer, post.authorId)) return true;
  if (viewerSeesAll(viewer, policy)) return true;
  return isPubliclyVisible(post, now);
}

export function isCategoryVisibleTo(viewer: Viewer | null, category: Pick<Category, 'isPublished'>, policy: VisibilityPolicy): boolean {
  return category.isPublished || viewerSeesAll(viewer, policy);
}

/** pubDate DESC, then id ASC so equal publish times keep a fixed order. */
export function comparePostsNewestFirst(a: Pick<PostRecord, 'pubDate' | 'id'>, b: Pick<PostRecord, 'pubDate' | 'id'>): number {
  const byDate = b.pubDate.getTime() - a.pubDate.getTime();
  if (byDate !== 0) return byDate;
  return a.id - b.id;
}
