import type { AccountSummary, Category, Location, PostRecord } from '../store/blog-store';

export type PostAuthorDto = {
  id: number;
  username: string;
  name: string;
};

export type PostCategoryDto = {
  id: number;
  slug: string;
  title: string;
};

export type PostLocationDto = {
  id: number;
  name: string;
};

export type PostDto = {
  id: number;
  title: string;
  text: string;
  imageRef: string | null;
  pubDate: string;
  isPublished: boolean;
  createdAt: string;
  commentCount: number;
  author: PostAuthorDto;
  category: PostCategoryDto | null;
  location: PostLocationDto | null;
  /** Present when the response is personalized for a signed-in viewer. */
  viewerIsAuthor?: boolean;
};

export type CategoryDto = PostCategoryDto & { description: string };

export function displayName(account: Pick<AccountSummary, 'firstName' | 'lastName' | 'username'>): string {
  const full = `${account.firstName} ${account.lastName}`.trim();
  return full || account.username;
}

export function toAuthorDto(account: AccountSummary): PostAuthorDto {
  return { id: account.id, username: account.username, name: displayName(account) };
}

export function toCategoryDto(category: Category): CategoryDto {
  return { id: category.id, slug: category.slug, title: category.title, description: category.description };
}

function toLocationDto(location: Location): PostLocationDto {
  return { id: location.id, name: location.name };
}

export function toPostDto(post: PostRecord, opts?: { viewerId?: number | null }): PostDto {
  return {
    id: post.id,
    title: post.title,
    text: post.text,
    imageRef: post.imageRef,
    pubDate: post.pubDate.toISOString(),
    isPublished: post.isPublished,
    createdAt: post.createdAt.toISOString(),
    commentCount: post.commentCount,
    author: toAuthorDto(post.author),
    category: post.category ? { id: post.category.id, slug: post.category.slug, title: post.category.title } : null,
    // Unpublished locations are not shown on posts.
    location: post.location?.isPublished ? toLocationDto(post.location) : null,
    ...(typeof opts?.viewerId === 'number' ? { viewerIsAuthor: opts.viewerId === post.authorId } : {}),
  };
}
