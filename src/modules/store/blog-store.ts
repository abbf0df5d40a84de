export const BLOG_STORE = Symbol('BLOG_STORE');

export type Account = {
  id: number;
  username: string;
  firstName: string;
  lastName: string;
  email: string;
  isStaff: boolean;
};

export type AccountSummary = Pick<Account, 'id' | 'username' | 'firstName' | 'lastName'>;

export type Category = {
  id: number;
  slug: string;
  title: string;
  description: string;
  isPublished: boolean;
};

export type Location = {
  id: number;
  name: string;
  isPublished: boolean;
};

/** A post row joined with its author, category, location and live comment count. */
export type PostRecord = {
  id: number;
  title: string;
  text: string;
  imageRef: string | null;
  pubDate: Date;
  isPublished: boolean;
  authorId: number;
  author: AccountSummary;
  category: Category | null;
  location: Location | null;
  createdAt: Date;
  commentCount: number;
};

export type CommentRecord = {
  id: number;
  text: string;
  postId: number;
  authorId: number;
  author: AccountSummary;
  createdAt: Date;
};

export type PostScope = {
  categoryId?: number;
  authorId?: number;
};

export type CreatePostData = {
  title: string;
  text: string;
  imageRef: string | null;
  pubDate: Date;
  isPublished: boolean;
  authorId: number;
  categoryId: number | null;
  locationId: number | null;
};

// No authorId: ownership never changes after creation.
export type UpdatePostData = Partial<Omit<CreatePostData, 'authorId'>>;

export type UpdateProfileData = Partial<Pick<Account, 'firstName' | 'lastName' | 'email'>>;

/**
 * Persistence boundary. Every mutation is a single atomic statement; the store
 * does no visibility filtering of its own.
 */
export interface BlogStore {
  findAccountById(id: number): Promise<Account | null>;
  findAccountByUsername(username: string): Promise<Account | null>;
  updateAccountProfile(id: number, data: UpdateProfileData): Promise<Account | null>;

  /** Account behind an unrevoked, unexpired session. */
  findAccountBySessionTokenHash(tokenHash: string, now: Date): Promise<Account | null>;
  revokeSession(tokenHash: string, now: Date): Promise<void>;

  findCategoryBySlug(slug: string): Promise<Category | null>;
  findCategoryById(id: number): Promise<Category | null>;
  findLocationById(id: number): Promise<Location | null>;

  listPosts(scope: PostScope): Promise<PostRecord[]>;
  findPostById(id: number): Promise<PostRecord | null>;
  createPost(data: CreatePostData): Promise<PostRecord>;
  updatePost(id: number, data: UpdatePostData): Promise<PostRecord | null>;
  /** Removes the post and its comments. False when no row was deleted. */
  deletePost(id: number): Promise<boolean>;

  listComments(postId: number): Promise<CommentRecord[]>;
  findCommentById(id: number): Promise<CommentRecord | null>;
  createComment(data: { postId: number; authorId: number; text: string }): Promise<CommentRecord>;
  updateComment(id: number, text: string): Promise<CommentRecord | null>;
  deleteComment(id: number): Promise<boolean>;
}
