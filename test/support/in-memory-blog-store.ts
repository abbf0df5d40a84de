import type {
  Account,
  AccountSummary,
  BlogStore,
  Category,
  CommentRecord,
  CreatePostData,
  Location,
  PostRecord,
  PostScope,
  UpdatePostData,
  UpdateProfileData,
} from '../../src/modules/store/blog-store';

type PostRow = Omit<PostRecord, 'author' | 'category' | 'location' | 'commentCount'> & {
  categoryId: number | null;
  locationId: number | null;
};

type CommentRow = Omit<CommentRecord, 'author'>;

type SessionRow = { accountId: number; tokenHash: string; expiresAt: Date; revokedAt: Date | null };

const DAY_MS = 24 * 60 * 60 * 1000;

export function daysFromNow(days: number): Date {
  return new Date(Date.now() + days * DAY_MS);
}

/**
 * BlogStore kept in plain maps, for specs. Mirrors the SQL store: live comment
 * counts, cascade on post delete, rows returned in storage order (callers sort).
 */
export class InMemoryBlogStore implements BlogStore {
  private readonly accounts = new Map<number, Account>();
  private readonly categories = new Map<number, Category>();
  private readonly locations = new Map<number, Location>();
  private readonly posts = new Map<number, PostRow>();
  private readonly comments = new Map<number, CommentRow>();
  private readonly sessions: SessionRow[] = [];
  private nextId = 1;
  private clockMs = Date.UTC(2026, 0, 1);

  // ---- seeding helpers ----

  addAccount(input: Partial<Account> & { username: string }): Account {
    const account: Account = {
      id: input.id ?? this.nextId++,
      username: input.username,
      firstName: input.firstName ?? '',
      lastName: input.lastName ?? '',
      email: input.email ?? '',
      isStaff: input.isStaff ?? false,
    };
    this.accounts.set(account.id, account);
    return account;
  }

  addCategory(input: Partial<Category> & { slug: string }): Category {
    const category: Category = {
      id: input.id ?? this.nextId++,
      slug: input.slug,
      title: input.title ?? input.slug,
      description: input.description ?? '',
      isPublished: input.isPublished ?? true,
    };
    this.categories.set(category.id, category);
    return category;
  }

  addLocation(input: Partial<Location> & { name: string }): Location {
    const location: Location = {
      id: input.id ?? this.nextId++,
      name: input.name,
      isPublished: input.isPublished ?? true,
    };
    this.locations.set(location.id, location);
    return location;
  }

  addPost(input: Partial<CreatePostData> & { authorId: number; id?: number }): PostRecord {
    const row: PostRow = {
      id: input.id ?? this.nextId++,
      title: input.title ?? 'Untitled',
      text: input.text ?? 'Body',
      imageRef: input.imageRef ?? null,
      pubDate: input.pubDate ?? daysFromNow(-1),
      isPublished: input.isPublished ?? true,
      authorId: input.authorId,
      categoryId: input.categoryId ?? null,
      locationId: input.locationId ?? null,
      createdAt: this.tick(),
    };
    this.posts.set(row.id, row);
    return this.hydratePost(row);
  }

  addComment(input: { postId: number; authorId: number; text?: string; createdAt?: Date; id?: number }): CommentRecord {
    const row: CommentRow = {
      id: input.id ?? this.nextId++,
      postId: input.postId,
      authorId: input.authorId,
      text: input.text ?? 'Nice post',
      createdAt: input.createdAt ?? this.tick(),
    };
    this.comments.set(row.id, row);
    return this.hydrateComment(row);
  }

  addSession(input: { accountId: number; tokenHash: string; expiresAt?: Date; revokedAt?: Date | null }) {
    this.sessions.push({
      accountId: input.accountId,
      tokenHash: input.tokenHash,
      expiresAt: input.expiresAt ?? daysFromNow(30),
      revokedAt: input.revokedAt ?? null,
    });
  }

  commentCountFor(postId: number): number {
    return [...this.comments.values()].filter((c) => c.postId === postId).length;
  }

  isSessionRevoked(tokenHash: string): boolean {
    return this.sessions.some((s) => s.tokenHash === tokenHash && s.revokedAt !== null);
  }

  // ---- BlogStore ----

  async findAccountById(id: number): Promise<Account | null> {
    return this.accounts.get(id) ?? null;
  }

  async findAccountByUsername(username: string): Promise<Account | null> {
    return [...this.accounts.values()].find((a) => a.username === username) ?? null;
  }

  async updateAccountProfile(id: number, data: UpdateProfileData): Promise<Account | null> {
    const account = this.accounts.get(id);
    if (!account) return null;
    const updated: Account = {
      ...account,
      firstName: data.firstName ?? account.firstName,
      lastName: data.lastName ?? account.lastName,
      email: data.email ?? account.email,
    };
    this.accounts.set(id, updated);
    return updated;
  }

  async findAccountBySessionTokenHash(tokenHash: string, now: Date): Promise<Account | null> {
    const session = this.sessions.find(
      (s) => s.tokenHash === tokenHash && s.revokedAt === null && s.expiresAt.getTime() > now.getTime(),
    );
    return session ? (this.accounts.get(session.accountId) ?? null) : null;
  }

  async revokeSession(tokenHash: string, now: Date): Promise<void> {
    for (const s of this.sessions) {
      if (s.tokenHash === tokenHash && s.revokedAt === null) s.revokedAt = now;
    }
  }

  async findCategoryBySlug(slug: string): Promise<Category | null> {
    return [...this.categories.values()].find((c) => c.slug === slug) ?? null;
  }

  async findCategoryById(id: number): Promise<Category | null> {
    return this.categories.get(id) ?? null;
  }

  async findLocationById(id: number): Promise<Location | null> {
    return this.locations.get(id) ?? null;
  }

  async listPosts(scope: PostScope): Promise<PostRecord[]> {
    return [...this.posts.values()]
      .filter((p) => scope.categoryId === undefined || p.categoryId === scope.categoryId)
      .filter((p) => scope.authorId === undefined || p.authorId === scope.authorId)
      .map((p) => this.hydratePost(p));
  }

  async findPostById(id: number): Promise<PostRecord | null> {
    const row = this.posts.get(id);
    return row ? this.hydratePost(row) : null;
  }

  async createPost(data: CreatePostData): Promise<PostRecord> {
    return this.addPost(data);
  }

  async updatePost(id: number, data: UpdatePostData): Promise<PostRecord | null> {
    const row = this.posts.get(id);
    if (!row) return null;
    const updated: PostRow = {
      ...row,
      title: data.title ?? row.title,
      text: data.text ?? row.text,
      imageRef: data.imageRef !== undefined ? data.imageRef : row.imageRef,
      pubDate: data.pubDate ?? row.pubDate,
      isPublished: data.isPublished ?? row.isPublished,
      categoryId: data.categoryId !== undefined ? data.categoryId : row.categoryId,
      locationId: data.locationId !== undefined ? data.locationId : row.locationId,
    };
    this.posts.set(id, updated);
    return this.hydratePost(updated);
  }

  async deletePost(id: number): Promise<boolean> {
    if (!this.posts.delete(id)) return false;
    for (const [commentId, c] of this.comments) {
      if (c.postId === id) this.comments.delete(commentId);
    }
    return true;
  }

  async listComments(postId: number): Promise<CommentRecord[]> {
    return [...this.comments.values()].filter((c) => c.postId === postId).map((c) => this.hydrateComment(c));
  }

  async findCommentById(id: number): Promise<CommentRecord | null> {
    const row = this.comments.get(id);
    return row ? this.hydrateComment(row) : null;
  }

  async createComment(data: { postId: number; authorId: number; text: string }): Promise<CommentRecord> {
    return this.addComment(data);
  }

  async updateComment(id: number, text: string): Promise<CommentRecord | null> {
    const row = this.comments.get(id);
    if (!row) return null;
    const updated = { ...row, text };
    this.comments.set(id, updated);
    return this.hydrateComment(updated);
  }

  async deleteComment(id: number): Promise<boolean> {
    return this.comments.delete(id);
  }

  // ---- internals ----

  /** Monotonic fake clock for createdAt, one second per row. */
  private tick(): Date {
    this.clockMs += 1000;
    return new Date(this.clockMs);
  }

  private summary(accountId: number): AccountSummary {
    const a = this.accounts.get(accountId);
    if (!a) throw new Error(`Unknown account ${accountId}`);
    return { id: a.id, username: a.username, firstName: a.firstName, lastName: a.lastName };
  }

  private hydratePost(row: PostRow): PostRecord {
    const { categoryId, locationId, ...rest } = row;
    return {
      ...rest,
      author: this.summary(row.authorId),
      category: categoryId != null ? (this.categories.get(categoryId) ?? null) : null,
      location: locationId != null ? (this.locations.get(locationId) ?? null) : null,
      commentCount: this.commentCountFor(row.id),
    };
  }

  private hydrateComment(row: CommentRow): CommentRecord {
    return { ...row, author: this.summary(row.authorId) };
  }
}
