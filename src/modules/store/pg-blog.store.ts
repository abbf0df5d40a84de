import { Injectable } from '@nestjs/common';
import { DatabaseService, type Queryable } from '../database/database.service';
import type {
  Account,
  BlogStore,
  Category,
  CommentRecord,
  CreatePostData,
  Location,
  PostRecord,
  PostScope,
  UpdatePostData,
  UpdateProfileData,
} from './blog-store';

type AccountRow = {
  id: number;
  username: string;
  first_name: string;
  last_name: string;
  email: string;
  is_staff: boolean;
};

type CategoryRow = {
  id: number;
  slug: string;
  title: string;
  description: string;
  is_published: boolean;
};

type LocationRow = {
  id: number;
  name: string;
  is_published: boolean;
};

type PostRow = {
  id: number;
  title: string;
  text: string;
  image_ref: string | null;
  pub_date: Date;
  is_published: boolean;
  author_id: number;
  created_at: Date;
  author_username: string;
  author_first_name: string;
  author_last_name: string;
  category_id: number | null;
  category_slug: string | null;
  category_title: string | null;
  category_description: string | null;
  category_is_published: boolean | null;
  location_id: number | null;
  location_name: string | null;
  location_is_published: boolean | null;
  comment_count: number;
};

type CommentRow = {
  id: number;
  text: string;
  post_id: number;
  author_id: number;
  created_at: Date;
  author_username: string;
  author_first_name: string;
  author_last_name: string;
};

const ACCOUNT_COLUMNS = 'a.id, a.username, a.first_name, a.last_name, a.email, a.is_staff';

// Comment count is a correlated subquery so it is always live.
const POST_SELECT = `
  SELECT p.id, p.title, p.text, p.image_ref, p.pub_date, p.is_published, p.author_id, p.created_at,
         a.username AS author_username, a.first_name AS author_first_name, a.last_name AS author_last_name,
         c.id AS category_id, c.slug AS category_slug, c.title AS category_title,
         c.description AS category_description, c.is_published AS category_is_published,
         l.id AS location_id, l.name AS location_name, l.is_published AS location_is_published,
         (SELECT COUNT(*)::int FROM comments cm WHERE cm.post_id = p.id) AS comment_count
    FROM posts p
    JOIN accounts a ON a.id = p.author_id
    LEFT JOIN categories c ON c.id = p.category_id
    LEFT JOIN locations l ON l.id = p.location_id`;

const COMMENT_SELECT = `
  SELECT cm.id, cm.text, cm.post_id, cm.author_id, cm.created_at,
         a.username AS author_username, a.first_name AS author_first_name, a.last_name AS author_last_name
    FROM comments cm
    JOIN accounts a ON a.id = cm.author_id`;

const POST_UPDATE_COLUMNS: ReadonlyArray<readonly [keyof UpdatePostData, string]> = [
  ['title', 'title'],
  ['text', 'text'],
  ['imageRef', 'image_ref'],
  ['pubDate', 'pub_date'],
  ['isPublished', 'is_published'],
  ['categoryId', 'category_id'],
  ['locationId', 'location_id'],
];

const PROFILE_UPDATE_COLUMNS: ReadonlyArray<readonly [keyof UpdateProfileData, string]> = [
  ['firstName', 'first_name'],
  ['lastName', 'last_name'],
  ['email', 'email'],
];

function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    isStaff: row.is_staff,
  };
}

function toCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    slug: row.slug,
    title: row.title,
    description: row.description,
    isPublished: row.is_published,
  };
}

function toLocation(row: LocationRow): Location {
  return { id: row.id, name: row.name, isPublished: row.is_published };
}

function toPostRecord(row: PostRow): PostRecord {
  return {
    id: row.id,
    title: row.title,
    text: row.text,
    imageRef: row.image_ref,
    pubDate: row.pub_date,
    isPublished: row.is_published,
    authorId: row.author_id,
    author: {
      id: row.author_id,
      username: row.author_username,
      firstName: row.author_first_name,
      lastName: row.author_last_name,
    },
    category:
      row.category_id != null
        ? {
            id: row.category_id,
            slug: row.category_slug ?? '',
            title: row.category_title ?? '',
            description: row.category_description ?? '',
            isPublished: Boolean(row.category_is_published),
          }
        : null,
    location:
      row.location_id != null
        ? { id: row.location_id, name: row.location_name ?? '', isPublished: Boolean(row.location_is_published) }
        : null,
    createdAt: row.created_at,
    commentCount: row.comment_count,
  };
}

function toCommentRecord(row: CommentRow): CommentRecord {
  return {
    id: row.id,
    text: row.text,
    postId: row.post_id,
    authorId: row.author_id,
    author: {
      id: row.author_id,
      username: row.author_username,
      firstName: row.author_first_name,
      lastName: row.author_last_name,
    },
    createdAt: row.created_at,
  };
}

/** Builds `col = $n` assignments for the keys actually present in `data`. */
function buildAssignments<T extends object>(
  data: T,
  columns: ReadonlyArray<readonly [keyof T, string]>,
  firstParam: number,
): { sql: string; values: unknown[] } {
  const parts: string[] = [];
  const values: unknown[] = [];
  for (const [key, column] of columns) {
    const value = data[key];
    if (value === undefined) continue;
    values.push(value);
    parts.push(`${column} = $${firstParam + values.length - 1}`);
  }
  return { sql: parts.join(', '), values };
}

@Injectable()
export class PgBlogStore implements BlogStore {
  constructor(private readonly db: DatabaseService) {}

  async findAccountById(id: number): Promise<Account | null> {
    const { rows } = await this.db.query<AccountRow>(`SELECT ${ACCOUNT_COLUMNS} FROM accounts a WHERE a.id = $1`, [id]);
    return rows[0] ? toAccount(rows[0]) : null;
  }

  async findAccountByUsername(username: string): Promise<Account | null> {
    const { rows } = await this.db.query<AccountRow>(`SELECT ${ACCOUNT_COLUMNS} FROM accounts a WHERE a.username = $1`, [
      username,
    ]);
    return rows[0] ? toAccount(rows[0]) : null;
  }

  async updateAccountProfile(id: number, data: UpdateProfileData): Promise<Account | null> {
    const { sql, values } = buildAssignments(data, PROFILE_UPDATE_COLUMNS, 2);
    if (!sql) return await this.findAccountById(id);
    const { rows } = await this.db.query<AccountRow>(
      `UPDATE accounts a SET ${sql} WHERE a.id = $1 RETURNING ${ACCOUNT_COLUMNS}`,
      [id, ...values],
    );
    return rows[0] ? toAccount(rows[0]) : null;
  }

  async findAccountBySessionTokenHash(tokenHash: string, now: Date): Promise<Account | null> {
    const { rows } = await this.db.query<AccountRow>(
      `SELECT ${ACCOUNT_COLUMNS}
         FROM sessions s
         JOIN accounts a ON a.id = s.account_id
        WHERE s.token_hash = $1 AND s.revoked_at IS NULL AND s.expires_at > $2
        LIMIT 1`,
      [tokenHash, now],
    );
    return rows[0] ? toAccount(rows[0]) : null;
  }

  async revokeSession(tokenHash: string, now: Date): Promise<void> {
    await this.db.query('UPDATE sessions SET revoked_at = $2 WHERE token_hash = $1 AND revoked_at IS NULL', [
      tokenHash,
      now,
    ]);
  }

  async findCategoryBySlug(slug: string): Promise<Category | null> {
    const { rows } = await this.db.query<CategoryRow>(
      'SELECT id, slug, title, description, is_published FROM categories WHERE slug = $1',
      [slug],
    );
    return rows[0] ? toCategory(rows[0]) : null;
  }

  async findCategoryById(id: number): Promise<Category | null> {
    const { rows } = await this.db.query<CategoryRow>(
      'SELECT id, slug, title, description, is_published FROM categories WHERE id = $1',
      [id],
    );
    return rows[0] ? toCategory(rows[0]) : null;
  }

  async findLocationById(id: number): Promise<Location | null> {
    const { rows } = await this.db.query<LocationRow>('SELECT id, name, is_published FROM locations WHERE id = $1', [id]);
    return rows[0] ? toLocation(rows[0]) : null;
  }

  async listPosts(scope: PostScope): Promise<PostRecord[]> {
    const where: string[] = [];
    const values: unknown[] = [];
    if (scope.categoryId !== undefined) {
      values.push(scope.categoryId);
      where.push(`p.category_id = $${values.length}`);
    }
    if (scope.authorId !== undefined) {
      values.push(scope.authorId);
      where.push(`p.author_id = $${values.length}`);
    }
    const whereSql = where.length ? ` WHERE ${where.join(' AND ')}` : '';
    const { rows } = await this.db.query<PostRow>(`${POST_SELECT}${whereSql} ORDER BY p.pub_date DESC, p.id ASC`, values);
    return rows.map(toPostRecord);
  }

  async findPostById(id: number): Promise<PostRecord | null> {
    return await this.findPostWith(this.db, id);
  }

  async createPost(data: CreatePostData): Promise<PostRecord> {
    return await this.db.transaction(async (tx) => {
      const { rows } = await tx.query<{ id: number }>(
        `INSERT INTO posts (title, text, image_ref, pub_date, is_published, author_id, category_id, location_id)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING id`,
        [
          data.title,
          data.text,
          data.imageRef,
          data.pubDate,
          data.isPublished,
          data.authorId,
          data.categoryId,
          data.locationId,
        ],
      );
      const created = rows[0] ? await this.findPostWith(tx, rows[0].id) : null;
      if (!created) throw new Error('Inserted post could not be read back.');
      return created;
    });
  }

  async updatePost(id: number, data: UpdatePostData): Promise<PostRecord | null> {
    const { sql, values } = buildAssignments(data, POST_UPDATE_COLUMNS, 2);
    if (!sql) return await this.findPostById(id);
    return await this.db.transaction(async (tx) => {
      const res = await tx.query(`UPDATE posts SET ${sql} WHERE id = $1`, [id, ...values]);
      if (!res.rowCount) return null;
      return await this.findPostWith(tx, id);
    });
  }

  async deletePost(id: number): Promise<boolean> {
    // comments go with it via ON DELETE CASCADE
    const res = await this.db.query('DELETE FROM posts WHERE id = $1', [id]);
    return Boolean(res.rowCount);
  }

  async listComments(postId: number): Promise<CommentRecord[]> {
    const { rows } = await this.db.query<CommentRow>(
      `${COMMENT_SELECT} WHERE cm.post_id = $1 ORDER BY cm.created_at ASC, cm.id ASC`,
      [postId],
    );
    return rows.map(toCommentRecord);
  }

  async findCommentById(id: number): Promise<CommentRecord | null> {
    return await this.findCommentWith(this.db, id);
  }

  async createComment(data: { postId: number; authorId: number; text: string }): Promise<CommentRecord> {
    return await this.db.transaction(async (tx) => {
      const { rows } = await tx.query<{ id: number }>(
        'INSERT INTO comments (text, author_id, post_id) VALUES ($1, $2, $3) RETURNING id',
        [data.text, data.authorId, data.postId],
      );
      const created = rows[0] ? await this.findCommentWith(tx, rows[0].id) : null;
      if (!created) throw new Error('Inserted comment could not be read back.');
      return created;
    });
  }

  async updateComment(id: number, text: string): Promise<CommentRecord | null> {
    return await this.db.transaction(async (tx) => {
      const res = await tx.query('UPDATE comments SET text = $2 WHERE id = $1', [id, text]);
      if (!res.rowCount) return null;
      return await this.findCommentWith(tx, id);
    });
  }

  async deleteComment(id: number): Promise<boolean> {
    const res = await this.db.query('DELETE FROM comments WHERE id = $1', [id]);
    return Boolean(res.rowCount);
  }

  private async findPostWith(q: Queryable, id: number): Promise<PostRecord | null> {
    const { rows } = await q.query<PostRow>(`${POST_SELECT} WHERE p.id = $1`, [id]);
    return rows[0] ? toPostRecord(rows[0]) : null;
  }

  private async findCommentWith(q: Queryable, id: number): Promise<CommentRecord | null> {
    const { rows } = await q.query<CommentRow>(`${COMMENT_SELECT} WHERE cm.id = $1`, [id]);
    return rows[0] ? toCommentRecord(rows[0]) : null;
  }
}
