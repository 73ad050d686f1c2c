import { randomUUID } from 'node:crypto';
import { isPostStatus, nowIso, toIsoTimestamp, type Post, type PostStatus } from '@social-publisher/shared';
import type { DatabaseClient } from '../../db';
import { getParamPlaceholder } from '../../utils/db';

interface PostRow {
  id: string;
  owner_id: string | null;
  title: string;
  content: string;
  status: string;
  created_at: unknown;
  updated_at: unknown;
}

export interface CreatePostInput {
  title: string;
  content: string;
  ownerId?: string | null;
}

export interface ListPostsOptions {
  status?: PostStatus;
  ownerId?: string;
  limit?: number;
  offset?: number;
}

const DEFAULT_LIST_LIMIT = 100;
const MAX_LIST_LIMIT = 200;

function toPost(row: PostRow): Post {
  return {
    id: row.id,
    ownerId: row.owner_id ?? null,
    title: row.title,
    content: row.content,
    status: isPostStatus(row.status) ? row.status : 'draft',
    createdAt: toIsoTimestamp(row.created_at) ?? '',
    updatedAt: toIsoTimestamp(row.updated_at) ?? '',
  };
}

export class PostStore {
  constructor(private readonly db: DatabaseClient) {}

  private placeholder(index: number): string {
    return getParamPlaceholder(this.db.dialect, index);
  }

  async create(input: CreatePostInput): Promise<Post> {
    const now = nowIso();
    const post: Post = {
      id: randomUUID(),
      ownerId: input.ownerId ?? null,
      title: input.title,
      content: input.content,
      status: 'draft',
      createdAt: now,
      updatedAt: now,
    };

    const p = (index: number) => this.placeholder(index);
    await this.db.execute(
      `INSERT INTO posts (id, owner_id, title, content, status, created_at, updated_at)
       VALUES (${p(1)}, ${p(2)}, ${p(3)}, ${p(4)}, ${p(5)}, ${p(6)}, ${p(7)})`,
      [post.id, post.ownerId, post.title, post.content, post.status, post.createdAt, post.updatedAt],
    );
    return post;
  }

  async get(id: string): Promise<Post | null> {
    const rows = await this.db.query<PostRow>(
      `SELECT * FROM posts WHERE id = ${this.placeholder(1)} LIMIT 1`,
      [id],
    );
    return rows.length ? toPost(rows[0]) : null;
  }

  async list(options: ListPostsOptions = {}): Promise<Post[]> {
    const filters: string[] = [];
    const params: unknown[] = [];

    if (options.status) {
      params.push(options.status);
      filters.push(`status = ${this.placeholder(params.length)}`);
    }
    if (options.ownerId) {
      params.push(options.ownerId);
      filters.push(`owner_id = ${this.placeholder(params.length)}`);
    }

    const whereSql = filters.length ? `WHERE ${filters.join(' AND ')}` : '';
    const limit = Math.min(Math.max(1, options.limit ?? DEFAULT_LIST_LIMIT), MAX_LIST_LIMIT);
    const offset = Math.max(0, options.offset ?? 0);

    params.push(limit);
    const limitPlaceholder = this.placeholder(params.length);
    params.push(offset);
    const offsetPlaceholder = this.placeholder(params.length);

    const rows = await this.db.query<PostRow>(
      `SELECT * FROM posts ${whereSql}
       ORDER BY created_at DESC
       LIMIT ${limitPlaceholder} OFFSET ${offsetPlaceholder}`,
      params,
    );
    return rows.map(toPost);
  }

  async updateStatus(id: string, status: PostStatus): Promise<Post | null> {
    const existing = await this.get(id);
    if (!existing) return null;
    if (existing.status === status) return existing;

    const updatedAt = nowIso();
    await this.db.execute(
      `UPDATE posts SET status = ${this.placeholder(1)}, updated_at = ${this.placeholder(2)}
       WHERE id = ${this.placeholder(3)}`,
      [status, updatedAt, id],
    );
    return { ...existing, status, updatedAt };
  }

  // Publications go with the post (ON DELETE CASCADE)
  async delete(id: string): Promise<boolean> {
    const existing = await this.get(id);
    if (!existing) return false;
    await this.db.execute(`DELETE FROM posts WHERE id = ${this.placeholder(1)}`, [id]);
    return true;
  }
}
