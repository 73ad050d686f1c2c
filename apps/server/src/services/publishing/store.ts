import { randomUUID } from 'node:crypto';
import { isDeepStrictEqual } from 'node:util';
import {
  isPublicationStatus,
  isSocialNetwork,
  nowIso,
  toIsoTimestamp,
  type Publication,
  type PublicationExtraData,
  type PublicationStatus,
  type SocialNetwork,
} from '@social-publisher/shared';
import type { DatabaseClient } from '../../db';
import { getParamPlaceholder, normalizeForDb, parseJsonObject } from '../../utils/db';

interface PublicationRow {
  id: string;
  post_id: string;
  network: string;
  adapted_content: string;
  status: string;
  published_at: unknown;
  error_message: string | null;
  extra_data: unknown;
  created_at: unknown;
  updated_at: unknown;
}

function toPublication(row: PublicationRow): Publication {
  if (!isSocialNetwork(row.network)) {
    throw new Error(`publication ${row.id} has unknown network "${row.network}"`);
  }
  return {
    id: row.id,
    postId: row.post_id,
    network: row.network,
    adaptedContent: row.adapted_content,
    status: isPublicationStatus(row.status) ? row.status : 'pending',
    publishedAt: toIsoTimestamp(row.published_at),
    errorMessage: row.error_message ?? null,
    extraData: parseJsonObject(row.extra_data),
    createdAt: toIsoTimestamp(row.created_at) ?? '',
    updatedAt: toIsoTimestamp(row.updated_at) ?? '',
  };
}

/**
 * Durable per-(post, network) publishing records. Every write is a single-row
 * statement; nothing here spans the parent post.
 */
export class PublicationStore {
  constructor(private readonly db: DatabaseClient) {}

  private placeholder(index: number): string {
    return getParamPlaceholder(this.db.dialect, index);
  }

  async create(postId: string, network: SocialNetwork, adaptedContent: string): Promise<Publication> {
    const now = nowIso();
    const publication: Publication = {
      id: randomUUID(),
      postId,
      network,
      adaptedContent,
      status: 'pending',
      publishedAt: null,
      errorMessage: null,
      extraData: {},
      createdAt: now,
      updatedAt: now,
    };

    const p = (index: number) => this.placeholder(index);
    await this.db.execute(
      `INSERT INTO publications (
        id, post_id, network, adapted_content, status, published_at, error_message, extra_data, created_at, updated_at
      ) VALUES (${p(1)}, ${p(2)}, ${p(3)}, ${p(4)}, ${p(5)}, ${p(6)}, ${p(7)}, ${p(8)}, ${p(9)}, ${p(10)})`,
      [
        publication.id,
        publication.postId,
        publication.network,
        publication.adaptedContent,
        publication.status,
        null,
        null,
        normalizeForDb(publication.extraData),
        publication.createdAt,
        publication.updatedAt,
      ],
    );
    return publication;
  }

  async get(id: string): Promise<Publication | null> {
    const rows = await this.db.query<PublicationRow>(
      `SELECT * FROM publications WHERE id = ${this.placeholder(1)} LIMIT 1`,
      [id],
    );
    return rows.length ? toPublication(rows[0]) : null;
  }

  async listByPost(postId: string): Promise<Publication[]> {
    // sqlite rowid keeps insertion order for rows created in the same millisecond
    const tieBreaker = this.db.dialect === 'sqlite' ? 'rowid' : 'id';
    const rows = await this.db.query<PublicationRow>(
      `SELECT * FROM publications WHERE post_id = ${this.placeholder(1)} ORDER BY created_at ASC, ${tieBreaker} ASC`,
      [postId],
    );
    return rows.map(toPublication);
  }

  // Records stuck in 'processing' after a worker crash show up here
  async listByStatus(status: PublicationStatus): Promise<Publication[]> {
    const rows = await this.db.query<PublicationRow>(
      `SELECT * FROM publications WHERE status = ${this.placeholder(1)} ORDER BY updated_at ASC`,
      [status],
    );
    return rows.map(toPublication);
  }

  /**
   * Moves a publication to 'processing' only while it is still in one of
   * `from`. The status check and the write are one conditional UPDATE, so of
   * two concurrent claims at most one succeeds. Returns null when the record
   * is unknown or no longer claimable.
   */
  async claim(
    id: string,
    from: readonly PublicationStatus[],
    metadata?: PublicationExtraData,
  ): Promise<Publication | null> {
    const existing = await this.get(id);
    if (!existing || !from.includes(existing.status)) return null;

    const extraData = metadata ? { ...existing.extraData, ...metadata } : existing.extraData;
    const updatedAt = nowIso();
    const p = (index: number) => this.placeholder(index);
    const statusList = from.map((_, index) => p(index + 5)).join(', ');
    const changed = await this.db.execute(
      `UPDATE publications
       SET status = ${p(1)}, published_at = NULL, extra_data = ${p(2)}, updated_at = ${p(3)}
       WHERE id = ${p(4)} AND status IN (${statusList})`,
      ['processing', normalizeForDb(extraData), updatedAt, id, ...from],
    );
    if (changed !== 1) return null;

    return {
      ...existing,
      status: 'processing',
      publishedAt: null,
      extraData,
      updatedAt,
    };
  }

  /**
   * Moves a publication to `status`. `publishedAt` is stamped only on the way
   * into 'published' and cleared for any other status; `metadata` is merged
   * over `extraData`; `errorMessage` is written only when given. Returns null
   * for an unknown id and skips the write when nothing would change.
   */
  async updateStatus(
    id: string,
    status: PublicationStatus,
    errorMessage?: string | null,
    metadata?: PublicationExtraData,
  ): Promise<Publication | null> {
    const existing = await this.get(id);
    if (!existing) return null;

    const publishedAt =
      status === 'published' ? existing.publishedAt ?? nowIso() : null;
    const nextErrorMessage = errorMessage ? errorMessage : existing.errorMessage;
    const extraData = metadata ? { ...existing.extraData, ...metadata } : existing.extraData;

    const unchanged =
      existing.status === status &&
      existing.publishedAt === publishedAt &&
      existing.errorMessage === nextErrorMessage &&
      isDeepStrictEqual(existing.extraData, extraData);
    if (unchanged) return existing;

    const updatedAt = nowIso();
    const p = (index: number) => this.placeholder(index);
    await this.db.execute(
      `UPDATE publications
       SET status = ${p(1)}, published_at = ${p(2)}, error_message = ${p(3)}, extra_data = ${p(4)}, updated_at = ${p(5)}
       WHERE id = ${p(6)}`,
      [status, publishedAt, nextErrorMessage, normalizeForDb(extraData), updatedAt, id],
    );

    return {
      ...existing,
      status,
      publishedAt,
      errorMessage: nextErrorMessage,
      extraData,
      updatedAt,
    };
  }
}
