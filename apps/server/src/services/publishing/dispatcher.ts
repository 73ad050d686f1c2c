import { randomUUID } from 'node:crypto';
import {
  NETWORK_LABELS,
  RETRYABLE_PUBLICATION_STATUSES,
  createLogger,
  requiresMedia,
  type Publication,
  type PublicationStatus,
  type SocialNetwork,
} from '@social-publisher/shared';
import { NotFoundError, StateConflictError, TransportError, ValidationError, toErrorMessage } from '../../errors';
import type { PostStore } from '../posts/store';
import type { PostStatusRefresher } from './resolver';
import type { PublicationStore } from './store';
import type { PublishTaskData } from './task';

const logger = createLogger('publish-dispatcher');

export interface TaskHandle {
  id: string;
}

export interface EnqueueOptions {
  taskId: string;
}

export interface PublishTaskQueue {
  enqueue(data: PublishTaskData, options: EnqueueOptions): Promise<TaskHandle>;
}

export interface EnqueueResult {
  publicationId: string;
  network: SocialNetwork;
  status: 'enqueued' | 'failed';
  taskId?: string;
  error?: string;
}

export interface PublishPostResult {
  postId: string;
  totalPublications: number;
  results: EnqueueResult[];
}

export interface RetryPublicationResult {
  publicationId: string;
  network: SocialNetwork;
  status: PublicationStatus;
  taskId: string;
}

function readMedia(publication: Publication): string | null {
  const value = publication.extraData.media_url;
  return typeof value === 'string' && value.trim() ? value : null;
}

/**
 * Hands publications to the task queue. Each publication is claimed into
 * 'processing' with its task id before the job exists, so a worker can never
 * finish a publication that is then overwritten back to 'processing', and a
 * publication that another request already claimed is not enqueued twice.
 */
export class PublishDispatcher {
  constructor(
    private readonly posts: PostStore,
    private readonly publications: PublicationStore,
    private readonly queue: PublishTaskQueue,
    private readonly refresher: PostStatusRefresher,
  ) {}

  async publishPost(postId: string, mediaUrl?: string | null): Promise<PublishPostResult> {
    const post = await this.posts.get(postId);
    if (!post) {
      throw new NotFoundError('post', postId);
    }

    const publications = await this.publications.listByPost(postId);
    if (!publications.length) {
      throw new ValidationError(`post ${postId} has no publications; adapt its content first`);
    }

    const pending = publications.filter((publication) => publication.status === 'pending');
    const media = mediaUrl?.trim() ? mediaUrl.trim() : null;
    if (!media) {
      const needMedia = pending.filter((publication) => requiresMedia(publication.network));
      if (needMedia.length) {
        const labels = needMedia.map((publication) => NETWORK_LABELS[publication.network]).join(', ');
        throw new ValidationError(`media is required to publish on ${labels}`);
      }
    }

    const results: EnqueueResult[] = [];
    for (const publication of pending) {
      const result = await this.enqueue(publication, ['pending'], media, { media_url: media });
      if (result) {
        results.push(result);
      } else {
        logger.info(`publication ${publication.id} was claimed by another request; skipping`);
      }
    }
    if (results.length) {
      await this.refresher.refreshPostStatus(postId);
    }

    logger.info(`post ${postId}: enqueued ${results.filter((r) => r.status === 'enqueued').length}/${pending.length}`);
    return { postId, totalPublications: publications.length, results };
  }

  /**
   * Re-runs a publication from 'failed' or 'pending' with a fresh attempt
   * budget, reusing the media it was first published with.
   */
  async retryPublication(publicationId: string): Promise<RetryPublicationResult> {
    const publication = await this.publications.get(publicationId);
    if (!publication) {
      throw new NotFoundError('publication', publicationId);
    }
    if (!RETRYABLE_PUBLICATION_STATUSES.includes(publication.status)) {
      throw new StateConflictError(
        `publication ${publicationId} cannot be retried from status '${publication.status}'`,
      );
    }

    const result = await this.enqueue(publication, RETRYABLE_PUBLICATION_STATUSES, readMedia(publication), {
      retry: true,
    });
    if (!result) {
      throw new StateConflictError(`publication ${publicationId} is already being processed`);
    }
    await this.refresher.refreshPostStatus(publication.postId);
    if (result.status === 'failed' || !result.taskId) {
      throw new TransportError('task queue', result.error ?? 'enqueue failed');
    }

    return {
      publicationId,
      network: publication.network,
      status: 'processing',
      taskId: result.taskId,
    };
  }

  // Resolves null when the publication has left `from` since it was read
  private async enqueue(
    publication: Publication,
    from: readonly PublicationStatus[],
    media: string | null,
    metadata: Record<string, unknown>,
  ): Promise<EnqueueResult | null> {
    const taskId = randomUUID();
    const claimed = await this.publications.claim(publication.id, from, { ...metadata, task_id: taskId });
    if (!claimed) return null;

    try {
      const handle = await this.queue.enqueue(
        {
          publicationId: publication.id,
          network: publication.network,
          content: publication.adaptedContent,
          media,
        },
        { taskId },
      );
      return { publicationId: publication.id, network: publication.network, status: 'enqueued', taskId: handle.id };
    } catch (error) {
      const message = toErrorMessage(error);
      logger.error(`failed to enqueue publication ${publication.id}`, error);
      await this.publications.updateStatus(publication.id, 'failed', `enqueue failed: ${message}`);
      return { publicationId: publication.id, network: publication.network, status: 'failed', error: message };
    }
  }
}
