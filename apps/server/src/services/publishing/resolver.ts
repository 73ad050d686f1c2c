import type { PostStatus, Publication, PublicationStatusSummary } from '@social-publisher/shared';
import { createLogger } from '@social-publisher/shared';
import type { PostStore } from '../posts/store';
import type { PublicationStore } from './store';

const logger = createLogger('resolver');

export function summarizePublicationStatuses(
  publications: ReadonlyArray<Pick<Publication, 'status'>>,
): PublicationStatusSummary {
  const summary: PublicationStatusSummary = {
    total: publications.length,
    pending: 0,
    processing: 0,
    published: 0,
    failed: 0,
  };
  for (const publication of publications) {
    summary[publication.status] += 1;
  }
  return summary;
}

/**
 * Aggregate status of a post from the statuses of all of its publications.
 * Rule order matters: once nothing is pending or processing, a single success
 * makes the post 'published' even if siblings failed.
 *
 * Callers must not pass an empty list; a post without publications keeps its
 * own status.
 */
export function resolvePostStatus(publications: ReadonlyArray<Pick<Publication, 'status'>>): PostStatus {
  const { total, published, failed, processing, pending } = summarizePublicationStatuses(publications);

  if (total === 0) {
    throw new RangeError('resolvePostStatus requires at least one publication');
  }
  if (published === total) return 'published';
  if (failed === total) return 'failed';
  if (processing > 0 || pending > 0) return 'processing';
  if (published > 0) return 'published';
  return 'failed';
}

export interface PostStatusRefresher {
  refreshPostStatus(postId: string): Promise<PostStatus | null>;
}

/**
 * Re-reads every publication of the post and writes the resolved status.
 * Not locked against sibling tasks: the task that settles the last in-flight
 * publication always reads a fully terminal set.
 */
export function createPostStatusRefresher(
  posts: PostStore,
  publications: PublicationStore,
): PostStatusRefresher {
  return {
    async refreshPostStatus(postId: string): Promise<PostStatus | null> {
      const siblings = await publications.listByPost(postId);
      if (!siblings.length) {
        logger.warn(`post ${postId} has no publications, status left unchanged`);
        return null;
      }

      const summary = summarizePublicationStatuses(siblings);
      const status = resolvePostStatus(siblings);
      logger.debug(
        `post ${postId}: total=${summary.total} published=${summary.published} failed=${summary.failed} ` +
          `processing=${summary.processing} pending=${summary.pending} -> ${status}`,
      );

      const updated = await posts.updateStatus(postId, status);
      if (!updated) {
        logger.warn(`post ${postId} disappeared before its status could be updated`);
        return null;
      }
      return updated.status;
    },
  };
}
