import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Post } from '@social-publisher/shared';
import { NotFoundError, StateConflictError, TransportError, ValidationError } from '../src/errors';
import {
  PublishDispatcher,
  type EnqueueOptions,
  type PublishTaskQueue,
  type TaskHandle,
} from '../src/services/publishing/dispatcher';
import type { PublishTaskData } from '../src/services/publishing/task';
import { createTestContext, type TestContext } from './helpers';

class FakeQueue implements PublishTaskQueue {
  readonly jobs: Array<{ data: PublishTaskData; taskId: string }> = [];
  failWith: string | null = null;

  async enqueue(data: PublishTaskData, options: EnqueueOptions): Promise<TaskHandle> {
    if (this.failWith) {
      throw new Error(this.failWith);
    }
    this.jobs.push({ data, taskId: options.taskId });
    return { id: options.taskId };
  }
}

describe('PublishDispatcher', () => {
  let ctx: TestContext;
  let queue: FakeQueue;
  let dispatcher: PublishDispatcher;
  let post: Post;

  beforeEach(async () => {
    ctx = await createTestContext();
    queue = new FakeQueue();
    dispatcher = new PublishDispatcher(ctx.posts, ctx.publications, queue, ctx.refresher);
    post = await ctx.posts.create({ title: 'New menu', content: 'Try the new menu' });
  });

  afterEach(async () => {
    await ctx.db.close();
  });

  describe('publishPost', () => {
    it('rejects an unknown post', async () => {
      await expect(dispatcher.publishPost('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects a post that was never adapted', async () => {
      await expect(dispatcher.publishPost(post.id)).rejects.toBeInstanceOf(ValidationError);
    });

    it('requires media when a pending network cannot post text alone', async () => {
      await ctx.publications.create(post.id, 'facebook', 'fb copy');
      await ctx.publications.create(post.id, 'instagram', 'ig copy');

      await expect(dispatcher.publishPost(post.id)).rejects.toThrow('media is required to publish on Instagram');
      expect(queue.jobs).toHaveLength(0);
    });

    it('enqueues every pending publication with the media', async () => {
      const facebook = await ctx.publications.create(post.id, 'facebook', 'fb copy');
      const instagram = await ctx.publications.create(post.id, 'instagram', 'ig copy');
      const linkedin = await ctx.publications.create(post.id, 'linkedin', 'li copy');
      await ctx.publications.updateStatus(linkedin.id, 'published');

      const result = await dispatcher.publishPost(post.id, ' https://cdn.test/menu.png ');

      expect(result.totalPublications).toBe(3);
      expect(result.results.map((item) => [item.network, item.status])).toEqual([
        ['facebook', 'enqueued'],
        ['instagram', 'enqueued'],
      ]);
      expect(queue.jobs.map((job) => job.data)).toEqual([
        { publicationId: facebook.id, network: 'facebook', content: 'fb copy', media: 'https://cdn.test/menu.png' },
        { publicationId: instagram.id, network: 'instagram', content: 'ig copy', media: 'https://cdn.test/menu.png' },
      ]);

      const stored = await ctx.publications.get(facebook.id);
      expect(stored?.status).toBe('processing');
      expect(stored?.extraData).toEqual({ media_url: 'https://cdn.test/menu.png', task_id: queue.jobs[0].taskId });
      expect(result.results[0].taskId).toBe(queue.jobs[0].taskId);
      expect((await ctx.posts.get(post.id))?.status).toBe('processing');
    });

    it('enqueues a publication once when two publish requests overlap', async () => {
      const facebook = await ctx.publications.create(post.id, 'facebook', 'fb copy');

      const [first, second] = await Promise.all([dispatcher.publishPost(post.id), dispatcher.publishPost(post.id)]);

      expect(queue.jobs).toHaveLength(1);
      expect(queue.jobs[0].data.publicationId).toBe(facebook.id);
      expect([...first.results, ...second.results]).toEqual([
        { publicationId: facebook.id, network: 'facebook', status: 'enqueued', taskId: queue.jobs[0].taskId },
      ]);
      expect((await ctx.publications.get(facebook.id))?.extraData.task_id).toBe(queue.jobs[0].taskId);
    });

    it('marks a publication failed when the queue refuses it', async () => {
      const facebook = await ctx.publications.create(post.id, 'facebook', 'fb copy');
      queue.failWith = 'redis down';

      const result = await dispatcher.publishPost(post.id);

      expect(result.results).toEqual([
        { publicationId: facebook.id, network: 'facebook', status: 'failed', error: 'redis down' },
      ]);
      const stored = await ctx.publications.get(facebook.id);
      expect(stored?.status).toBe('failed');
      expect(stored?.errorMessage).toBe('enqueue failed: redis down');
      expect((await ctx.posts.get(post.id))?.status).toBe('failed');
    });
  });

  describe('retryPublication', () => {
    it('rejects an unknown publication', async () => {
      await expect(dispatcher.retryPublication('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it.each(['processing', 'published'] as const)('refuses a %s publication', async (status) => {
      const publication = await ctx.publications.create(post.id, 'facebook', 'fb copy');
      await ctx.publications.updateStatus(publication.id, status);

      await expect(dispatcher.retryPublication(publication.id)).rejects.toBeInstanceOf(StateConflictError);
      expect(queue.jobs).toHaveLength(0);
    });

    it('re-enqueues a failed publication with its original media', async () => {
      const publication = await ctx.publications.create(post.id, 'instagram', 'ig copy');
      await ctx.publications.updateStatus(publication.id, 'failed', 'instagram media create failed (500): x', {
        media_url: 'https://cdn.test/menu.png',
      });

      const result = await dispatcher.retryPublication(publication.id);

      expect(result).toEqual({
        publicationId: publication.id,
        network: 'instagram',
        status: 'processing',
        taskId: queue.jobs[0].taskId,
      });
      expect(queue.jobs[0].data.media).toBe('https://cdn.test/menu.png');
      expect((await ctx.publications.get(publication.id))?.extraData).toMatchObject({ retry: true });
      expect((await ctx.posts.get(post.id))?.status).toBe('processing');
    });

    it('accepts a pending publication', async () => {
      const publication = await ctx.publications.create(post.id, 'facebook', 'fb copy');

      await expect(dispatcher.retryPublication(publication.id)).resolves.toMatchObject({ status: 'processing' });
      expect(queue.jobs[0].data.media).toBeNull();
    });

    it('lets only one of two overlapping retries through', async () => {
      const publication = await ctx.publications.create(post.id, 'facebook', 'fb copy');
      await ctx.publications.updateStatus(publication.id, 'failed', 'facebook request timed out');

      const outcomes = await Promise.allSettled([
        dispatcher.retryPublication(publication.id),
        dispatcher.retryPublication(publication.id),
      ]);

      expect(queue.jobs).toHaveLength(1);
      expect(outcomes.filter((outcome) => outcome.status === 'fulfilled')).toHaveLength(1);
      const rejected = outcomes.filter((outcome) => outcome.status === 'rejected');
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(StateConflictError);
      expect((await ctx.publications.get(publication.id))?.status).toBe('processing');
    });

    it('reports a queue outage', async () => {
      const publication = await ctx.publications.create(post.id, 'facebook', 'fb copy');
      queue.failWith = 'redis down';

      await expect(dispatcher.retryPublication(publication.id)).rejects.toBeInstanceOf(TransportError);
      expect((await ctx.publications.get(publication.id))?.status).toBe('failed');
    });
  });
});
