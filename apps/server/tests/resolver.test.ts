import type { PublicationStatus } from '@social-publisher/shared';
import { describe, expect, it } from 'vitest';
import { resolvePostStatus, summarizePublicationStatuses } from '../src/services/publishing/resolver';
import { createTestContext } from './helpers';

const of = (...statuses: PublicationStatus[]) => statuses.map((status) => ({ status }));

describe('resolvePostStatus', () => {
  it.each([
    { statuses: of('published', 'published'), expected: 'published' },
    { statuses: of('failed', 'failed', 'failed'), expected: 'failed' },
    { statuses: of('published', 'processing'), expected: 'processing' },
    { statuses: of('pending', 'failed'), expected: 'processing' },
    { statuses: of('published', 'failed'), expected: 'published' },
    { statuses: of('published', 'failed', 'failed'), expected: 'published' },
    { statuses: of('pending'), expected: 'processing' },
  ])('resolves $statuses to $expected', ({ statuses, expected }) => {
    expect(resolvePostStatus(statuses)).toBe(expected);
  });

  it('does not depend on order', () => {
    expect(resolvePostStatus(of('failed', 'published', 'failed'))).toBe(
      resolvePostStatus(of('failed', 'failed', 'published')),
    );
  });

  it('rejects an empty list', () => {
    expect(() => resolvePostStatus([])).toThrow(RangeError);
  });
});

describe('summarizePublicationStatuses', () => {
  it('counts each status', () => {
    expect(summarizePublicationStatuses(of('published', 'failed', 'failed', 'pending'))).toEqual({
      total: 4,
      pending: 1,
      processing: 0,
      published: 1,
      failed: 2,
    });
  });
});

describe('createPostStatusRefresher', () => {
  it('writes the resolved status onto the post', async () => {
    const { db, posts, publications, refresher } = await createTestContext();
    const post = await posts.create({ title: 'Launch', content: 'We launch today' });
    const facebook = await publications.create(post.id, 'facebook', 'fb copy');
    const linkedin = await publications.create(post.id, 'linkedin', 'li copy');
    await publications.updateStatus(facebook.id, 'published');
    await publications.updateStatus(linkedin.id, 'failed', 'linkedin share failed (500): boom');

    expect(await refresher.refreshPostStatus(post.id)).toBe('published');
    expect((await posts.get(post.id))?.status).toBe('published');
    await db.close();
  });

  it('leaves a post without publications unchanged', async () => {
    const { db, posts, refresher } = await createTestContext();
    const post = await posts.create({ title: 'Draft', content: 'Not adapted yet' });

    expect(await refresher.refreshPostStatus(post.id)).toBeNull();
    expect((await posts.get(post.id))?.status).toBe('draft');
    await db.close();
  });
});
