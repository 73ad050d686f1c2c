import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestContext, type TestContext } from './helpers';

describe('PostStore', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  afterEach(async () => {
    await ctx.db.close();
  });

  it('creates drafts and reads them back', async () => {
    const created = await ctx.posts.create({ title: 'Hello', content: 'World', ownerId: 'user-1' });

    expect(created.status).toBe('draft');
    expect(await ctx.posts.get(created.id)).toEqual(created);
    expect(await ctx.posts.get('missing')).toBeNull();
  });

  it('filters by status and owner', async () => {
    const a = await ctx.posts.create({ title: 'A', content: 'a', ownerId: 'user-1' });
    await ctx.posts.create({ title: 'B', content: 'b', ownerId: 'user-2' });
    await ctx.posts.updateStatus(a.id, 'processing');

    const processing = await ctx.posts.list({ status: 'processing' });
    expect(processing.map((post) => post.id)).toEqual([a.id]);

    const owned = await ctx.posts.list({ ownerId: 'user-2' });
    expect(owned.map((post) => post.title)).toEqual(['B']);
  });

  it('applies limit and offset', async () => {
    for (const title of ['one', 'two', 'three']) {
      await ctx.posts.create({ title, content: title });
    }

    expect(await ctx.posts.list({ limit: 2 })).toHaveLength(2);
    expect(await ctx.posts.list({ limit: 2, offset: 2 })).toHaveLength(1);
  });

  it('leaves the row alone when the status is unchanged', async () => {
    const created = await ctx.posts.create({ title: 'Same', content: 'same' });
    const unchanged = await ctx.posts.updateStatus(created.id, 'draft');

    expect(unchanged?.updatedAt).toBe(created.updatedAt);
    expect(await ctx.posts.updateStatus('missing', 'failed')).toBeNull();
  });

  it('reports whether a delete removed anything', async () => {
    const created = await ctx.posts.create({ title: 'Bye', content: 'bye' });

    expect(await ctx.posts.delete(created.id)).toBe(true);
    expect(await ctx.posts.delete(created.id)).toBe(false);
  });
});
