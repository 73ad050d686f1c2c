import { ok, type SocialNetwork } from '@social-publisher/shared';
import { loadConfig, type AppConfig, type Env } from '../src/config';
import { initDatabase, type DatabaseClient } from '../src/db';
import { PostStore } from '../src/services/posts/store';
import type { PublishAdapter, PublishAdapterRegistry } from '../src/services/publishing/adapters';
import { createPostStatusRefresher, type PostStatusRefresher } from '../src/services/publishing/resolver';
import { PublicationStore } from '../src/services/publishing/store';

export interface TestContext {
  db: DatabaseClient;
  posts: PostStore;
  publications: PublicationStore;
  refresher: PostStatusRefresher;
}

export async function createTestContext(): Promise<TestContext> {
  const db = await initDatabase(':memory:');
  const posts = new PostStore(db);
  const publications = new PublicationStore(db);
  return { db, posts, publications, refresher: createPostStatusRefresher(posts, publications) };
}

export function testConfig(env: Env = {}): AppConfig {
  return loadConfig({ NODE_ENV: 'test', ...env });
}

type PublishFn = PublishAdapter['publish'];

// Every network succeeds with `<network>-post-1` unless overridden
export function createFakeAdapters(overrides: Partial<Record<SocialNetwork, PublishFn>> = {}): PublishAdapterRegistry {
  const make = (network: SocialNetwork): PublishAdapter => ({
    network,
    publish: overrides[network] ?? (async () => ok({ externalId: `${network}-post-1`, raw: { id: `${network}-post-1` } })),
  });

  return {
    facebook: make('facebook'),
    instagram: make('instagram'),
    linkedin: make('linkedin'),
    tiktok: make('tiktok'),
    whatsapp: make('whatsapp'),
  };
}
