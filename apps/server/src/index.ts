import { config as loadEnv } from 'dotenv';
import { createLogger } from '@social-publisher/shared';
import { createApp } from './app';
import { loadConfig } from './config';
import { initDatabase } from './db';
import { createOpenAiContentAdapter } from './services/content/adapter';
import { createOpenAiImageGenerator } from './services/content/images';
import { ContentOrchestrator } from './services/content/orchestrator';
import { PostStore } from './services/posts/store';
import { createPublishAdapters } from './services/publishing/adapters';
import { PublishDispatcher } from './services/publishing/dispatcher';
import {
  BullPublishTaskQueue,
  closePublishingQueue,
  createPublishingQueue,
  startPublishingWorker,
} from './services/publishing/queue';
import { createPostStatusRefresher } from './services/publishing/resolver';
import { PublicationStore } from './services/publishing/store';
import { PublishTaskRunner } from './services/publishing/task';

loadEnv();

const logger = createLogger('server');

async function startServer(): Promise<void> {
  const config = loadConfig();
  const db = await initDatabase(config.databaseUrl);

  const posts = new PostStore(db);
  const publications = new PublicationStore(db);
  const refresher = createPostStatusRefresher(posts, publications);

  const queueRuntime = await createPublishingQueue(config.redisUrl, config.publishing);
  const dispatcher = new PublishDispatcher(posts, publications, new BullPublishTaskQueue(queueRuntime), refresher);

  let worker: Awaited<ReturnType<typeof startPublishingWorker>> | null = null;
  if (config.publishing.runWorker) {
    const runner = new PublishTaskRunner({
      publications,
      refresher,
      adapters: createPublishAdapters(config),
      maxAttempts: config.publishing.maxAttempts,
      taskTimeLimitMs: config.publishing.taskTimeLimitMs,
    });
    worker = await startPublishingWorker(runner, config.redisUrl, config.publishing.workerConcurrency);
    logger.info(`publishing worker started (concurrency ${config.publishing.workerConcurrency})`);
  }

  const app = createApp(config, {
    db,
    posts,
    publications,
    dispatcher,
    orchestrator: new ContentOrchestrator(createOpenAiContentAdapter(config.openai), posts, publications),
    generateImage: createOpenAiImageGenerator(config.openai, config.media),
  });

  const server = app.listen(config.port, config.host, () => {
    logger.info(`listening on http://${config.host}:${config.port}`);
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      void (async () => {
        await worker?.close();
        await closePublishingQueue(queueRuntime);
        await db.close();
        process.exit(0);
      })().catch((error: unknown) => {
        logger.error('shutdown failed', error);
        process.exit(1);
      });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

void startServer().catch((error: unknown) => {
  logger.error('failed to start', error);
  process.exit(1);
});
