import {
  Queue,
  QueueEvents,
  UnrecoverableError,
  Worker,
  type ConnectionOptions,
  type Job,
  type JobsOptions,
} from 'bullmq';
import { createLogger } from '@social-publisher/shared';
import type { PublishingConfig } from '../../config';
import type { EnqueueOptions, PublishTaskQueue, TaskHandle } from './dispatcher';
import type { PublishTaskData, PublishTaskRunner, TaskOutcome } from './task';

const logger = createLogger('queue');

export const PUBLISHING_QUEUE_NAME = 'publishing';
export const PUBLISH_JOB_NAME = 'publish-publication';

type PublishJob = Job<PublishTaskData, TaskOutcome, typeof PUBLISH_JOB_NAME>;

export interface PublishingQueueRuntime {
  queue: Queue<PublishTaskData, TaskOutcome, typeof PUBLISH_JOB_NAME>;
  events: QueueEvents;
}

type RetryPolicy = Pick<PublishingConfig, 'maxAttempts' | 'retryDelayMs'>;

export function createRedisConnection(redisUrl: string): ConnectionOptions {
  const url = new URL(redisUrl);
  const db = Number(url.pathname.replace(/^\//, ''));
  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : 6379,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    db: Number.isInteger(db) ? db : 0,
    tls: url.protocol === 'rediss:' ? {} : undefined,
    // BullMQ workers require blocking commands without a retry cap
    maxRetriesPerRequest: null,
  };
}

// Fixed backoff, bounded attempts; each publication's job retries on its own
export function buildJobOptions(policy: RetryPolicy): JobsOptions {
  return {
    attempts: policy.maxAttempts,
    backoff: { type: 'fixed', delay: policy.retryDelayMs },
    removeOnComplete: 100,
    removeOnFail: 100,
  };
}

export async function createPublishingQueue(
  redisUrl: string,
  policy: RetryPolicy,
): Promise<PublishingQueueRuntime> {
  const queue = new Queue<PublishTaskData, TaskOutcome, typeof PUBLISH_JOB_NAME>(PUBLISHING_QUEUE_NAME, {
    connection: createRedisConnection(redisUrl),
    defaultJobOptions: buildJobOptions(policy),
  });
  const events = new QueueEvents(PUBLISHING_QUEUE_NAME, { connection: createRedisConnection(redisUrl) });

  await Promise.all([queue.waitUntilReady(), events.waitUntilReady()]);
  return { queue, events };
}

export class BullPublishTaskQueue implements PublishTaskQueue {
  constructor(private readonly runtime: PublishingQueueRuntime) {}

  async enqueue(data: PublishTaskData, options: EnqueueOptions): Promise<TaskHandle> {
    const job = await this.runtime.queue.add(PUBLISH_JOB_NAME, data, { jobId: options.taskId });
    return { id: job.id ?? options.taskId };
  }
}

/**
 * Turns a task outcome into what BullMQ understands: a plain error is retried
 * after the backoff, an UnrecoverableError ends the job.
 */
export function settleOutcome(outcome: TaskOutcome): TaskOutcome {
  if (outcome.status === 'published') return outcome;
  if (outcome.retry) {
    throw new Error(outcome.error.message);
  }
  throw new UnrecoverableError(outcome.error.message);
}

export async function startPublishingWorker(
  runner: PublishTaskRunner,
  redisUrl: string,
  concurrency: number,
): Promise<Worker<PublishTaskData, TaskOutcome, typeof PUBLISH_JOB_NAME>> {
  const worker = new Worker<PublishTaskData, TaskOutcome, typeof PUBLISH_JOB_NAME>(
    PUBLISHING_QUEUE_NAME,
    async (job: PublishJob) => settleOutcome(await runner.run(job.data, job.attemptsMade + 1)),
    { connection: createRedisConnection(redisUrl), concurrency },
  );

  worker.on('completed', (job) => {
    logger.info(`completed ${job.name}#${job.id}`);
  });
  worker.on('failed', (job, error) => {
    logger.warn(`failed ${job?.name}#${job?.id} (attempts made: ${job?.attemptsMade ?? 0}): ${error.message}`);
  });
  worker.on('error', (error) => {
    logger.error('worker error', error);
  });

  await worker.waitUntilReady();
  return worker;
}

export async function closePublishingQueue(runtime: PublishingQueueRuntime): Promise<void> {
  await Promise.all([runtime.events.close(), runtime.queue.close()]);
}
