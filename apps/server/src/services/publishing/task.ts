import { createLogger, err, type SocialNetwork } from '@social-publisher/shared';
import {
  AppError,
  NotFoundError,
  TransportError,
  toErrorMessage,
  type PublishFailure,
} from '../../errors';
import type { PublishAdapterRegistry, PublishResult } from './adapters';
import type { PostStatusRefresher } from './resolver';
import type { PublicationStore } from './store';

const logger = createLogger('publish-task');

export interface PublishTaskData {
  publicationId: string;
  network: SocialNetwork;
  content: string;
  media?: string | null;
}

export type TaskOutcome =
  | { status: 'published'; publicationId: string; externalId: string | null }
  | {
      status: 'failed';
      publicationId: string;
      error: PublishFailure | NotFoundError;
      retry: boolean;
    };

export interface PublishTaskRunnerOptions {
  publications: PublicationStore;
  refresher: PostStatusRefresher;
  adapters: PublishAdapterRegistry;
  maxAttempts: number;
  taskTimeLimitMs: number;
}

// Platform rejections and unreachable platforms are retried; bad input is not
export function shouldRetry(failure: AppError, attempt: number, maxAttempts: number): boolean {
  if (failure.kind !== 'remote' && failure.kind !== 'transport') return false;
  return attempt < maxAttempts;
}

function isPublishFailure(error: unknown): error is PublishFailure {
  return (
    error instanceof AppError &&
    (error.kind === 'validation' || error.kind === 'remote' || error.kind === 'transport')
  );
}

/**
 * Drives one publication through processing to published or failed. This is
 * the only place publish failures turn into persisted status and message; the
 * queue only reads the returned outcome to decide whether to try again.
 */
export class PublishTaskRunner {
  constructor(private readonly options: PublishTaskRunnerOptions) {}

  async run(data: PublishTaskData, attempt = 1): Promise<TaskOutcome> {
    const { publications, maxAttempts } = this.options;
    const { publicationId, network } = data;

    const current = await publications.get(publicationId);
    if (!current) {
      logger.warn(`publication ${publicationId} not found, dropping task`);
      return {
        status: 'failed',
        publicationId,
        error: new NotFoundError('publication', publicationId),
        retry: false,
      };
    }
    // Duplicate delivery of a finished task; never move back out of 'published'
    if (current.status === 'published') {
      logger.info(`publication ${publicationId} already published, skipping`);
      const externalId = current.extraData.external_id;
      return { status: 'published', publicationId, externalId: typeof externalId === 'string' ? externalId : null };
    }

    // Persisted before the platform call so a crash leaves the record visibly in 'processing'
    const processing = (await publications.updateStatus(publicationId, 'processing')) ?? current;
    await this.refreshPost(processing.postId);

    logger.info(`publishing ${publicationId} to ${network} (attempt ${attempt}/${maxAttempts})`);
    const result = await this.callAdapter(data);

    if (result.ok) {
      await publications.updateStatus(publicationId, 'published', undefined, {
        platform: network,
        external_id: result.value.externalId,
        response: result.value.raw,
      });
      await this.refreshPost(processing.postId);
      logger.info(`publication ${publicationId} published on ${network}`);
      return { status: 'published', publicationId, externalId: result.value.externalId };
    }

    const failure = result.error;
    await publications.updateStatus(publicationId, 'failed', failure.message);
    await this.refreshPost(processing.postId);

    const retry = shouldRetry(failure, attempt, maxAttempts);
    logger.warn(
      `publication ${publicationId} failed on ${network} (${failure.kind}, attempt ${attempt}/${maxAttempts}` +
        `${retry ? ', will retry' : ', giving up'}): ${failure.message}`,
    );
    return { status: 'failed', publicationId, error: failure, retry };
  }

  private async callAdapter(data: PublishTaskData): Promise<PublishResult> {
    const adapter = this.options.adapters[data.network];
    const limitMs = this.options.taskTimeLimitMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeLimit = new Promise<PublishResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(err(new TransportError(data.network, `task time limit of ${limitMs}ms exceeded`)));
      }, limitMs);
    });

    const call = adapter
      .publish({ content: data.content, media: data.media, signal: controller.signal })
      .catch((error: unknown): PublishResult => {
        if (isPublishFailure(error)) return err(error);
        logger.error(`${data.network} adapter threw unexpectedly`, error);
        return err(new TransportError(data.network, toErrorMessage(error)));
      });

    try {
      return await Promise.race([call, timeLimit]);
    } finally {
      clearTimeout(timer);
    }
  }

  // Post status is best effort; a failure here must not change the task outcome
  private async refreshPost(postId: string): Promise<void> {
    try {
      await this.options.refresher.refreshPostStatus(postId);
    } catch (error) {
      logger.error(`failed to refresh status of post ${postId}`, error);
    }
  }
}
