import type { Result, SocialNetwork } from '@social-publisher/shared';
import type { PublishFailure } from '../../../errors';

export interface PublishRequest {
  content: string;
  // Public URL, link into our media directory, or local path
  media?: string | null;
  signal?: AbortSignal;
}

export interface PublishSuccess {
  externalId: string | null;
  raw: Record<string, unknown>;
}

export type PublishResult = Result<PublishSuccess, PublishFailure>;

export interface PublishAdapter {
  readonly network: SocialNetwork;
  publish(request: PublishRequest): Promise<PublishResult>;
}

export type PublishAdapterRegistry = Record<SocialNetwork, PublishAdapter>;

export interface PublishTimeouts {
  mediaMs: number;
  textMs: number;
}
