import type { AppConfig } from '../../../config';
import { FacebookPublishAdapter } from './facebook';
import { HttpClient } from './http';
import { InstagramPublishAdapter } from './instagram';
import { LinkedInPublishAdapter } from './linkedin';
import { TikTokPublishAdapter } from './tiktok';
import { WhatsAppPublishAdapter } from './whatsapp';
import type { PublishAdapterRegistry, PublishTimeouts } from './types';

export * from './types';
export { HttpClient, type FetchLike } from './http';

/**
 * One adapter per network. Adding a network to `SocialNetwork` fails to
 * compile until it is registered here.
 */
export function createPublishAdapters(config: AppConfig, http = new HttpClient()): PublishAdapterRegistry {
  const timeouts: PublishTimeouts = {
    mediaMs: config.publishing.mediaUploadTimeoutMs,
    textMs: config.publishing.textTimeoutMs,
  };

  return {
    facebook: new FacebookPublishAdapter(config.meta, config.media, http, timeouts),
    instagram: new InstagramPublishAdapter(config.meta, config.media, http, timeouts),
    linkedin: new LinkedInPublishAdapter(config.linkedin, config.media, http, timeouts),
    tiktok: new TikTokPublishAdapter(config.tiktok, config.media, http, timeouts),
    whatsapp: new WhatsAppPublishAdapter(config.whatsapp, config.media, http, timeouts),
  };
}
