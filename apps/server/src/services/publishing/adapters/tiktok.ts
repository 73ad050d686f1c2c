import { err, ok } from '@social-publisher/shared';
import type { MediaConfig, TikTokConfig } from '../../../config';
import { ValidationError } from '../../../errors';
import { pickString, type HttpClient } from './http';
import { isVideo, readLocalMedia, resolveMediaReference } from './media';
import type { PublishAdapter, PublishRequest, PublishResult, PublishTimeouts } from './types';

const TIKTOK_TITLE_LIMIT = 150;

/**
 * TikTok goes through a separate upload backend that owns the OAuth session.
 * Only videos stored in our media directory can be sent.
 */
export class TikTokPublishAdapter implements PublishAdapter {
  readonly network = 'tiktok';

  constructor(
    private readonly tiktok: TikTokConfig,
    private readonly media: MediaConfig,
    private readonly http: HttpClient,
    private readonly timeouts: PublishTimeouts,
  ) {}

  async publish({ content, media, signal }: PublishRequest): Promise<PublishResult> {
    if (!media) {
      return err(new ValidationError('tiktok requires a video'));
    }

    const resolved = resolveMediaReference(media, this.media);
    if (!resolved.ok) return resolved;
    const reference = resolved.value;
    if (reference.kind === 'remote') {
      return err(new ValidationError('tiktok requires a local video; upload or generate one first'));
    }
    if (!isVideo(reference.fileName)) {
      return err(new ValidationError(`tiktok requires a video file, got ${reference.fileName}`));
    }

    const file = await readLocalMedia(reference);
    if (!file.ok) return file;

    const form = new FormData();
    form.set('video', file.value.blob, file.value.fileName);
    form.set('title', content.slice(0, TIKTOK_TITLE_LIMIT));
    form.set('privacy_level', 'PUBLIC_TO_EVERYONE');
    form.set('disable_comment', 'false');

    const result = await this.http.request(
      `${this.tiktok.apiUrl}/api/tiktok/upload`,
      { method: 'POST', body: form },
      { target: 'tiktok upload backend', timeoutMs: this.timeouts.mediaMs, signal },
    );
    if (!result.ok) return result;

    const data = result.value.data;
    return ok({
      externalId: pickString(data, 'publish_id') ?? pickString(data, 'data', 'publish_id') ?? pickString(data, 'id'),
      raw: data,
    });
  }
}
