import { err, ok } from '@social-publisher/shared';
import type { MediaConfig, MetaConfig } from '../../../config';
import { RemoteError, ValidationError } from '../../../errors';
import { FORM_HEADERS, formBody, pickString, type HttpClient } from './http';
import { isVideo, publicMediaUrl, resolveMediaReference } from './media';
import type { PublishAdapter, PublishRequest, PublishResult, PublishTimeouts } from './types';

const GRAPH_BASE_URL = 'https://graph.facebook.com';
const INSTAGRAM_CAPTION_LIMIT = 2200;

function truncateCaption(text: string): string {
  return text.length > INSTAGRAM_CAPTION_LIMIT
    ? `${text.slice(0, INSTAGRAM_CAPTION_LIMIT - 1)}…`
    : text;
}

/**
 * Two-step Graph API publish: create a media container from a public image
 * URL, then publish the container. Files we host are handed over through the
 * public base URL, so Instagram must be able to reach it.
 */
export class InstagramPublishAdapter implements PublishAdapter {
  readonly network = 'instagram';

  constructor(
    private readonly meta: MetaConfig,
    private readonly media: MediaConfig,
    private readonly http: HttpClient,
    private readonly timeouts: PublishTimeouts,
  ) {}

  async publish({ content, media, signal }: PublishRequest): Promise<PublishResult> {
    if (!media) {
      return err(new ValidationError('instagram requires an image'));
    }
    const { instagramAccountId, instagramAccessToken } = this.meta;
    if (!instagramAccountId || !instagramAccessToken) {
      return err(new ValidationError('instagram is not configured (INSTAGRAM_ACCOUNT_ID/INSTAGRAM_ACCESS_TOKEN)'));
    }

    const resolved = resolveMediaReference(media, this.media);
    if (!resolved.ok) return resolved;
    const reference = resolved.value;
    const imageUrl = publicMediaUrl(reference, this.media);
    if (isVideo(imageUrl.split('?')[0])) {
      return err(new ValidationError('instagram publishing supports images only'));
    }

    const accountUrl = `${GRAPH_BASE_URL}/${this.meta.graphVersion}/${instagramAccountId}`;

    const created = await this.http.request(
      `${accountUrl}/media`,
      {
        method: 'POST',
        headers: FORM_HEADERS,
        body: formBody({
          image_url: imageUrl,
          caption: truncateCaption(content),
          access_token: instagramAccessToken,
        }),
      },
      { target: 'instagram media create', timeoutMs: this.timeouts.mediaMs, signal },
    );
    if (!created.ok) return created;

    const creationId = pickString(created.value.data, 'id');
    if (!creationId) {
      return err(new RemoteError('instagram media create', created.value.status, 'response missing id'));
    }

    const published = await this.http.request(
      `${accountUrl}/media_publish`,
      {
        method: 'POST',
        headers: FORM_HEADERS,
        body: formBody({ creation_id: creationId, access_token: instagramAccessToken }),
      },
      { target: 'instagram media publish', timeoutMs: this.timeouts.mediaMs, signal },
    );
    if (!published.ok) return published;

    const mediaId = pickString(published.value.data, 'id');
    if (!mediaId) {
      return err(new RemoteError('instagram media publish', published.value.status, 'response missing id'));
    }

    return ok({
      externalId: mediaId,
      raw: { creation_id: creationId, media_url: imageUrl, ...published.value.data },
    });
  }
}
