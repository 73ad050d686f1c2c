import { err, ok } from '@social-publisher/shared';
import type { MediaConfig, MetaConfig } from '../../../config';
import { ValidationError } from '../../../errors';
import { FORM_HEADERS, formBody, pickString, type HttpClient, type HttpResponse } from './http';
import { readLocalMedia, resolveMediaReference } from './media';
import type { PublishAdapter, PublishRequest, PublishResult, PublishTimeouts } from './types';

const GRAPH_BASE_URL = 'https://graph.facebook.com';

function toSuccess(response: HttpResponse): PublishResult {
  return ok({
    externalId: pickString(response.data, 'post_id') ?? pickString(response.data, 'id'),
    raw: response.data,
  });
}

// Page feed post, or a page photo when media is given
export class FacebookPublishAdapter implements PublishAdapter {
  readonly network = 'facebook';

  constructor(
    private readonly meta: MetaConfig,
    private readonly media: MediaConfig,
    private readonly http: HttpClient,
    private readonly timeouts: PublishTimeouts,
  ) {}

  async publish({ content, media, signal }: PublishRequest): Promise<PublishResult> {
    const { pageId, pageAccessToken } = this.meta;
    if (!pageId || !pageAccessToken) {
      return err(new ValidationError('facebook is not configured (FACEBOOK_PAGE_ID/FACEBOOK_PAGE_ACCESS_TOKEN)'));
    }
    const pageUrl = `${GRAPH_BASE_URL}/${this.meta.graphVersion}/${pageId}`;

    if (!media) {
      const result = await this.http.request(
        `${pageUrl}/feed`,
        {
          method: 'POST',
          headers: FORM_HEADERS,
          body: formBody({ message: content, access_token: pageAccessToken }),
        },
        { target: 'facebook feed post', timeoutMs: this.timeouts.textMs, signal },
      );
      return result.ok ? toSuccess(result.value) : result;
    }

    const resolved = resolveMediaReference(media, this.media);
    if (!resolved.ok) return resolved;
    const reference = resolved.value;
    if (reference.kind === 'remote') {
      const result = await this.http.request(
        `${pageUrl}/photos`,
        {
          method: 'POST',
          headers: FORM_HEADERS,
          body: formBody({ url: reference.url, caption: content, access_token: pageAccessToken }),
        },
        { target: 'facebook photo post', timeoutMs: this.timeouts.mediaMs, signal },
      );
      return result.ok ? toSuccess(result.value) : result;
    }

    const file = await readLocalMedia(reference);
    if (!file.ok) return file;

    const form = new FormData();
    form.set('source', file.value.blob, file.value.fileName);
    form.set('caption', content);
    form.set('access_token', pageAccessToken);
    form.set('published', 'true');

    const result = await this.http.request(
      `${pageUrl}/photos`,
      { method: 'POST', body: form },
      { target: 'facebook photo upload', timeoutMs: this.timeouts.mediaMs, signal },
    );
    return result.ok ? toSuccess(result.value) : result;
  }
}
