import { err, ok } from '@social-publisher/shared';
import type { MediaConfig, WhatsAppConfig } from '../../../config';
import { ValidationError } from '../../../errors';
import { pickString, type HttpClient, type HttpResponse } from './http';
import { readLocalMedia, resolveMediaReference } from './media';
import type { PublishAdapter, PublishRequest, PublishResult, PublishTimeouts } from './types';

function toSuccess(response: HttpResponse): PublishResult {
  return ok({
    externalId: pickString(response.data, 'message', 'id') ?? pickString(response.data, 'id'),
    raw: response.data,
  });
}

// Status (story) post through the Whapi gateway
export class WhatsAppPublishAdapter implements PublishAdapter {
  readonly network = 'whatsapp';

  constructor(
    private readonly whatsapp: WhatsAppConfig,
    private readonly media: MediaConfig,
    private readonly http: HttpClient,
    private readonly timeouts: PublishTimeouts,
  ) {}

  async publish({ content, media, signal }: PublishRequest): Promise<PublishResult> {
    const { token, apiUrl } = this.whatsapp;
    if (!token) {
      return err(new ValidationError('whatsapp is not configured (WHATSAPP_TOKEN)'));
    }
    const authorization = { Authorization: `Bearer ${token}`, Accept: 'application/json' };

    if (!media) {
      const result = await this.http.request(
        `${apiUrl}/stories/send/text`,
        {
          method: 'POST',
          headers: { ...authorization, 'Content-Type': 'application/json' },
          body: JSON.stringify({ caption: content }),
        },
        { target: 'whatsapp text status', timeoutMs: this.timeouts.textMs, signal },
      );
      return result.ok ? toSuccess(result.value) : result;
    }

    const resolved = resolveMediaReference(media, this.media);
    if (!resolved.ok) return resolved;
    const reference = resolved.value;
    if (reference.kind === 'remote') {
      const result = await this.http.request(
        `${apiUrl}/stories/send/media`,
        {
          method: 'POST',
          headers: { ...authorization, 'Content-Type': 'application/json' },
          body: JSON.stringify({ media: reference.url, caption: content }),
        },
        { target: 'whatsapp media status', timeoutMs: this.timeouts.mediaMs, signal },
      );
      return result.ok ? toSuccess(result.value) : result;
    }

    const file = await readLocalMedia(reference);
    if (!file.ok) return file;

    const form = new FormData();
    form.set('media', file.value.blob, file.value.fileName);
    form.set('caption', content);
    form.set('exclude_contacts', '[]');

    const result = await this.http.request(
      `${apiUrl}/stories/send/media`,
      { method: 'POST', headers: authorization, body: form },
      { target: 'whatsapp media status', timeoutMs: this.timeouts.mediaMs, signal },
    );
    return result.ok ? toSuccess(result.value) : result;
  }
}
