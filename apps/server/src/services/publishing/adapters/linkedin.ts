import { err, ok, type Result } from '@social-publisher/shared';
import type { LinkedInConfig, MediaConfig } from '../../../config';
import { RemoteError, ValidationError, type PublishFailure } from '../../../errors';
import { pickString, type HttpClient, type HttpResponse } from './http';
import { readLocalMedia, resolveMediaReference } from './media';
import type { PublishAdapter, PublishRequest, PublishResult, PublishTimeouts } from './types';

const LINKEDIN_API_URL = 'https://api.linkedin.com/v2';
const IMAGE_RECIPE = 'urn:li:digitalmediaRecipe:feedshare-image';
const UPLOAD_MECHANISM = 'com.linkedin.digitalmedia.uploading.MediaUploadHttpRequest';

type ShareMedia = { category: 'NONE' } | { category: 'IMAGE'; asset: string };

function buildShareBody(author: string, text: string, media: ShareMedia): Record<string, unknown> {
  return {
    author,
    lifecycleState: 'PUBLISHED',
    specificContent: {
      'com.linkedin.ugc.ShareContent': {
        shareCommentary: { text },
        shareMediaCategory: media.category,
        ...(media.category === 'IMAGE' ? { media: [{ status: 'READY', media: media.asset }] } : {}),
      },
    },
    visibility: { 'com.linkedin.ugc.MemberNetworkVisibility': 'PUBLIC' },
  };
}

function toSuccess(response: HttpResponse): PublishResult {
  return ok({
    externalId: response.headers.get('x-restli-id') ?? pickString(response.data, 'id'),
    raw: response.data,
  });
}

// UGC share; an image is registered and uploaded as an asset first
export class LinkedInPublishAdapter implements PublishAdapter {
  readonly network = 'linkedin';

  constructor(
    private readonly linkedin: LinkedInConfig,
    private readonly media: MediaConfig,
    private readonly http: HttpClient,
    private readonly timeouts: PublishTimeouts,
  ) {}

  private headers(accessToken: string): Record<string, string> {
    return {
      Authorization: `Bearer ${accessToken}`,
      'Content-Type': 'application/json',
      'X-Restli-Protocol-Version': '2.0.0',
    };
  }

  async publish({ content, media, signal }: PublishRequest): Promise<PublishResult> {
    const { accessToken, authorUrn } = this.linkedin;
    if (!accessToken || !authorUrn) {
      return err(new ValidationError('linkedin is not configured (LINKEDIN_ACCESS_TOKEN/LINKEDIN_AUTHOR_URN)'));
    }

    let shareMedia: ShareMedia = { category: 'NONE' };
    if (media) {
      const asset = await this.uploadImage(accessToken, authorUrn, media, signal);
      if (!asset.ok) return asset;
      shareMedia = { category: 'IMAGE', asset: asset.value };
    }

    const result = await this.http.request(
      `${LINKEDIN_API_URL}/ugcPosts`,
      {
        method: 'POST',
        headers: this.headers(accessToken),
        body: JSON.stringify(buildShareBody(authorUrn, content, shareMedia)),
      },
      {
        target: 'linkedin share',
        timeoutMs: media ? this.timeouts.mediaMs : this.timeouts.textMs,
        signal,
      },
    );
    return result.ok ? toSuccess(result.value) : result;
  }

  private async uploadImage(
    accessToken: string,
    owner: string,
    media: string,
    signal?: AbortSignal,
  ): Promise<Result<string, PublishFailure>> {
    const options = { timeoutMs: this.timeouts.mediaMs, signal };
    const resolved = resolveMediaReference(media, this.media);
    if (!resolved.ok) return resolved;
    const reference = resolved.value;

    const image =
      reference.kind === 'local'
        ? await readLocalMedia(reference).then((file) => (file.ok ? ok(file.value.blob) : file))
        : await this.http.download(reference.url, { ...options, target: 'linkedin image download' });
    if (!image.ok) return image;

    const registered = await this.http.request(
      `${LINKEDIN_API_URL}/assets?action=registerUpload`,
      {
        method: 'POST',
        headers: this.headers(accessToken),
        body: JSON.stringify({
          registerUploadRequest: {
            recipes: [IMAGE_RECIPE],
            owner,
            serviceRelationships: [
              { relationshipType: 'OWNER', identifier: 'urn:li:userGeneratedContent' },
            ],
          },
        }),
      },
      { ...options, target: 'linkedin register upload' },
    );
    if (!registered.ok) return registered;

    const uploadUrl = pickString(registered.value.data, 'value', 'uploadMechanism', UPLOAD_MECHANISM, 'uploadUrl');
    const asset = pickString(registered.value.data, 'value', 'asset');
    if (!uploadUrl || !asset) {
      return err(new RemoteError('linkedin register upload', registered.value.status, 'response missing upload url'));
    }

    const uploaded = await this.http.request(
      uploadUrl,
      { method: 'PUT', headers: { Authorization: `Bearer ${accessToken}` }, body: image.value },
      { ...options, target: 'linkedin image upload' },
    );
    if (!uploaded.ok) return uploaded;

    return ok(asset);
  }
}
