import {
  ALL_NETWORKS,
  DEFAULT_ADAPTATION_NETWORKS,
  createLogger,
  isSocialNetwork,
  type Post,
  type Publication,
  type SocialNetwork,
} from '@social-publisher/shared';
import { ValidationError, toErrorMessage } from '../../errors';
import type { PostStore } from '../posts/store';
import type { PublicationStore } from '../publishing/store';
import type { AdaptedContent, ContentAdapter } from './adapter';

const logger = createLogger('adaptation');

export interface NetworkPreview {
  adaptedText: string;
  hashtags: string[];
  imageSuggestion: string;
  characterCount: number;
  tone: string;
  error?: string;
}

export interface AdaptPreviewResult {
  postId: string;
  previewOnly: true;
  previews: Partial<Record<SocialNetwork, NetworkPreview>>;
}

export interface AdaptPersistResult {
  postId: string;
  previewOnly: false;
  adaptations: Partial<Record<SocialNetwork, string>>;
  publications: Publication[];
}

export type AdaptResult = AdaptPreviewResult | AdaptPersistResult;

export interface AdaptOptions {
  previewOnly?: boolean;
}

type NetworkAdaptation =
  | { network: SocialNetwork; ok: true; adapted: AdaptedContent }
  | { network: SocialNetwork; ok: false; fallback: string; error: string };

// Empty or missing selection means the default set; duplicates collapse
export function normalizeNetworks(requested?: ReadonlyArray<unknown>): SocialNetwork[] {
  if (!requested || requested.length === 0) {
    return [...DEFAULT_ADAPTATION_NETWORKS];
  }

  const invalid = requested.filter((network) => !isSocialNetwork(network));
  if (invalid.length) {
    throw new ValidationError(
      `unsupported networks: ${invalid.map(String).join(', ')}. Valid: ${ALL_NETWORKS.join(', ')}`,
    );
  }

  const networks: SocialNetwork[] = [];
  for (const network of requested) {
    if (isSocialNetwork(network) && !networks.includes(network)) {
      networks.push(network);
    }
  }
  return networks;
}

export function fallbackText(post: Pick<Post, 'title' | 'content'>): string {
  return `${post.title}\n\n${post.content}`;
}

/**
 * Gets one adapted text per network and, unless previewing, records a
 * pending publication for each. A network whose adaptation fails falls back
 * to the original title and content; the rest of the batch carries on.
 */
export class ContentOrchestrator {
  constructor(
    private readonly adapter: ContentAdapter,
    private readonly posts: PostStore,
    private readonly publications: PublicationStore,
  ) {}

  async adapt(post: Post, requested?: ReadonlyArray<unknown>, options: AdaptOptions = {}): Promise<AdaptResult> {
    const networks = normalizeNetworks(requested);
    const adaptations = await Promise.all(networks.map((network) => this.adaptOne(post, network)));

    if (options.previewOnly) {
      const previews: Partial<Record<SocialNetwork, NetworkPreview>> = {};
      for (const item of adaptations) {
        previews[item.network] = item.ok
          ? {
              adaptedText: item.adapted.text,
              hashtags: item.adapted.hashtags,
              imageSuggestion: item.adapted.imageSuggestion,
              characterCount: item.adapted.characterCount,
              tone: item.adapted.tone,
            }
          : {
              adaptedText: item.fallback,
              hashtags: [],
              imageSuggestion: '',
              characterCount: item.fallback.length,
              tone: '',
              error: item.error,
            };
      }
      return { postId: post.id, previewOnly: true, previews };
    }

    const texts: Partial<Record<SocialNetwork, string>> = {};
    const created: Publication[] = [];
    for (const item of adaptations) {
      const text = item.ok ? item.adapted.text : item.fallback;
      texts[item.network] = text;
      created.push(await this.publications.create(post.id, item.network, text));
    }

    // Nothing is terminal yet, so this is set directly rather than resolved
    await this.posts.updateStatus(post.id, 'processing');
    logger.info(`post ${post.id}: created ${created.length} pending publications (${networks.join(', ')})`);

    return { postId: post.id, previewOnly: false, adaptations: texts, publications: created };
  }

  private async adaptOne(post: Post, network: SocialNetwork): Promise<NetworkAdaptation> {
    try {
      const adapted = await this.adapter({ title: post.title, content: post.content, network });
      return { network, ok: true, adapted };
    } catch (error) {
      const message = toErrorMessage(error);
      logger.warn(`adaptation for ${network} failed on post ${post.id}, using original text: ${message}`);
      return { network, ok: false, fallback: fallbackText(post), error: message };
    }
  }
}
