import type { PostStatus } from '../types/post';
import type { PublicationStatus, SocialNetwork } from '../types/publication';

// ── Networks ──

// Every supported network
export const ALL_NETWORKS: SocialNetwork[] = [
  'facebook',
  'instagram',
  'linkedin',
  'tiktok',
  'whatsapp',
];

// Networks used when an adaptation request does not name any
export const DEFAULT_ADAPTATION_NETWORKS: SocialNetwork[] = [
  'facebook',
  'instagram',
  'linkedin',
  'whatsapp',
];

// Networks that cannot publish text on its own
export const MEDIA_REQUIRED_NETWORKS: SocialNetwork[] = ['instagram', 'tiktok'];

export const NETWORK_LABELS: Record<SocialNetwork, string> = {
  facebook: 'Facebook',
  instagram: 'Instagram',
  linkedin: 'LinkedIn',
  tiktok: 'TikTok',
  whatsapp: 'WhatsApp',
};

// ── Statuses ──

export const POST_STATUSES: PostStatus[] = ['draft', 'processing', 'published', 'failed'];

export const PUBLICATION_STATUSES: PublicationStatus[] = [
  'pending',
  'processing',
  'published',
  'failed',
];

// A manual retry is accepted only from these statuses
export const RETRYABLE_PUBLICATION_STATUSES: PublicationStatus[] = ['failed', 'pending'];

// ── Publishing ──

export const MAX_PUBLISH_ATTEMPTS = 3;              // attempts per queued task
export const PUBLISH_RETRY_DELAY_MS = 60_000;       // fixed backoff between attempts: 1 min
export const PUBLISH_TASK_TIME_LIMIT_MS = 300_000;  // outer limit per attempt: 5 min
export const MEDIA_UPLOAD_TIMEOUT_MS = 120_000;     // platform call with media: 2 min
export const TEXT_PUBLISH_TIMEOUT_MS = 30_000;      // text-only platform call

export function isSocialNetwork(value: unknown): value is SocialNetwork {
  return typeof value === 'string' && ALL_NETWORKS.some((network) => network === value);
}

export function isPostStatus(value: unknown): value is PostStatus {
  return typeof value === 'string' && POST_STATUSES.some((status) => status === value);
}

export function isPublicationStatus(value: unknown): value is PublicationStatus {
  return typeof value === 'string' && PUBLICATION_STATUSES.some((status) => status === value);
}

export function requiresMedia(network: SocialNetwork): boolean {
  return MEDIA_REQUIRED_NETWORKS.includes(network);
}
