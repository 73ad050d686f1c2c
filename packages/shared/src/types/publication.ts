// Networks a post can be published to
export type SocialNetwork = 'facebook' | 'instagram' | 'linkedin' | 'tiktok' | 'whatsapp';

// Lifecycle of one network-specific publication
export type PublicationStatus =
  | 'pending'      // created by adaptation, not queued yet
  | 'processing'   // queued or being published
  | 'published'    // platform accepted the post
  | 'failed';      // last attempt failed

// Free-form metadata kept next to a publication (task id, external ids, platform response)
export type PublicationExtraData = Record<string, unknown>;

// One adapted copy of a post targeting a single network
export interface Publication {
  id: string;
  postId: string;
  network: SocialNetwork;
  adaptedContent: string;
  status: PublicationStatus;

  publishedAt: string | null;  // set only while status is 'published'
  errorMessage: string | null;
  extraData: PublicationExtraData;

  createdAt: string;
  updatedAt: string;
}

// Per-status counters for a post's publications
export interface PublicationStatusSummary {
  total: number;
  pending: number;
  processing: number;
  published: number;
  failed: number;
}
