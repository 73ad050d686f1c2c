// Overall status of a post, derived from its publications once publishing starts
export type PostStatus =
  | 'draft'        // created, not adapted yet
  | 'processing'   // adapted, publications still in flight
  | 'published'    // at least one publication succeeded and nothing is in flight
  | 'failed';      // every settled publication failed

// Original content authored by a user, before per-network adaptation
export interface Post {
  id: string;
  ownerId: string | null;      // owning user, when the request carried one
  title: string;
  content: string;             // original text
  status: PostStatus;

  createdAt: string;
  updatedAt: string;
}
