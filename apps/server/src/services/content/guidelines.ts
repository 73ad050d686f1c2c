import type { SocialNetwork } from '@social-publisher/shared';

export interface NetworkGuideline {
  tone: string;
  maxCharacters: number;
  hashtags: string;
  structure: string;
  mediaHint: 'image' | 'video';
}

export const NETWORK_GUIDELINES: Record<SocialNetwork, NetworkGuideline> = {
  facebook: {
    tone: 'friendly and conversational',
    maxCharacters: 1500,
    hashtags: '1 to 3 hashtags at the end',
    structure: 'hook sentence, two short paragraphs, a question or call to action',
    mediaHint: 'image',
  },
  instagram: {
    tone: 'visual, energetic, emoji friendly',
    maxCharacters: 2200,
    hashtags: '5 to 10 relevant hashtags at the end',
    structure: 'catchy first line, short lines with line breaks, call to action',
    mediaHint: 'image',
  },
  linkedin: {
    tone: 'professional and insightful',
    maxCharacters: 3000,
    hashtags: '3 to 5 professional hashtags',
    structure: 'strong opening insight, short paragraphs, takeaway, invitation to comment',
    mediaHint: 'image',
  },
  tiktok: {
    tone: 'casual, playful, trend aware',
    maxCharacters: 150,
    hashtags: '3 to 5 trending-style hashtags',
    structure: 'one punchy caption for a short vertical video',
    mediaHint: 'video',
  },
  whatsapp: {
    tone: 'personal and direct',
    maxCharacters: 700,
    hashtags: 'no hashtags',
    structure: 'short status text, one idea, optional emoji',
    mediaHint: 'image',
  },
};
