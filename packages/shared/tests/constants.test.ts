import { describe, expect, it } from 'vitest';
import { isPublicationStatus, isSocialNetwork, requiresMedia } from '../src/constants';

describe('network guards', () => {
  it('accepts only known networks', () => {
    expect(isSocialNetwork('linkedin')).toBe(true);
    expect(isSocialNetwork('myspace')).toBe(false);
    expect(isSocialNetwork(3)).toBe(false);
  });

  it('flags the networks that cannot post text alone', () => {
    expect(requiresMedia('instagram')).toBe(true);
    expect(requiresMedia('tiktok')).toBe(true);
    expect(requiresMedia('facebook')).toBe(false);
  });

  it('accepts only publication statuses', () => {
    expect(isPublicationStatus('pending')).toBe(true);
    expect(isPublicationStatus('draft')).toBe(false);
  });
});
