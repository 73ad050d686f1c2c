import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { buildImagePrompt, createOpenAiImageGenerator } from '../src/services/content/images';
import type { FetchLike } from '../src/services/publishing/adapters';
import { testConfig } from './helpers';

describe('buildImagePrompt', () => {
  it('names the network and quotes the text', () => {
    const prompt = buildImagePrompt('  Fresh bread  ', 'Instagram');

    expect(prompt).toContain('"Fresh bread"');
    expect(prompt).toContain('The image is for Instagram.');
  });
});

describe('createOpenAiImageGenerator', () => {
  let mediaDir: string | null = null;

  afterEach(async () => {
    if (mediaDir) await fs.rm(mediaDir, { recursive: true, force: true });
    mediaDir = null;
  });

  it('stores the returned image in the media directory', async () => {
    mediaDir = await fs.mkdtemp(path.join(os.tmpdir(), 'publisher-images-'));
    const config = testConfig({ OPENAI_API_KEY: 'test-key' });
    const fetchMock = vi.fn<FetchLike>(
      async () => new Response(JSON.stringify({ data: [{ b64_json: Buffer.from('png-bytes').toString('base64') }] })),
    );
    const generate = createOpenAiImageGenerator(config.openai, { ...config.media, dir: mediaDir }, fetchMock);

    const image = await generate('a loaf of bread');

    expect(image.fileName).toMatch(/^[0-9a-f-]{36}\.png$/);
    expect(image.path).toBe(path.join(mediaDir, image.fileName));
    expect(await fs.readFile(image.path, 'utf8')).toBe('png-bytes');
  });

  it('fails when no image comes back', async () => {
    const config = testConfig({ OPENAI_API_KEY: 'test-key' });
    const fetchMock = vi.fn<FetchLike>(async () => new Response(JSON.stringify({ data: [] })));
    const generate = createOpenAiImageGenerator(config.openai, config.media, fetchMock);

    await expect(generate('nothing')).rejects.toThrow('OpenAI returned no image data');
  });
});
