import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { MediaConfig, OpenAiConfig } from '../../config';
import type { FetchLike } from '../publishing/adapters';

const OPENAI_IMAGES_URL = 'https://api.openai.com/v1/images/generations';
const IMAGE_SIZE = '1024x1024';
const PROMPT_SOURCE_LIMIT = 500;

interface OpenAIImageResponse {
  data?: Array<{ b64_json?: string | null }>;
}

export interface GeneratedImage {
  // Relative to the working directory, e.g. "temp_images/<uuid>.png"
  path: string;
  fileName: string;
  url: string;
}

export type ImageGenerator = (prompt: string) => Promise<GeneratedImage>;

export function buildImagePrompt(adaptedText: string, networkLabel: string): string {
  const source = adaptedText.trim().slice(0, PROMPT_SOURCE_LIMIT);
  return [
    'Create a professional, eye-catching social media image that represents this content:',
    '',
    `"${source}"`,
    '',
    `The image is for ${networkLabel}. No overlaid text, vivid colours, clean modern composition.`,
  ].join('\n');
}

export function createOpenAiImageGenerator(
  openai: OpenAiConfig,
  media: MediaConfig,
  fetchImpl: FetchLike = fetch,
): ImageGenerator {
  return async (prompt) => {
    if (!openai.apiKey) {
      throw new Error('OPENAI_API_KEY is not configured');
    }

    const response = await fetchImpl(OPENAI_IMAGES_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${openai.apiKey}`,
      },
      body: JSON.stringify({ model: openai.imageModel, prompt, size: IMAGE_SIZE, n: 1 }),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`OpenAI image request failed (${response.status}): ${text}`);
    }

    const data = (await response.json()) as OpenAIImageResponse;
    const encoded = data.data?.[0]?.b64_json;
    if (!encoded) {
      throw new Error('OpenAI returned no image data');
    }

    const fileName = `${randomUUID()}.png`;
    const filePath = path.join(media.dir, fileName);
    await fs.mkdir(media.dir, { recursive: true });
    await fs.writeFile(filePath, Buffer.from(encoded, 'base64'));

    return { path: filePath, fileName, url: `${media.publicBaseUrl}/${media.dir}/${fileName}` };
  };
}
