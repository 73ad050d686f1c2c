import { describe, expect, it, vi } from 'vitest';
import {
  createOpenAiContentAdapter,
  extractJsonObject,
  normalizeAdaptedContent,
} from '../src/services/content/adapter';
import type { FetchLike } from '../src/services/publishing/adapters';
import { testConfig } from './helpers';

const completion = (content: string) =>
  new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });

describe('extractJsonObject', () => {
  it('reads a fenced block', () => {
    expect(extractJsonObject('```json\n{"text": "hi"}\n```')).toEqual({ text: 'hi' });
  });

  it('finds the object inside surrounding prose', () => {
    expect(extractJsonObject('Sure! {"text": "hi", "tone": "warm"} Enjoy.')).toEqual({ text: 'hi', tone: 'warm' });
  });

  it('rejects text without an object', () => {
    expect(() => extractJsonObject('no json here')).toThrow('Model response is not valid JSON');
  });
});

describe('normalizeAdaptedContent', () => {
  it('maps the model fields and counts characters when missing', () => {
    expect(
      normalizeAdaptedContent({
        text: ' Big news ',
        hashtags: ['#a', '', 3],
        suggested_video_prompt: 'slow pan over the shop',
      }),
    ).toEqual({
      text: 'Big news',
      hashtags: ['#a'],
      imageSuggestion: 'slow pan over the shop',
      characterCount: 8,
      tone: '',
    });
  });

  it('requires text', () => {
    expect(() => normalizeAdaptedContent({ text: '   ' })).toThrow('Model response has no text');
  });
});

describe('createOpenAiContentAdapter', () => {
  const input = { title: 'Sale', content: 'Half price today', network: 'linkedin' as const };

  it('sends the network guideline and returns the adapted text', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      completion('{"text": "Half price today only.", "hashtags": ["#sale"], "character_count": 22, "tone": "professional"}'),
    );
    const adapter = createOpenAiContentAdapter(testConfig({ OPENAI_API_KEY: 'test-key' }).openai, fetchMock);

    const result = await adapter(input);

    expect(result).toEqual({
      text: 'Half price today only.',
      hashtags: ['#sale'],
      imageSuggestion: '',
      characterCount: 22,
      tone: 'professional',
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.openai.com/v1/chat/completions');
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-key');
    expect(String(init?.body)).toContain('Platform: LinkedIn');
  });

  it('fails without an API key', async () => {
    const fetchMock = vi.fn<FetchLike>();
    const adapter = createOpenAiContentAdapter(testConfig().openai, fetchMock);

    await expect(adapter(input)).rejects.toThrow('OPENAI_API_KEY is not configured');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('surfaces an error response', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => new Response('slow down', { status: 429 }));
    const adapter = createOpenAiContentAdapter(testConfig({ OPENAI_API_KEY: 'test-key' }).openai, fetchMock);

    await expect(adapter(input)).rejects.toThrow('OpenAI request failed (429): slow down');
  });
});
