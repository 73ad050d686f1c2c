import { err, ok, type Result } from '@social-publisher/shared';
import { RemoteError, TransportError, toErrorMessage } from '../../../errors';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpResponse {
  status: number;
  headers: Headers;
  data: Record<string, unknown>;
}

export interface HttpRequestOptions {
  // Used in error messages, e.g. "facebook feed post"
  target: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBody(raw: string): Record<string, unknown> {
  if (!raw.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : { body: parsed };
  } catch {
    return { body: raw };
  }
}

/** Reads a nested string (or number) field from an untyped platform response. */
export function pickString(source: unknown, ...path: string[]): string | null {
  let current: unknown = source;
  for (const key of path) {
    if (!isRecord(current)) return null;
    current = current[key];
  }
  if (typeof current === 'string' && current.trim()) return current;
  if (typeof current === 'number') return String(current);
  return null;
}

/**
 * fetch wrapper shared by the platform adapters: bounded by `timeoutMs` and
 * by the caller's signal, non-2xx mapped to RemoteError, anything thrown on
 * the way mapped to TransportError.
 */
export class HttpClient {
  constructor(private readonly fetchImpl: FetchLike = fetch) {}

  async request(
    url: string,
    init: RequestInit,
    options: HttpRequestOptions,
  ): Promise<Result<HttpResponse, RemoteError | TransportError>> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);
    const forwardAbort = () => controller.abort();

    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      const raw = await response.text();
      if (!response.ok) {
        return err(new RemoteError(options.target, response.status, raw));
      }
      return ok({ status: response.status, headers: response.headers, data: parseBody(raw) });
    } catch (error) {
      const reason = timedOut
        ? `timed out after ${options.timeoutMs}ms`
        : controller.signal.aborted
          ? 'aborted'
          : toErrorMessage(error);
      return err(new TransportError(options.target, reason));
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', forwardAbort);
    }
  }

  async download(
    url: string,
    options: HttpRequestOptions,
  ): Promise<Result<Blob, RemoteError | TransportError>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeoutMs);
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, { signal: controller.signal });
      if (!response.ok) {
        return err(new RemoteError(options.target, response.status, await response.text()));
      }
      return ok(await response.blob());
    } catch (error) {
      return err(new TransportError(options.target, toErrorMessage(error)));
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', forwardAbort);
    }
  }
}

export function formBody(fields: Record<string, string>): string {
  const body = new URLSearchParams();
  for (const [key, value] of Object.entries(fields)) {
    body.set(key, value);
  }
  return body.toString();
}

export const FORM_HEADERS = { 'Content-Type': 'application/x-www-form-urlencoded' };
