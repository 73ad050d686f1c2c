import fs from 'node:fs/promises';
import path from 'node:path';
import { err, ok, type Result } from '@social-publisher/shared';
import type { MediaConfig } from '../../../config';
import { ValidationError, toErrorMessage } from '../../../errors';

export type MediaReference =
  | { kind: 'local'; path: string; fileName: string }
  | { kind: 'remote'; url: string };

export interface LocalMedia {
  blob: Blob;
  fileName: string;
  mimeType: string;
}

const MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.mp4': 'video/mp4',
  '.mov': 'video/quicktime',
  '.avi': 'video/x-msvideo',
  '.mkv': 'video/x-matroska',
};

const LOCAL_HOSTS = new Set(['localhost', '127.0.0.1', '0.0.0.0', 'host.docker.internal']);

export function mimeTypeFor(fileName: string): string {
  return MIME_TYPES[path.extname(fileName).toLowerCase()] ?? 'application/octet-stream';
}

export function isVideo(fileName: string): boolean {
  return mimeTypeFor(fileName).startsWith('video/');
}

function isOwnMediaUrl(url: URL, media: MediaConfig): boolean {
  if (!url.pathname.startsWith(`/${media.dir}/`)) return false;
  if (LOCAL_HOSTS.has(url.hostname)) return true;
  return parseUrl(media.publicBaseUrl)?.origin === url.origin;
}

function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

function decodePath(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
}

// Resolves `relativePath` under the media root; null when it lands outside it
function confineToMediaDir(relativePath: string, media: MediaConfig): string | null {
  const root = path.resolve(media.dir);
  const resolved = path.resolve(root, relativePath);
  const relative = path.relative(root, resolved);
  if (!relative || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }
  return resolved;
}

function localReference(
  relativePath: string,
  media: MediaConfig,
  original: string,
): Result<MediaReference, ValidationError> {
  const localPath = confineToMediaDir(relativePath, media);
  if (!localPath) {
    return err(new ValidationError(`media path is outside the media directory: ${original}`));
  }
  return ok({ kind: 'local', path: localPath, fileName: path.basename(localPath) });
}

/**
 * Tells a file we host (uploaded or generated into the media directory) apart
 * from a third-party URL. Links pointing back at our own media directory count
 * as local files. Local files must resolve inside the media directory.
 */
export function resolveMediaReference(reference: string, media: MediaConfig): Result<MediaReference, ValidationError> {
  const trimmed = reference.trim();

  if (/^https?:\/\//i.test(trimmed)) {
    const url = parseUrl(trimmed);
    if (!url || !isOwnMediaUrl(url, media)) {
      return ok({ kind: 'remote', url: trimmed });
    }
    const relativePath = decodePath(url.pathname.slice(media.dir.length + 2));
    if (relativePath === null) {
      return err(new ValidationError(`media URL is not decodable: ${trimmed}`));
    }
    return localReference(relativePath, media, trimmed);
  }

  if (path.isAbsolute(trimmed)) {
    // `/temp_images/a.png` is the URL path of a hosted file
    const urlPrefix = `/${media.dir}/`;
    const relativePath = trimmed.startsWith(urlPrefix)
      ? trimmed.slice(urlPrefix.length)
      : path.relative(path.resolve(media.dir), trimmed);
    return localReference(relativePath, media, trimmed);
  }

  const relative = trimmed.replace(/^\.\//, '');
  const underDir = relative.startsWith(`${media.dir}/`) ? relative.slice(media.dir.length + 1) : relative;
  return localReference(underDir, media, trimmed);
}

// Public URL the platform can fetch the file from
export function publicMediaUrl(reference: MediaReference, media: MediaConfig): string {
  if (reference.kind === 'remote') return reference.url;
  return `${media.publicBaseUrl}/${media.dir}/${encodeURIComponent(reference.fileName)}`;
}

export async function readLocalMedia(
  reference: Extract<MediaReference, { kind: 'local' }>,
): Promise<Result<LocalMedia, ValidationError>> {
  try {
    const buffer = await fs.readFile(reference.path);
    const mimeType = mimeTypeFor(reference.fileName);
    return ok({ blob: new Blob([buffer], { type: mimeType }), fileName: reference.fileName, mimeType });
  } catch (error) {
    return err(new ValidationError(`media file not readable: ${reference.path} (${toErrorMessage(error)})`));
  }
}
