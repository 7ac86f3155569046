import path from 'path';

export const GENERIC_CONTENT_TYPE = 'application/octet-stream';

const EXTENSION_CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.mp4': 'video/mp4',
  '.m4v': 'video/mp4',
  '.mov': 'video/quicktime',
  '.webm': 'video/webm',
  '.mp3': 'audio/mpeg',
  '.m4a': 'audio/mp4',
  '.wav': 'audio/wav',
  '.ogg': 'audio/ogg',
  '.aac': 'audio/aac',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp',
  '.gif': 'image/gif',
  '.json': 'application/json',
  '.txt': 'text/plain',
};

const CONTENT_TYPE_EXTENSIONS: Readonly<Record<string, string>> = {
  'video/mp4': '.mp4',
  'video/quicktime': '.mov',
  'video/webm': '.webm',
  'audio/mpeg': '.mp3',
  'audio/mp3': '.mp3',
  'audio/mp4': '.m4a',
  'audio/wav': '.wav',
  'audio/x-wav': '.wav',
  'audio/ogg': '.ogg',
  'audio/aac': '.aac',
  'image/jpeg': '.jpg',
  'image/jpg': '.jpg',
  'image/png': '.png',
  'image/webp': '.webp',
  'image/gif': '.gif',
  'application/json': '.json',
  'text/plain': '.txt',
};

/**
 * Strip parameters (`; charset=...`) and case from a content type header.
 * Generic binary types count as unknown.
 */
export function normalizeContentType(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  const normalized = header.split(';')[0]?.trim().toLowerCase();
  if (!normalized || normalized === GENERIC_CONTENT_TYPE || normalized === 'binary/octet-stream') {
    return undefined;
  }
  return normalized;
}

/**
 * Lowercased extension of a URL's path or a file name, with the leading dot
 */
export function extensionOf(urlOrName: string | undefined): string | undefined {
  if (!urlOrName) {
    return undefined;
  }

  const ext = path.posix.extname(pathOf(urlOrName)).toLowerCase();
  return ext || undefined;
}

function pathOf(urlOrName: string): string {
  try {
    return new URL(urlOrName).pathname;
  } catch {
    // Not a URL: a file name
    return urlOrName;
  }
}

export function contentTypeForExtension(ext: string | undefined): string | undefined {
  return ext ? EXTENSION_CONTENT_TYPES[ext] : undefined;
}

export function extensionForContentType(contentType: string | undefined): string | undefined {
  return contentType ? CONTENT_TYPE_EXTENSIONS[contentType] : undefined;
}
