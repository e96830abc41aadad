import path from 'node:path';

const MIME_TYPES: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.m4v': 'video/mp4',
  '.mkv': 'video/x-matroska',
  '.webm': 'video/webm',
  '.avi': 'video/x-msvideo',
  '.mov': 'video/quicktime',
  '.mpg': 'video/mpeg',
  '.mpeg': 'video/mpeg',
  '.ts': 'video/mp2t',
  '.m2ts': 'video/mp2t',
  '.wmv': 'video/x-ms-wmv',
  '.mp3': 'audio/mpeg',
  '.m4a': 'audio/mp4',
  '.aac': 'audio/aac',
  '.ogg': 'audio/ogg',
  '.wav': 'audio/wav',
  '.flac': 'audio/flac',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.srt': 'application/x-subrip',
  '.vtt': 'text/vtt',
  '.txt': 'text/plain',
};

/** ברירת המחדל כשלא ניתן לנחש את סוג המדיה מה-URL */
export const DEFAULT_MEDIA_MIME_TYPE = 'video/mp4';

export function lookupMimeType(filePath: string): string | undefined {
  const ext = path.posix.extname(filePath).toLowerCase();
  return MIME_TYPES[ext];
}

export function getMimeType(filePath: string): string {
  return lookupMimeType(filePath) ?? 'application/octet-stream';
}

function urlPathname(contentUrl: string): string {
  if (!URL.canParse(contentUrl)) {
    return contentUrl;
  }
  const pathname = new URL(contentUrl).pathname;
  try {
    return decodeURIComponent(pathname);
  } catch {
    return pathname;
  }
}

/**
 * @hebrew מנחש MIME לפי סיומת הנתיב של URL, עם ברירת מחדל video/mp4.
 */
export function guessMediaMimeType(contentUrl: string): string {
  return lookupMimeType(urlPathname(contentUrl)) ?? DEFAULT_MEDIA_MIME_TYPE;
}
