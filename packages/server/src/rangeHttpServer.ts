// שרת HTTP להזרמת קבצים מתיקייה אחת, עם תמיכה בבקשות Range וכותרות DLNA
import * as http from 'node:http';
import type { Socket } from 'node:net';
import type { Stats } from 'node:fs';
import * as fsp from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';

import {
  StreamingIOError,
  createModuleLogger,
  dlnaProfileFor,
  errorCode,
  errorMessage,
  escapeXml,
  getMimeType,
} from '@media-cast/dlna-core';
import { contentRange, parseRangeHeader } from './rangeRequest';

const logger = createModuleLogger('rangeHttpServer');

export interface SocketTuningOptions {
  noDelay?: boolean;
  keepAlive?: boolean;
  keepAliveInitialDelayMs?: number;
  /** גודל מקטע קריאה מהדיסק. ברירת מחדל: 64KiB */
  streamChunkBytes?: number;
  keepAliveTimeoutMs?: number;
}

export interface ServeDirectoryOptions extends SocketTuningOptions {
  /**
   * סוג MIME לקובץ מסוים (נתיב מוחלט). undefined: לפי הסיומת.
   * כך הסשן מפרסם ב-contentFeatures את אותו פרופיל שנשלח במטא-דאטה.
   */
  mimeTypeFor?: (filePath: string) => string | undefined;
}

export interface RangeHttpServer {
  server: http.Server;
  port: number;
  directory: string;
  /** מפסיק לקבל חיבורים, סוגר את הפתוחים וממתין לשחרור הפורט. ניתן לקרוא שוב ושוב. */
  close(): Promise<void>;
}

const DEFAULT_CHUNK_BYTES = 64 * 1024;
const ALLOWED_METHODS = 'GET, HEAD';
const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR', 'ENAMETOOLONG']);
const CLIENT_GONE_CODES = new Set(['EPIPE', 'ECONNRESET', 'ERR_STREAM_PREMATURE_CLOSE', 'ERR_STREAM_DESTROYED']);

export function isClientDisconnect(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && CLIENT_GONE_CODES.has(code);
}

/**
 * @hebrew ממפה נתיב בקשה (מקודד) לנתיב קובץ תחת השורש.
 * @returns undefined אם הקידוד פגום או שהנתיב יוצא מחוץ לשורש
 */
export function resolveRequestPath(root: string, requestPath: string): string | undefined {
  let decoded: string;
  try {
    decoded = decodeURIComponent(requestPath);
  } catch {
    return undefined;
  }
  if (decoded.includes('\0')) {
    return undefined;
  }
  const target = path.resolve(root, `./${decoded.replace(/^\/+/, '')}`);
  if (target !== root && !target.startsWith(root + path.sep)) {
    return undefined;
  }
  return target;
}

function setStreamingHeaders(res: Response, stats: Stats, mimeType: string): void {
  res.setHeader('Content-Type', mimeType);
  res.setHeader('Accept-Ranges', 'bytes');
  res.setHeader('transferMode.dlna.org', 'Streaming');
  res.setHeader('contentFeatures.dlna.org', dlnaProfileFor(mimeType));
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Pragma', 'no-cache');
  res.setHeader('Last-Modified', stats.mtime.toUTCString());
}

async function sendDirectoryListing(req: Request, res: Response, directory: string): Promise<void> {
  if (!req.path.endsWith('/')) {
    res.redirect(301, `${req.path}/`);
    return;
  }
  const entries = await fsp.readdir(directory, { withFileTypes: true });
  const items = entries
    .map(entry => (entry.isDirectory() ? `${entry.name}/` : entry.name))
    .sort((a, b) => a.toLowerCase().localeCompare(b.toLowerCase()))
    .map(name => `<li><a href="${escapeXml(encodeURIComponent(name.replace(/\/$/, '')))}${name.endsWith('/') ? '/' : ''}">${escapeXml(name)}</a></li>`);
  const title = `Directory listing for ${escapeXml(safeDecode(req.path))}`;
  const html = `<!DOCTYPE html><html><head><meta charset="utf-8"><title>${title}</title></head>` +
    `<body><h1>${title}</h1><hr><ul>${items.join('')}</ul><hr></body></html>`;

  res.status(200);
  res.setHeader('Content-Type', 'text/html; charset=utf-8');
  res.setHeader('Content-Length', Buffer.byteLength(html));
  if (req.method === 'HEAD') {
    res.end();
    return;
  }
  res.end(html);
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

async function openForReading(target: string): Promise<FileHandle | undefined> {
  try {
    return await fsp.open(target, 'r');
  } catch (error: unknown) {
    const code = errorCode(error);
    if (code !== undefined && NOT_FOUND_CODES.has(code)) {
      return undefined;
    }
    throw new StreamingIOError(`Cannot open ${target}: ${errorMessage(error)}`, target, code, error);
  }
}

function createRequestHandler(root: string, chunkBytes: number, mimeTypeFor: (filePath: string) => string | undefined) {
  return async (req: Request, res: Response): Promise<void> => {
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      res.status(405).setHeader('Allow', ALLOWED_METHODS);
      res.end();
      return;
    }

    const target = resolveRequestPath(root, req.path);
    if (target === undefined) {
      logger.debug(`Rejected path outside the served directory: ${req.path}`);
      res.status(404).end();
      return;
    }

    let stats: Stats;
    try {
      stats = await fsp.stat(target);
    } catch (error: unknown) {
      const code = errorCode(error);
      if (code !== undefined && NOT_FOUND_CODES.has(code)) {
        res.status(404).end();
        return;
      }
      throw new StreamingIOError(`Cannot stat ${target}: ${errorMessage(error)}`, target, code, error);
    }

    if (stats.isDirectory()) {
      await sendDirectoryListing(req, res, target);
      return;
    }

    const size = stats.size;
    const mimeType = mimeTypeFor(target) ?? getMimeType(target);
    const range = parseRangeHeader(req.get('Range'), size);

    if (range.kind === 'unsatisfiable') {
      setStreamingHeaders(res, stats, mimeType);
      res.status(416);
      res.setHeader('Content-Range', `bytes */${size}`);
      res.setHeader('Content-Length', 0);
      res.end();
      return;
    }

    const start = range.kind === 'range' ? range.start : 0;
    const end = range.kind === 'range' ? range.end : size - 1;
    const length = range.kind === 'range' ? end - start + 1 : size;
    const withBody = req.method !== 'HEAD' && length > 0;

    // פתיחה לפני הגדרת הכותרות: כשל כאן הופך ל-404/500 בלי Content-Length של הטווח
    const handle = withBody ? await openForReading(target) : undefined;
    if (withBody && !handle) {
      res.status(404).end();
      return;
    }

    setStreamingHeaders(res, stats, mimeType);
    res.status(range.kind === 'range' ? 206 : 200);
    if (range.kind === 'range') {
      res.setHeader('Content-Range', contentRange(start, end, size));
    }
    res.setHeader('Content-Length', length);

    if (!handle) {
      res.end();
      return;
    }

    logger.debug(`Streaming ${path.basename(target)} bytes ${start}-${end}/${size}`);
    try {
      await pipeline(handle.createReadStream({ start, end, highWaterMark: chunkBytes }), res);
    } catch (error: unknown) {
      if (isClientDisconnect(error)) {
        logger.debug(`Client disconnected while streaming ${path.basename(target)}`);
        return;
      }
      logger.warn(`Streaming ${target} failed: ${errorMessage(error)}`);
      res.destroy();
    } finally {
      await handle.close().catch((error: unknown) => {
        if (errorCode(error) !== 'EBADF') {
          logger.debug(`Closing ${target} failed: ${errorMessage(error)}`);
        }
      });
    }
  };
}

/**
 * @hebrew מפעיל שרת HTTP שמגיש את התיקייה בכל הממשקים.
 * @param port - 0 לפורט שמוקצה על ידי מערכת ההפעלה
 */
export async function serveDirectory(
  directory: string,
  port = 0,
  tuning: ServeDirectoryOptions = {}
): Promise<RangeHttpServer> {
  const root = path.resolve(directory);
  const handleRequest = createRequestHandler(
    root,
    tuning.streamChunkBytes ?? DEFAULT_CHUNK_BYTES,
    tuning.mimeTypeFor ?? (() => undefined)
  );

  const app = express();
  app.disable('x-powered-by');
  app.disable('etag');
  app.use((req: Request, res: Response, next: NextFunction) => {
    handleRequest(req, res).catch(next);
  });
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error(`Request for ${req.path} failed:`, err instanceof Error ? err : { error: errorMessage(err) });
    if (res.headersSent) {
      res.destroy();
      return;
    }
    for (const name of res.getHeaderNames()) {
      res.removeHeader(name);
    }
    res.status(500);
    res.setHeader('Content-Length', 0);
    res.end();
  });

  const server = http.createServer({
    noDelay: tuning.noDelay ?? true,
    keepAlive: tuning.keepAlive ?? true,
    keepAliveInitialDelay: tuning.keepAliveInitialDelayMs ?? 60 * 1000,
  }, app);
  if (tuning.keepAliveTimeoutMs !== undefined) {
    server.keepAliveTimeout = tuning.keepAliveTimeoutMs;
  }

  const sockets = new Set<Socket>();
  server.on('connection', (socket: Socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });
  server.on('clientError', (err: Error, socket) => {
    if (!isClientDisconnect(err)) {
      logger.debug(`Client error: ${err.message}`);
    }
    socket.destroy();
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once('error', onError);
    server.listen(port, '0.0.0.0', () => {
      server.off('error', onError);
      resolve();
    });
  });
  server.on('error', (err: Error) => logger.error('HTTP server error:', err));

  const address = server.address();
  if (address === null || typeof address === 'string') {
    server.close();
    throw new Error(`HTTP server for ${root} has no TCP address`);
  }
  logger.info(`Serving ${root} on port ${address.port}`);

  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    closing ??= new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) {
          logger.debug(`HTTP server close: ${err.message}`);
        }
        logger.info(`Stopped serving ${root}`);
        resolve();
      });
      for (const socket of sockets) {
        socket.destroy();
      }
    });
    return closing;
  };

  return { server, port: address.port, directory: root, close };
}
