// אחזור וניתוח מסמך התיאור של התקן UPnP
import axios from 'axios';
import * as xml2js from 'xml2js';

import { createModuleLogger } from './logger';
import { FetchError, ParseError } from './errors';
import type { DeviceDescription, FetchDescriptionOptions } from './types';
import { errorMessage } from './utils';

const logger = createModuleLogger('deviceDescription');
const DEFAULT_TIMEOUT_MS = 5000;
export const UNKNOWN_DEVICE_NAME = 'Unknown Device';

type XmlElement = { [key: string]: unknown };

const isElement = (value: unknown): value is XmlElement =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * @hebrew טקסט של אלמנט: xml2js מחזיר מחרוזת לאלמנט טקסט פשוט, ואובייקט עם `_` כשיש לו תכונות.
 */
function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (isElement(value) && typeof value._ === 'string') {
    return value._.trim();
  }
  return undefined;
}

/**
 * @hebrew מעבר על כל האלמנטים בעץ (לעומק), לפי סדר הופעת שמות התגיות.
 */
function* walkElements(node: unknown): Generator<[string, unknown]> {
  if (!isElement(node)) {
    return;
  }
  for (const [key, value] of Object.entries(node)) {
    if (key === '$' || key === '_') {
      continue;
    }
    const children: unknown[] = Array.isArray(value) ? value : [value];
    for (const child of children) {
      yield [key, child];
      yield* walkElements(child);
    }
  }
}

function findFirstText(tree: unknown, tagName: string): string | undefined {
  for (const [name, value] of walkElements(tree)) {
    if (name === tagName) {
      const text = textOf(value);
      if (text) {
        return text;
      }
    }
  }
  return undefined;
}

function firstChildText(element: XmlElement, tagName: string): string | undefined {
  const value = element[tagName];
  return textOf(Array.isArray(value) ? value[0] : value);
}

/**
 * @hebrew כתובת controlURL מוחלטת (http/https) עוברת כמו שהיא; אחרת נפתרת מול כתובת הבסיס.
 */
export function resolveControlUrl(controlUrl: string, baseUrl: string): string | undefined {
  if (/^https?:\/\//i.test(controlUrl)) {
    return controlUrl;
  }
  try {
    return new URL(controlUrl, baseUrl).toString();
  } catch (e: unknown) {
    logger.warn(`Could not resolve control URL. Base: ${baseUrl}, Relative: ${controlUrl}`, { error: errorMessage(e) });
    return undefined;
  }
}

/**
 * @hebrew מחלץ DeviceDescription מעץ XML מנותח. אם קיימים כמה שירותים מאותו סוג, האחרון קובע.
 */
export function extractDescription(tree: unknown, locationUrl: string): DeviceDescription {
  const friendlyName = findFirstText(tree, 'friendlyName') || UNKNOWN_DEVICE_NAME;
  const baseUrl = findFirstText(tree, 'URLBase') || locationUrl;

  let avTransportControlUrl: string | undefined;
  let renderingControlControlUrl: string | undefined;

  for (const [name, value] of walkElements(tree)) {
    if (name !== 'service' || !isElement(value)) {
      continue;
    }
    const serviceType = firstChildText(value, 'serviceType') ?? '';
    const controlUrl = firstChildText(value, 'controlURL');
    if (!controlUrl) {
      logger.trace(`Skipping service without controlURL: ${serviceType}`);
      continue;
    }
    const resolved = resolveControlUrl(controlUrl, baseUrl);
    if (!resolved) {
      continue;
    }
    if (serviceType.includes('AVTransport')) {
      avTransportControlUrl = resolved;
    } else if (serviceType.includes('RenderingControl')) {
      renderingControlControlUrl = resolved;
    }
  }

  return Object.freeze({
    friendlyName,
    ...(avTransportControlUrl ? { avTransportControlUrl } : {}),
    ...(renderingControlControlUrl ? { renderingControlControlUrl } : {}),
  });
}

/**
 * @hebrew מאחזר את מסמך התיאור ומחזיר את השם ואת כתובות הבקרה של AVTransport ו-RenderingControl.
 * @throws {FetchError} אם המסמך לא אוחזר בזמן או שהסטטוס אינו 2xx
 * @throws {ParseError} אם המסמך אינו XML תקין
 */
export async function fetchDescription(
  locationUrl: string,
  options: FetchDescriptionOptions = {}
): Promise<DeviceDescription> {
  logger.debug(`Fetching device description from: ${locationUrl}`);

  let xmlData: string;
  try {
    const response = await axios.get<string>(locationUrl, {
      responseType: 'text',
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      signal: options.signal,
    });
    xmlData = typeof response.data === 'string' ? response.data : String(response.data);
  } catch (error: unknown) {
    const statusCode = axios.isAxiosError(error) ? error.response?.status : undefined;
    const reason = statusCode !== undefined ? `HTTP ${statusCode}` : errorMessage(error);
    logger.warn(`Failed to fetch device description from ${locationUrl}: ${reason}`);
    throw new FetchError(`Failed to fetch device description from ${locationUrl}: ${reason}`, locationUrl, { statusCode, cause: error });
  }

  const parser = new xml2js.Parser({
    explicitArray: true,
    tagNameProcessors: [xml2js.processors.stripPrefix],
  });

  let tree: unknown;
  try {
    tree = await parser.parseStringPromise(xmlData);
  } catch (error: unknown) {
    logger.warn(`Device description from ${locationUrl} is not well-formed XML: ${errorMessage(error)}`);
    throw new ParseError(`Device description from ${locationUrl} is not well-formed XML`, locationUrl, error);
  }
  if (!isElement(tree)) {
    throw new ParseError(`Device description from ${locationUrl} is empty`, locationUrl);
  }

  const description = extractDescription(tree, locationUrl);
  logger.debug(`Resolved description for ${description.friendlyName}`, { ...description });
  return description;
}
