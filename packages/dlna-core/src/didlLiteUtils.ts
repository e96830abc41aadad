import { create } from 'xmlbuilder2';

import { createModuleLogger } from './logger';
import type { DidlLiteObject, Resource, UpnpItemClass } from './types';

const logger = createModuleLogger('didlLiteUtils');

const DLNA_COMMON_FLAGS = 'DLNA.ORG_OP=11;DLNA.ORG_CI=0;DLNA.ORG_FLAGS=01500000000000000000000000000000';

/**
 * @hebrew מחרוזת פרופיל DLNA (הפרמטר הרביעי של protocolInfo וגם הכותרת contentFeatures.dlna.org).
 * OP=11 מצהיר על תמיכה ב-seek לפי זמן ולפי טווח בתים; FLAGS מסמנים הזרמה ב-DLNA 1.5.
 */
export function dlnaProfileFor(mimeType: string): string {
  const mime = mimeType.toLowerCase();
  if (mime === 'video/mp4') {
    return `DLNA.ORG_PN=AVC_MP4_HD_24_AC3;${DLNA_COMMON_FLAGS}`;
  }
  if (mime === 'video/x-matroska') {
    return `DLNA.ORG_PN=AVC_MKV_HD_24_AC3;${DLNA_COMMON_FLAGS}`;
  }
  if (mime.startsWith('video/')) {
    return DLNA_COMMON_FLAGS;
  }
  if (mime.startsWith('audio/')) {
    return `DLNA.ORG_PN=MP3;${DLNA_COMMON_FLAGS}`;
  }
  return DLNA_COMMON_FLAGS;
}

export function upnpClassFor(mimeType: string): UpnpItemClass {
  const mime = mimeType.toLowerCase();
  if (mime.startsWith('video/')) {
    return 'object.item.videoItem';
  }
  if (mime.startsWith('audio/')) {
    return 'object.item.audioItem';
  }
  return 'object.item';
}

export function protocolInfoFor(mimeType: string): string {
  return `http-get:*:${mimeType}:${dlnaProfileFor(mimeType)}`;
}

/**
 * יוצר מחרוזת XML של DIDL-Lite עבור פריט מדיה בודד באמצעות xmlbuilder2.
 * @param item - אובייקט הפריט (DidlLiteObject).
 * @param resource - אובייקט המשאב (Resource) של הפריט.
 * @returns מחרוזת XML של DIDL-Lite.
 */
export function createSingleItemDidlLiteXml(item: DidlLiteObject, resource: Resource): string {
  const { id, parentId, restricted, title, class: itemClass } = item;
  const { uri, protocolInfo, size, duration } = resource;

  const resAttributes: Record<string, string> = {
    'protocolInfo': protocolInfo
  };
  if (size !== undefined) {
    resAttributes['size'] = String(size);
  }
  if (duration !== undefined) {
    resAttributes['duration'] = duration;
  }

  const root = create({ version: '1.0', encoding: 'UTF-8' })
    .ele('DIDL-Lite', {
      'xmlns': 'urn:schemas-upnp-org:metadata-1-0/DIDL-Lite/',
      'xmlns:dc': 'http://purl.org/dc/elements/1.1/',
      'xmlns:upnp': 'urn:schemas-upnp-org:metadata-1-0/upnp/'
    })
    .ele('item', { 'id': id, 'parentID': parentId, 'restricted': restricted ? '1' : '0' })
    .ele('dc:title').txt(title).up()
    .ele('upnp:class').txt(itemClass).up()
    .ele('res', resAttributes).txt(uri).up()
    .up();

  // headless: ללא הצהרת <?xml?>, חלק מהמכשירים דוחים אותה בתוך CurrentURIMetaData
  return root.end({ prettyPrint: false, headless: true });
}

/**
 * @hebrew בונה מטא-דאטה מינימלית לפריט יחיד: כותרת, מחלקת upnp לפי MIME ומשאב אחד עם protocolInfo.
 */
export function buildMediaMetadata(contentUrl: string, title: string, mimeType: string): string {
  const didl = createSingleItemDidlLiteXml(
    { id: '0', parentId: '0', restricted: true, title, class: upnpClassFor(mimeType) },
    { uri: contentUrl, protocolInfo: protocolInfoFor(mimeType) }
  );
  logger.trace('Built DIDL-Lite metadata', { contentUrl, mimeType });
  return didl;
}
