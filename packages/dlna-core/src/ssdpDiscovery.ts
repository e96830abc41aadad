// גילוי התקני UPnP/DLNA באמצעות M-SEARCH

import type { RemoteInfo } from 'node:dgram';

import { createModuleLogger } from './logger';
import { parseSsdpHeaders } from './genericHttpParser';
import { createSearchSocket } from './ssdpSocketManager';
import type { SearchSocket } from './ssdpSocketManager';
import type { DiscoveredDevice, DiscoveryOptions } from './types';
import { errorMessage } from './utils';

// ==========================================================================================
// Constants - קבועים
// ==========================================================================================
export const DEFAULT_SEARCH_TARGETS: readonly string[] = [
  'ssdp:all',
  'upnp:rootdevice',
  'urn:schemas-upnp-org:device:MediaRenderer:1',
  'urn:schemas-upnp-org:service:AVTransport:1',
];
const DEFAULT_TIMEOUT_MS = 2000;
const DEFAULT_MX = 1;

const logger = createModuleLogger('ssdpDiscovery');

/**
 * @hebrew מחזיר את ה-UUID של התקן השורש מתוך USN (החלק שלפני `::`).
 */
export function rootDeviceUuid(usn: string): string {
  const separator = usn.indexOf('::');
  return separator === -1 ? usn : usn.slice(0, separator);
}

function waitForWindow(timeoutMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * @hebrew מריץ סבב גילוי ומפעיל את onDevice עבור כל זוג (location, usn) חדש.
 * שגיאות שליחה או קבלה ליעד מסוים נבלעות; אם לא ניתן לפתוח סוקט, הסבב פשוט לא מניב דבר.
 */
async function runDiscovery(
  options: DiscoveryOptions,
  onDevice: (device: DiscoveredDevice) => void
): Promise<void> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const mx = options.mx ?? DEFAULT_MX;
  const searchTargets = options.searchTargets ?? DEFAULT_SEARCH_TARGETS;
  const signal = options.abortSignal;

  // dedup על פני כל הסבב, לא רק בתוך יעד אחד
  const seen = new Set<string>();
  let currentTarget = searchTargets[0] ?? '';

  const onMessage = (msg: Buffer, rinfo: RemoteInfo) => {
    const headers = parseSsdpHeaders(msg);
    const location = headers.location;
    if (!location) {
      logger.trace(`Ignoring SSDP reply without LOCATION from ${rinfo.address}:${rinfo.port}`);
      return;
    }
    const usn = headers.usn ?? '';
    const key = `${location}\u0000${usn}`;
    if (seen.has(key)) {
      return;
    }
    seen.add(key);

    const device: DiscoveredDevice = {
      location,
      searchTarget: headers.st ?? currentTarget,
      uniqueServiceName: usn,
      server: headers.server ?? '',
    };
    logger.debug(`Discovered ${device.uniqueServiceName || '(no USN)'} at ${device.location}`, { st: device.searchTarget });
    onDevice(device);
  };

  let socket: SearchSocket;
  try {
    socket = await createSearchSocket({
      multicastAddress: options.multicastAddress,
      multicastPort: options.multicastPort,
      multicastTtl: options.multicastTtl,
      multicastInterface: options.multicastInterface,
      onMessage,
    });
  } catch (err: unknown) {
    logger.warn(`SSDP discovery unavailable, could not bind search socket: ${errorMessage(err)}`);
    return;
  }

  try {
    for (const target of searchTargets) {
      if (signal?.aborted) {
        logger.debug('Discovery aborted');
        break;
      }
      currentTarget = target;
      try {
        await socket.sendMSearch(target, mx);
      } catch (err: unknown) {
        logger.warn(`M-SEARCH for ${target} failed: ${errorMessage(err)}`);
        continue;
      }
      await waitForWindow(timeoutMs, signal);
    }
  } finally {
    await socket.close();
  }
  logger.debug(`Discovery finished with ${seen.size} unique replies`);
}

/**
 * @hebrew מגלה התקנים ומניב כל התקן ברגע שהגיע.
 *
 * @example
 * for await (const device of discoverIterable({ timeoutMs: 3000 })) {
 *   console.log(device.location);
 * }
 */
export async function* discoverIterable(options: DiscoveryOptions = {}): AsyncGenerator<DiscoveredDevice, void, undefined> {
  const deviceBuffer: DiscoveredDevice[] = [];
  let wake: (() => void) | null = null;
  let finished = false;

  const notify = () => {
    const resolve = wake;
    wake = null;
    resolve?.();
  };

  // יציאה מוקדמת מהלולאה של הצרכן עוצרת גם את הסבב
  const controller = new AbortController();
  const externalSignal = options.abortSignal;
  const forwardAbort = () => controller.abort();
  if (externalSignal?.aborted) {
    controller.abort();
  } else {
    externalSignal?.addEventListener('abort', forwardAbort, { once: true });
  }

  const run = runDiscovery({ ...options, abortSignal: controller.signal }, (device) => {
    deviceBuffer.push(device);
    notify();
  }).finally(() => {
    finished = true;
    notify();
  });

  try {
    while (true) {
      const next = deviceBuffer.shift();
      if (next) {
        yield next;
        continue;
      }
      if (finished) {
        break;
      }
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }
  } finally {
    controller.abort();
    externalSignal?.removeEventListener('abort', forwardAbort);
    await run;
  }
}

/**
 * @hebrew שולח M-SEARCH לכל יעד חיפוש בתורו, מאזין עד timeoutMs לכל יעד,
 * ומחזיר רשומה אחת לכל זוג (location, usn). אפס התקנים אינו שגיאה.
 */
export async function discover(options: DiscoveryOptions = {}): Promise<DiscoveredDevice[]> {
  const devices: DiscoveredDevice[] = [];
  for await (const device of discoverIterable(options)) {
    devices.push(device);
  }
  return devices;
}
