import { createModuleLogger } from './logger';
import { discover, rootDeviceUuid } from './ssdpDiscovery';
import { fetchDescription } from './deviceDescription';
import type { DeviceDescription, DiscoveredDevice, DiscoveryOptions, FetchDescriptionOptions, RendererCandidate } from './types';
import { errorMessage } from './utils';

const logger = createModuleLogger('rendererCandidates');

export interface RendererSearchOptions extends DiscoveryOptions {
  descriptionTimeoutMs?: number;
}

export interface RendererSearchDependencies {
  discover: (options: DiscoveryOptions) => Promise<DiscoveredDevice[]>;
  fetchDescription: (locationUrl: string, options: FetchDescriptionOptions) => Promise<DeviceDescription>;
}

/**
 * @hebrew דירוג יעד החיפוש: תשובה לחיפוש שירות AVTransport היא הספציפית ביותר.
 */
export function searchTargetRank(searchTarget: string): number {
  if (searchTarget.includes(':service:AVTransport:')) {
    return 0;
  }
  if (searchTarget.includes(':device:MediaRenderer:')) {
    return 1;
  }
  if (searchTarget === 'upnp:rootdevice') {
    return 2;
  }
  return 3;
}

/**
 * @hebrew מגלה התקנים, מאחזר את התיאור של כל אחד ומשאיר רק מקרנים עם AVTransport.
 * מועמד אחד לכל UUID של התקן שורש, לפי הדירוג הטוב ביותר; הסדר הוא סדר ההופעה הראשונה.
 * תיאור שנכשל נרשם ללוג ומדולג.
 */
export async function findRendererCandidates(
  options: RendererSearchOptions = {},
  deps: RendererSearchDependencies = { discover, fetchDescription }
): Promise<RendererCandidate[]> {
  const { descriptionTimeoutMs, ...discoveryOptions } = options;
  const devices = await deps.discover(discoveryOptions);
  logger.debug(`Discovery returned ${devices.length} replies`);

  const descriptions = new Map<string, Promise<DeviceDescription | undefined>>();
  const describe = (location: string) => {
    let pending = descriptions.get(location);
    if (!pending) {
      pending = deps.fetchDescription(location, { timeoutMs: descriptionTimeoutMs, signal: options.abortSignal })
        .catch((error: unknown) => {
          logger.warn(`Skipping ${location}: ${errorMessage(error)}`);
          return undefined;
        });
      descriptions.set(location, pending);
    }
    return pending;
  };

  const described = await Promise.all(devices.map(async (device) => ({ device, description: await describe(device.location) })));

  const byUuid = new Map<string, RendererCandidate>();
  for (const { device, description } of described) {
    if (!description?.avTransportControlUrl) {
      continue;
    }
    const uuid = rootDeviceUuid(device.uniqueServiceName);
    const existing = byUuid.get(uuid);
    // Map שומרת את מיקום ההכנסה הראשון גם כשהערך מוחלף
    if (!existing || searchTargetRank(device.searchTarget) < searchTargetRank(existing.device.searchTarget)) {
      byUuid.set(uuid, { device, description });
    }
  }

  const candidates = [...byUuid.values()];
  logger.info(`Found ${candidates.length} renderer candidate(s)`);
  return candidates;
}
