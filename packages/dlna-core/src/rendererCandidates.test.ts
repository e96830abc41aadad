import { describe, it, expect, vi } from 'vitest';

import { findRendererCandidates, searchTargetRank } from './rendererCandidates';
import type { RendererSearchDependencies } from './rendererCandidates';
import { FetchError } from './errors';
import type { DeviceDescription, DiscoveredDevice } from './types';

const AVT_ST = 'urn:schemas-upnp-org:service:AVTransport:1';
const MR_ST = 'urn:schemas-upnp-org:device:MediaRenderer:1';

function reply(location: string, usn: string, searchTarget: string): DiscoveredDevice {
  return { location, uniqueServiceName: usn, searchTarget, server: 'Linux UPnP/1.0 Test/1.0' };
}

describe('searchTargetRank', () => {
  it('should prefer the AVTransport service over the device types', () => {
    expect(searchTargetRank(AVT_ST)).toBe(0);
    expect(searchTargetRank(MR_ST)).toBe(1);
    expect(searchTargetRank('upnp:rootdevice')).toBe(2);
    expect(searchTargetRank('ssdp:all')).toBe(3);
  });
});

describe('findRendererCandidates', () => {
  const tvDescription: DeviceDescription = { friendlyName: 'TV', avTransportControlUrl: 'http://10.0.0.2:9197/avt' };
  const speakerDescription: DeviceDescription = { friendlyName: 'Speaker', avTransportControlUrl: 'http://10.0.0.3/avt' };
  const serverDescription: DeviceDescription = { friendlyName: 'NAS' };

  function deps(devices: DiscoveredDevice[]): RendererSearchDependencies & { fetched: string[] } {
    const fetched: string[] = [];
    return {
      fetched,
      discover: vi.fn(async () => devices),
      fetchDescription: async (location: string) => {
        fetched.push(location);
        switch (location) {
          case 'http://10.0.0.2/tv.xml': return tvDescription;
          case 'http://10.0.0.3/speaker.xml': return speakerDescription;
          case 'http://10.0.0.4/nas.xml': return serverDescription;
          default: throw new FetchError(`Failed to fetch ${location}`, location, { statusCode: 404 });
        }
      },
    };
  }

  it('should keep one candidate per root device, choosing the best ranked reply', async () => {
    const devices = [
      reply('http://10.0.0.2/tv.xml', 'uuid:tv::upnp:rootdevice', 'upnp:rootdevice'),
      reply('http://10.0.0.3/speaker.xml', 'uuid:speaker::urn:schemas-upnp-org:device:MediaRenderer:1', MR_ST),
      reply('http://10.0.0.2/tv.xml', `uuid:tv::${AVT_ST}`, AVT_ST),
      reply('http://10.0.0.2/tv.xml', 'uuid:tv', 'ssdp:all'),
    ];
    const injected = deps(devices);

    const candidates = await findRendererCandidates({ timeoutMs: 100 }, injected);

    expect(candidates).toEqual([
      { device: devices[2], description: tvDescription },
      { device: devices[1], description: speakerDescription },
    ]);
    expect(injected.fetched).toEqual(['http://10.0.0.2/tv.xml', 'http://10.0.0.3/speaker.xml']);
  });

  it('should pass discovery options through without the description timeout', async () => {
    const injected = deps([]);
    await findRendererCandidates({ timeoutMs: 100, mx: 2, descriptionTimeoutMs: 500 }, injected);
    expect(injected.discover).toHaveBeenCalledWith({ timeoutMs: 100, mx: 2 });
  });

  it('should skip devices without AVTransport and failed descriptions', async () => {
    const devices = [
      reply('http://10.0.0.4/nas.xml', 'uuid:nas::upnp:rootdevice', 'upnp:rootdevice'),
      reply('http://10.0.0.9/gone.xml', 'uuid:gone::upnp:rootdevice', 'upnp:rootdevice'),
      reply('http://10.0.0.3/speaker.xml', 'uuid:speaker::upnp:rootdevice', 'upnp:rootdevice'),
    ];

    const candidates = await findRendererCandidates({}, deps(devices));

    expect(candidates).toEqual([{ device: devices[2], description: speakerDescription }]);
  });
});
