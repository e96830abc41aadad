import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { AVTransportClient, AV_TRANSPORT_SERVICE_TYPE } from './avTransportClient';
import { ControlError } from './errors';
import { MockRenderer, soapFault, soapResponse } from './testing/mockRenderer';

describe('AVTransportClient', () => {
  let renderer: MockRenderer;
  let client: AVTransportClient;

  beforeEach(async () => {
    renderer = new MockRenderer();
    await renderer.start();
    client = new AVTransportClient(renderer.avTransportUrl);
  });

  afterEach(async () => {
    await renderer.stop();
  });

  it('should send arguments in the fixed order for each action', async () => {
    await client.play(0);
    await client.pause(0);
    await client.seek(0, '00:10:00');
    await client.getPositionInfo(0);
    await client.getMediaInfo(0);
    await client.stop(0);

    expect(renderer.actions).toEqual(['Play', 'Pause', 'Seek', 'GetPositionInfo', 'GetMediaInfo', 'Stop']);
    const [play, pause, seek, position, mediaInfo, stop] = renderer.calls;
    expect(play?.body).toContain('<InstanceID>0</InstanceID><Speed>1</Speed>');
    expect(pause?.body).toContain('<u:Pause xmlns:u="urn:schemas-upnp-org:service:AVTransport:1"><InstanceID>0</InstanceID></u:Pause>');
    expect(seek?.body).toContain('<InstanceID>0</InstanceID><Unit>REL_TIME</Unit><Target>00:10:00</Target>');
    expect(position?.body).toContain('<InstanceID>0</InstanceID><MediaBrowserID>0</MediaBrowserID>');
    expect(mediaInfo?.body).toContain('<u:GetMediaInfo xmlns:u="urn:schemas-upnp-org:service:AVTransport:1"><InstanceID>0</InstanceID></u:GetMediaInfo>');
    expect(stop?.soapActionHeader).toBe(`"${AV_TRANSPORT_SERVICE_TYPE}#Stop"`);
  });

  it('should send DIDL-Lite metadata with SetAVTransportURI', async () => {
    await client.setUriWithMetadata(0, 'http://192.168.1.10:8000/Movie.mkv', 'Movie');

    expect(renderer.actions).toEqual(['SetAVTransportURI']);
    const call = renderer.calls[0];
    if (!call) {
      throw new Error('expected a call');
    }
    expect(renderer.argument(call, 'CurrentURI')).toBe('http://192.168.1.10:8000/Movie.mkv');
    const metadata = renderer.argument(call, 'CurrentURIMetaData');
    expect(metadata.startsWith('<DIDL-Lite')).toBe(true);
    expect(metadata).toContain('<dc:title>Movie</dc:title>');
    expect(metadata).toContain('protocolInfo="http-get:*:video/x-matroska:DLNA.ORG_PN=AVC_MKV_HD_24_AC3;');
  });

  it('should retry once with empty metadata when the renderer rejects it', async () => {
    let attempts = 0;
    renderer.respondTo('SetAVTransportURI', (call) => {
      attempts += 1;
      return attempts === 1
        ? { status: 500, body: soapFault(714, 'Illegal MIME-type') }
        : { status: 200, body: soapResponse(call.serviceType, call.action) };
    });

    await client.setUriWithMetadata(0, 'http://192.168.1.10:8000/song.mp3', 'Song', 'audio/mpeg');

    expect(renderer.actions).toEqual(['SetAVTransportURI', 'SetAVTransportURI']);
    const [first, second] = renderer.calls;
    expect(first && renderer.argument(first, 'CurrentURIMetaData')).toContain('<upnp:class>object.item.audioItem</upnp:class>');
    expect(second?.body).toContain('<CurrentURIMetaData></CurrentURIMetaData>');
  });

  it('should propagate the second failure', async () => {
    renderer.respondTo('SetAVTransportURI', () => ({ status: 500, body: soapFault(716, 'Resource not found') }));

    const error = await client.setUriWithMetadata(0, 'http://h/a.mp4', 'A').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ControlError);
    expect(error).toMatchObject({ upnpErrorCode: 716 });
    expect(renderer.actions).toEqual(['SetAVTransportURI', 'SetAVTransportURI']);
  });

  it('should not retry on errors other than ControlError', async () => {
    const spy = vi.spyOn(client, 'setAVTransportURI').mockRejectedValueOnce(new TypeError('boom'));

    await expect(client.setUriWithMetadata(0, 'http://h/a.mp4', 'A')).rejects.toBeInstanceOf(TypeError);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('should read the position and duration', async () => {
    await expect(client.readPositionInfo(0)).resolves.toEqual({ relTime: '00:01:05', duration: '01:30:00' });
  });

  it('should fall back to Duration and then to zero', async () => {
    renderer.respondTo('GetPositionInfo', (call) => ({
      status: 200,
      body: soapResponse(call.serviceType, call.action, { RelTime: '00:00:10', Duration: '00:20:00' }),
    }));
    await expect(client.readPositionInfo(0)).resolves.toEqual({ relTime: '00:00:10', duration: '00:20:00' });

    renderer.respondTo('GetPositionInfo', (call) => ({ status: 200, body: soapResponse(call.serviceType, call.action) }));
    await expect(client.readPositionInfo(0)).resolves.toEqual({ relTime: '00:00:00', duration: '00:00:00' });
  });
});
