import { describe, it, expect } from 'vitest';

import { applyEnvOverrides, config } from './config';

const defaults = {
  http: {
    port: 0,
    noDelay: true,
    streamChunkBytes: 65536,
  },
  session: {
    advertiseAddress: '',
    outboundProbeHost: '8.8.8.8',
  },
  discovery: {
    searchTargets: ['ssdp:all'],
  },
};

describe('applyEnvOverrides', () => {
  it('should keep the defaults when no variable is set', () => {
    expect(applyEnvOverrides(defaults, {})).toEqual(defaults);
  });

  it('should coerce values to the type of each default', () => {
    const result = applyEnvOverrides(defaults, {
      HTTP_PORT: '8200',
      HTTP_NO_DELAY: 'FALSE',
      SESSION_ADVERTISE_ADDRESS: '192.168.1.20',
      DISCOVERY_SEARCH_TARGETS: 'upnp:rootdevice, urn:schemas-upnp-org:device:MediaRenderer:1,',
    });

    expect(result).toEqual({
      http: { port: 8200, noDelay: false, streamChunkBytes: 65536 },
      session: { advertiseAddress: '192.168.1.20', outboundProbeHost: '8.8.8.8' },
      discovery: { searchTargets: ['upnp:rootdevice', 'urn:schemas-upnp-org:device:MediaRenderer:1'] },
    });
  });

  it('should keep the default for invalid values', () => {
    const result = applyEnvOverrides(defaults, { HTTP_PORT: 'eighty', HTTP_NO_DELAY: 'yes', HTTP_STREAM_CHUNK_BYTES: ' ' });
    expect(result.http).toEqual({ port: 0, noDelay: true, streamChunkBytes: 65536 });
  });

  it('should not modify the defaults object', () => {
    applyEnvOverrides(defaults, { HTTP_PORT: '9000', DISCOVERY_SEARCH_TARGETS: 'a,b' });
    expect(defaults.http.port).toBe(0);
    expect(defaults.discovery.searchTargets).toEqual(['ssdp:all']);
  });
});

describe('config', () => {
  it('should expose every section', () => {
    expect(Object.keys(config)).toEqual(['discovery', 'description', 'soap', 'http', 'session']);
    expect(config.session.channel).toBe('Master');
  });
});
