import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import axios from 'axios';

import { ControlError, dlnaProfileFor } from '@media-cast/dlna-core';
import type { FormatSummary, MediaProbe, SubtitleInventory } from '@media-cast/dlna-core';
import { MockRenderer, soapFault, soapResponse } from '@media-cast/dlna-core/testing';
import type { MockReply } from '@media-cast/dlna-core/testing';

import { PlaybackSession, mimeTypeForContainer } from './playbackSession';
import type { PlaybackSessionOptions } from './playbackSession';

describe('mimeTypeForContainer', () => {
  it('should map ffprobe container names', () => {
    expect(mimeTypeForContainer('matroska,webm')).toBe('video/x-matroska');
    expect(mimeTypeForContainer('mov,mp4,m4a,3gp,3g2,mj2')).toBe('video/mp4');
    expect(mimeTypeForContainer('avi')).toBeUndefined();
  });
});

describe('PlaybackSession', () => {
  let tempDir: string;
  let moviePath: string;
  let songPath: string;
  let clipPath: string;
  let recordingPath: string;
  let renderer: MockRenderer;
  let session: PlaybackSession;
  let states: string[];
  let events: string[];

  const createSession = (options: PlaybackSessionOptions = {}) => {
    const created = new PlaybackSession({ advertiseAddress: '127.0.0.1', soapTimeoutMs: 2000, ...options });
    created.on('stateChange', (state: string) => states.push(state));
    for (const name of ['playing', 'startFailed', 'stopped']) {
      created.on(name, () => events.push(name));
    }
    return created;
  };

  const uriOf = (index: number) => {
    const call = renderer.calls.filter(c => c.action === 'SetAVTransportURI')[index];
    return call ? renderer.argument(call, 'CurrentURI') : undefined;
  };

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'playback-session-'));
    moviePath = path.join(tempDir, 'My Movie.mp4');
    songPath = path.join(tempDir, 'song.mp3');
    await fs.writeFile(moviePath, 'movie-bytes');
    await fs.writeFile(songPath, 'song-bytes');
    clipPath = path.join(tempDir, 'clip.mov');
    recordingPath = path.join(tempDir, 'recording.xyz');
    await fs.writeFile(clipPath, 'clip-bytes');
    await fs.writeFile(recordingPath, 'recording-bytes');
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  beforeEach(async () => {
    renderer = new MockRenderer();
    await renderer.start();
    states = [];
    events = [];
    session = createSession();
  });

  afterEach(async () => {
    await session.stop();
    await renderer.stop();
  });

  it('should serve the file and load then play it on the renderer', async () => {
    await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: moviePath });
    expect(session.state).toBe('starting');
    expect(session.active).toBe(true);

    await session.whenSettled();

    expect(session.state).toBe('playing');
    expect(states).toEqual(['starting', 'playing']);
    expect(events).toEqual(['playing']);
    expect(renderer.actions).toEqual(['SetAVTransportURI', 'Play']);
    expect(session.currentFile).toBe('My Movie.mp4');
    expect(session.streamUrl).toMatch(/^http:\/\/127\.0\.0\.1:\d+\/My%20Movie\.mp4$/);
    expect(uriOf(0)).toBe(session.streamUrl);

    const setUri = renderer.calls[0];
    const metadata = setUri ? renderer.argument(setUri, 'CurrentURIMetaData') : '';
    expect(metadata).toContain('<dc:title>My Movie</dc:title>');
    expect(metadata).toContain('http-get:*:video/mp4:');

    const streamed = await axios.get<string>(String(session.streamUrl), { responseType: 'text' });
    expect(streamed.data).toBe('movie-bytes');
  });

  it('should release everything and report the failure when the renderer refuses to play', async () => {
    renderer.respondTo('Play', () => ({ status: 500, body: soapFault(701, 'Transition not available') }));

    await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: moviePath });
    const failure = new Promise<unknown>((resolve) => session.once('startFailed', resolve));
    await session.whenSettled();

    expect(session.state).toBe('idle');
    expect(session.active).toBe(false);
    expect(session.streamUrl).toBeUndefined();
    expect(states).toEqual(['starting', 'idle']);
    expect(events).toEqual(['startFailed']);
    await expect(failure).resolves.toBeInstanceOf(ControlError);

    const streamUrl = uriOf(0);
    await expect(axios.get(String(streamUrl), { timeout: 1000 })).rejects.toThrow();
  });

  it('should not let a start that finishes after stop revive the session', async () => {
    renderer.respondTo('SetAVTransportURI', (call) => new Promise((resolve) => {
      setTimeout(() => resolve({ status: 200, body: soapResponse(call.serviceType, call.action) }), 200);
    }));

    await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: moviePath });
    await session.stop();
    await session.whenSettled();

    expect(session.state).toBe('idle');
    expect(states).toEqual(['starting', 'idle']);
    expect(events).toEqual(['stopped']);
    expect([...renderer.actions].sort()).toEqual(['SetAVTransportURI', 'Stop']);
  });

  it('should stop the previous session before starting a new one', async () => {
    await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: moviePath });
    await session.whenSettled();
    await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: songPath });
    await session.whenSettled();

    expect(renderer.actions).toEqual(['SetAVTransportURI', 'Play', 'Stop', 'SetAVTransportURI', 'Play']);
    expect(session.currentFile).toBe('song.mp3');
    expect(events).toEqual(['playing', 'stopped', 'playing']);
    expect(states).toEqual(['starting', 'playing', 'idle', 'starting', 'playing']);
  });

  it('should leave the renderer playing the new file when a replaced start finishes late', async () => {
    let attempts = 0;
    renderer.respondTo('SetAVTransportURI', (call) => {
      attempts += 1;
      const reply: MockReply = { status: 200, body: soapResponse(call.serviceType, call.action) };
      return attempts === 1 ? new Promise<MockReply>((resolve) => setTimeout(() => resolve(reply), 300)) : reply;
    });

    await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: moviePath });
    const replaced = session.whenSettled();
    await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: songPath });
    await Promise.all([replaced, session.whenSettled()]);

    expect(session.state).toBe('playing');
    expect(session.currentFile).toBe('song.mp3');
    expect([...renderer.actions.slice(0, 2)].sort()).toEqual(['SetAVTransportURI', 'Stop']);
    expect(renderer.actions.slice(2)).toEqual(['SetAVTransportURI', 'Play']);
    const load = renderer.calls[2];
    expect(load && renderer.argument(load, 'CurrentURI')).toBe(session.streamUrl);
    expect(events).toEqual(['stopped', 'playing']);
    expect(states).toEqual(['starting', 'idle', 'starting', 'playing']);
  });

  it('should make stop idempotent and ignore remote stop failures', async () => {
    await session.stop();
    expect(events).toEqual([]);

    renderer.respondTo('Stop', () => ({ status: 500, body: soapFault(501, 'Action Failed') }));
    await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: moviePath });
    await session.whenSettled();
    await session.stop();
    await session.stop();

    expect(session.state).toBe('idle');
    expect(events).toEqual(['playing', 'stopped']);
    expect(renderer.actions.filter(action => action === 'Stop')).toHaveLength(1);
  });

  it('should pause and resume only from the matching state', async () => {
    await session.pause();
    expect(renderer.actions).toEqual([]);

    await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: moviePath });
    await session.whenSettled();
    await session.resume();
    await session.pause();
    expect(session.paused).toBe(true);
    await session.pause();
    await session.resume();

    expect(session.state).toBe('playing');
    expect(renderer.actions).toEqual(['SetAVTransportURI', 'Play', 'Pause', 'Play']);
  });

  it('should seek by time string or seconds', async () => {
    await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: moviePath });
    await session.whenSettled();
    await session.seek(75);
    await session.seek('00:10:00');

    const targets = renderer.calls.filter(call => call.action === 'Seek').map(call => renderer.argument(call, 'Target'));
    expect(targets).toEqual(['00:01:15', '00:10:00']);
    expect(renderer.calls.find(call => call.action === 'Seek')?.body).toContain('<Unit>REL_TIME</Unit>');
  });

  it('should report position and fall back to zero without a session', async () => {
    await expect(session.getPosition()).resolves.toEqual({ relTime: '00:00:00', duration: '00:00:00' });

    await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: moviePath });
    await session.whenSettled();
    await expect(session.getPosition()).resolves.toEqual({ relTime: '00:01:05', duration: '01:30:00' });

    renderer.respondTo('GetPositionInfo', () => ({ status: 500, body: '' }));
    await expect(session.getPosition()).resolves.toEqual({ relTime: '00:00:00', duration: '00:00:00' });
  });

  it('should report progress in seconds', async () => {
    await expect(session.getProgress()).resolves.toEqual({ positionSeconds: 0, durationSeconds: 0 });

    await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: moviePath });
    await session.whenSettled();

    await expect(session.getProgress()).resolves.toEqual({ positionSeconds: 65, durationSeconds: 5400 });
  });

  it('should serve an unknown extension with the MIME type announced in the metadata', async () => {
    await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: recordingPath });
    await session.whenSettled();

    const head = await axios.head(String(session.streamUrl));
    expect(head.headers['content-type']).toBe('video/mp4');
    expect(head.headers['contentfeatures.dlna.org']).toBe(dlnaProfileFor('video/mp4'));
    const setUri = renderer.calls[0];
    expect(setUri && renderer.argument(setUri, 'CurrentURIMetaData'))
      .toContain(`protocolInfo="http-get:*:video/mp4:${dlnaProfileFor('video/mp4')}"`);
  });

  it('should return neutral volume and mute without RenderingControl', async () => {
    await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: moviePath });
    await session.whenSettled();

    await session.setVolume(50);
    await expect(session.getVolume()).resolves.toBe(0);
    await expect(session.getMute()).resolves.toBe(false);
    expect(renderer.actions).toEqual(['SetAVTransportURI', 'Play']);
  });

  it('should control volume and mute through RenderingControl', async () => {
    await session.start({
      controlUrl: renderer.avTransportUrl,
      renderingControlUrl: renderer.renderingControlUrl,
      mediaPath: moviePath,
    });
    await session.whenSettled();

    await session.setVolume(150);
    expect(renderer.volume).toBe(100);
    await expect(session.getVolume()).resolves.toBe(100);

    await session.setMute(true);
    await expect(session.getMute()).resolves.toBe(true);

    renderer.respondTo('GetVolume', () => ({ status: 500, body: '' }));
    await expect(session.getVolume()).resolves.toBe(0);
  });

  it('should keep the subtitle selection with the session', async () => {
    await session.start({
      controlUrl: renderer.avTransportUrl,
      mediaPath: moviePath,
      subtitle: { kind: 'embedded', trackIndex: 2 },
    });
    expect(session.subtitle).toEqual({ kind: 'embedded', trackIndex: 2 });

    await session.stop();
    await session.whenSettled();
    expect(session.subtitle).toBeUndefined();
  });

  describe('with a media probe', () => {
    const probeReturning = (format: FormatSummary | Error): MediaProbe => ({
      probeFormat: async () => {
        if (format instanceof Error) {
          throw format;
        }
        return format;
      },
      probeSubtitles: async (): Promise<SubtitleInventory> => ({ embeddedTracks: [], externalFiles: [] }),
    });

    it('should refine the MIME type from the container', async () => {
      session = createSession({ mediaProbe: probeReturning({ container: 'matroska,webm', codec: 'h264', bitrateKbps: 8000 }) });
      await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: moviePath });
      await session.whenSettled();

      const setUri = renderer.calls[0];
      expect(setUri && renderer.argument(setUri, 'CurrentURIMetaData')).toContain('http-get:*:video/x-matroska:');
    });

    it('should stream with the MIME type the probe chose', async () => {
      session = createSession({ mediaProbe: probeReturning({ container: 'mov,mp4,m4a,3gp,3g2,mj2', codec: 'h264', bitrateKbps: 4000 }) });
      await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: clipPath });
      await session.whenSettled();

      const head = await axios.head(String(session.streamUrl));
      expect(head.headers['content-type']).toBe('video/mp4');
      expect(head.headers['contentfeatures.dlna.org']).toBe(dlnaProfileFor('video/mp4'));
      const setUri = renderer.calls[0];
      expect(setUri && renderer.argument(setUri, 'CurrentURIMetaData'))
        .toContain(`protocolInfo="http-get:*:video/mp4:${dlnaProfileFor('video/mp4')}"`);
    });

    it('should ignore probe failures', async () => {
      session = createSession({ mediaProbe: probeReturning(new Error('ffprobe not found')) });
      await session.start({ controlUrl: renderer.avTransportUrl, mediaPath: moviePath });
      await session.whenSettled();

      expect(session.state).toBe('playing');
      const setUri = renderer.calls[0];
      expect(setUri && renderer.argument(setUri, 'CurrentURIMetaData')).toContain('http-get:*:video/mp4:');
    });
  });

  describe('with environment configuration', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
      vi.resetModules();
    });

    it('should take the advertised address and channel from the environment', async () => {
      vi.stubEnv('SESSION_ADVERTISE_ADDRESS', '192.168.50.5');
      vi.stubEnv('SESSION_CHANNEL', 'Left');
      vi.resetModules();
      const { PlaybackSession: ConfiguredSession } = await import('./playbackSession');

      session = new ConfiguredSession();
      await session.start({
        controlUrl: renderer.avTransportUrl,
        renderingControlUrl: renderer.renderingControlUrl,
        mediaPath: moviePath,
      });
      await session.whenSettled();
      await session.setVolume(30);

      expect(session.streamUrl).toMatch(/^http:\/\/192\.168\.50\.5:\d+\/My%20Movie\.mp4$/);
      const setVolume = renderer.calls.find(call => call.action === 'SetVolume');
      expect(setVolume && renderer.argument(setVolume, 'Channel')).toBe('Left');
    });
  });

  it('should reject start when the control URL is invalid and leave nothing running', async () => {
    await expect(session.start({ controlUrl: 'not a url', mediaPath: moviePath })).rejects.toBeInstanceOf(ControlError);
    expect(session.state).toBe('idle');
    expect(session.streamUrl).toBeUndefined();
  });
});
