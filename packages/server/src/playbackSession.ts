// ניהול סשן ניגון יחיד: שרת ההזרמה, לקוחות הבקרה והמעברים בין המצבים
import { EventEmitter } from 'node:events';
import path from 'node:path';

import {
  AVTransportClient,
  DEFAULT_MEDIA_MIME_TYPE,
  RenderingControlClient,
  createModuleLogger,
  errorMessage,
  hhmmssToSeconds,
  lookupMimeType,
  secondsToHhmmss,
} from '@media-cast/dlna-core';
import type { MediaProbe, PositionInfo, SoapClientOptions, SubtitleReference } from '@media-cast/dlna-core';

import { config } from './config';
import { detectOutboundAddress } from './localAddress';
import { serveDirectory } from './rangeHttpServer';
import type { RangeHttpServer, ServeDirectoryOptions, SocketTuningOptions } from './rangeHttpServer';

const logger = createModuleLogger('playbackSession');

export type PlaybackState = 'idle' | 'starting' | 'playing' | 'paused';

/** הפעולות של AVTransport שהסשן משתמש בהן */
export type AvTransportController = Pick<AVTransportClient, 'setUriWithMetadata' | 'play' | 'pause' | 'stop' | 'seek' | 'readPositionInfo'>;
export type RenderingController = Pick<RenderingControlClient, 'readVolume' | 'readMute' | 'setVolume' | 'setMute'>;

export interface StartPlaybackOptions {
  controlUrl: string;
  mediaPath: string;
  renderingControlUrl?: string;
  subtitle?: SubtitleReference;
  /** פורט לשרת ההזרמה; 0 או חסר לפורט אקראי */
  port?: number;
  /** ברירת מחדל: שם הקובץ ללא סיומת */
  title?: string;
  mimeType?: string;
}

/** ברירות המחדל נלקחות מ-`config` (מקטעי session, soap ו-http) */
export interface PlaybackSessionOptions {
  instanceId?: number;
  channel?: string;
  /** כתובת לפרסום ב-URL. ריק: הממשק היוצא */
  advertiseAddress?: string;
  outboundProbeHost?: string;
  outboundProbePort?: number;
  soapTimeoutMs?: number;
  tuning?: SocketTuningOptions;
  mediaProbe?: MediaProbe;
  createAvTransport?: (controlUrl: string, options: SoapClientOptions) => AvTransportController;
  createRenderingControl?: (controlUrl: string, options: SoapClientOptions) => RenderingController;
  serve?: (directory: string, port: number, options: ServeDirectoryOptions) => Promise<RangeHttpServer>;
  resolveLocalAddress?: (probeHost: string, probePort: number) => Promise<string>;
}

interface ActiveSession {
  generation: number;
  server: RangeHttpServer;
  avTransport: AvTransportController;
  renderingControl?: RenderingController;
  mediaPath: string;
  streamUrl: string;
  subtitle?: SubtitleReference;
  // משותף לשרת ההזרמה (contentFeatures) ולמטא-דאטה של DIDL-Lite
  media: { mimeType: string };
}

export interface PlaybackProgress {
  positionSeconds: number;
  durationSeconds: number;
}

const ZERO_TIME = '00:00:00';

/**
 * @hebrew ממפה את שם המכל מ-ffprobe (למשל "matroska,webm") לסוג MIME שהטלוויזיות מכירות.
 */
export function mimeTypeForContainer(container: string): string | undefined {
  const names = container.toLowerCase().split(',').map(name => name.trim());
  if (names.includes('matroska')) {
    return 'video/x-matroska';
  }
  if (names.includes('mp4') || names.includes('mov')) {
    return 'video/mp4';
  }
  return undefined;
}

/**
 * @hebrew סשן ניגון יחיד מול מקרן אחד.
 * מצבים: idle → starting → playing ⇄ paused → idle.
 * `start` מחזיר מיד במצב starting; רצף הבקרה המרוחק (SetAVTransportURI ואז Play) רץ ברקע.
 * אירועים: `stateChange(state)`, `playing`, `startFailed(error)`, `stopped`.
 */
export class PlaybackSession extends EventEmitter {
  private readonly instanceId: number;
  private readonly channel: string;
  private readonly advertiseAddress: string;
  private readonly soapTimeoutMs: number;
  private readonly tuning: SocketTuningOptions;
  private readonly options: PlaybackSessionOptions;
  private current?: ActiveSession;
  private currentState: PlaybackState = 'idle';
  private generation = 0;
  // שרשרת הבטחות שמסדרת את כל המעברים בין המצבים
  private transition: Promise<void> = Promise.resolve();
  private startSequence: Promise<void> = Promise.resolve();

  constructor(options: PlaybackSessionOptions = {}) {
    super();
    this.options = options;
    this.instanceId = options.instanceId ?? config.session.instanceId;
    this.channel = options.channel ?? config.session.channel;
    this.advertiseAddress = options.advertiseAddress ?? config.session.advertiseAddress;
    this.soapTimeoutMs = options.soapTimeoutMs ?? config.soap.timeoutMs;
    this.tuning = options.tuning ?? config.http;
  }

  get state(): PlaybackState {
    return this.currentState;
  }

  get active(): boolean {
    return this.currentState !== 'idle';
  }

  get paused(): boolean {
    return this.currentState === 'paused';
  }

  get currentFile(): string | undefined {
    return this.current ? path.basename(this.current.mediaPath) : undefined;
  }

  get subtitle(): SubtitleReference | undefined {
    return this.current?.subtitle;
  }

  get streamUrl(): string | undefined {
    return this.current?.streamUrl;
  }

  /** מתממש כשרצף ההפעלה האחרון הסתיים (בהצלחה, בכישלון או כשהוחלף) */
  whenSettled(): Promise<void> {
    return this.startSequence;
  }

  private serialize<T>(work: () => Promise<T>): Promise<T> {
    const run = this.transition.then(work, work);
    this.transition = run.then(() => undefined, () => undefined);
    return run;
  }

  private setState(state: PlaybackState): void {
    if (this.currentState === state) {
      return;
    }
    this.currentState = state;
    logger.debug(`State changed to ${state}`);
    this.emit('stateChange', state);
  }

  /**
   * @hebrew מפעיל ניגון של קובץ מקומי במקרן. סשן קיים נעצר קודם.
   * @throws אם שרת ההזרמה לא עלה או שכתובת הבקרה אינה תקינה; שגיאות מהמקרן מדווחות ב-`startFailed`
   */
  start(options: StartPlaybackOptions): Promise<void> {
    return this.serialize(async () => {
      await this.stopLocked();

      const generation = ++this.generation;
      const mediaPath = path.resolve(options.mediaPath);
      const fileName = path.basename(mediaPath);
      const media = { mimeType: options.mimeType ?? lookupMimeType(mediaPath) ?? DEFAULT_MEDIA_MIME_TYPE };
      const serve = this.options.serve ?? serveDirectory;
      const server = await serve(path.dirname(mediaPath), options.port ?? config.http.port, {
        ...this.tuning,
        mimeTypeFor: (filePath: string) => (filePath === mediaPath ? media.mimeType : undefined),
      });

      let session: ActiveSession;
      try {
        const address = this.advertiseAddress || await (this.options.resolveLocalAddress ?? detectOutboundAddress)(
          this.options.outboundProbeHost ?? config.session.outboundProbeHost,
          this.options.outboundProbePort ?? config.session.outboundProbePort
        );
        const soapOptions: SoapClientOptions = { timeoutMs: this.soapTimeoutMs };
        const createAvTransport = this.options.createAvTransport ?? ((url: string, opts: SoapClientOptions) => new AVTransportClient(url, opts));
        const createRenderingControl = this.options.createRenderingControl ?? ((url: string, opts: SoapClientOptions) => new RenderingControlClient(url, opts));
        session = {
          generation,
          server,
          avTransport: createAvTransport(options.controlUrl, soapOptions),
          renderingControl: options.renderingControlUrl ? createRenderingControl(options.renderingControlUrl, soapOptions) : undefined,
          mediaPath,
          streamUrl: `http://${address}:${server.port}/${encodeURIComponent(fileName)}`,
          subtitle: options.subtitle,
          media,
        };
      } catch (error: unknown) {
        await server.close();
        throw error;
      }

      this.current = session;
      this.setState('starting');
      logger.info(`Starting playback of ${fileName} at ${session.streamUrl}`);

      const title = options.title ?? path.parse(fileName).name;
      this.startSequence = this.runStartSequence(session, title, options.mimeType !== undefined);
    });
  }

  private async detectMimeType(session: ActiveSession, explicit: boolean): Promise<string> {
    const guessed = session.media.mimeType;
    const probe = this.options.mediaProbe;
    if (!probe) {
      return guessed;
    }
    try {
      const format = await probe.probeFormat(session.mediaPath);
      logger.info(`Media format: ${format.container} / ${format.codec} @ ${format.bitrateKbps} kbps`);
      return explicit ? guessed : mimeTypeForContainer(format.container) ?? guessed;
    } catch (error: unknown) {
      logger.warn(`Media probe failed for ${session.mediaPath}: ${errorMessage(error)}`);
      return guessed;
    }
  }

  private async runStartSequence(session: ActiveSession, title: string, explicitMime: boolean): Promise<void> {
    const stillCurrent = () => this.generation === session.generation;
    try {
      const mimeType = await this.detectMimeType(session, explicitMime);
      // לפני SetAVTransportURI: המקרן פונה לשרת רק אחריה
      session.media.mimeType = mimeType;
      await session.avTransport.setUriWithMetadata(this.instanceId, session.streamUrl, title, mimeType);
      if (stillCurrent()) {
        await session.avTransport.play(this.instanceId);
      }
    } catch (error: unknown) {
      await this.serialize(async () => {
        if (!stillCurrent()) {
          return;
        }
        logger.error(`Playback start failed: ${errorMessage(error)}`);
        this.generation++;
        this.current = undefined;
        await session.server.close();
        this.setState('idle');
        this.emit('startFailed', error instanceof Error ? error : new Error(errorMessage(error)));
      });
      return;
    }

    await this.serialize(async () => {
      // Stop כבר נשלח ב-stopLocked; המקרן עשוי כבר לנגן את הסשן החדש
      if (!stillCurrent()) {
        logger.info('Start completed after the session was replaced; leaving the renderer alone');
        return;
      }
      this.setState('playing');
      this.emit('playing');
    });
  }

  /**
   * @hebrew עוצר את הסשן: Stop למקרן (שגיאות נרשמות ונבלעות) וסגירת שרת ההזרמה.
   * קריאה כשאין סשן אינה עושה דבר.
   */
  stop(): Promise<void> {
    return this.serialize(() => this.stopLocked());
  }

  private async stopLocked(): Promise<void> {
    const session = this.current;
    if (!session) {
      return;
    }
    this.generation++;
    this.current = undefined;
    try {
      await session.avTransport.stop(this.instanceId);
    } catch (error: unknown) {
      logger.warn(`Remote stop failed: ${errorMessage(error)}`);
    }
    await session.server.close();
    this.setState('idle');
    logger.info(`Stopped playback of ${path.basename(session.mediaPath)}`);
    this.emit('stopped');
  }

  pause(): Promise<void> {
    return this.serialize(async () => {
      const session = this.current;
      if (!session || this.currentState !== 'playing') {
        logger.debug(`Ignoring pause in state ${this.currentState}`);
        return;
      }
      await session.avTransport.pause(this.instanceId);
      this.setState('paused');
    });
  }

  resume(): Promise<void> {
    return this.serialize(async () => {
      const session = this.current;
      if (!session || this.currentState !== 'paused') {
        logger.debug(`Ignoring resume in state ${this.currentState}`);
        return;
      }
      await session.avTransport.play(this.instanceId);
      this.setState('playing');
    });
  }

  /**
   * @param target - `HH:MM:SS` או מספר שניות
   */
  async seek(target: string | number): Promise<void> {
    const session = this.current;
    if (!session) {
      logger.debug('Ignoring seek without an active session');
      return;
    }
    const relTime = typeof target === 'number' ? secondsToHhmmss(target) : target;
    await session.avTransport.seek(this.instanceId, relTime, 'REL_TIME');
  }

  /** עוצמת הקול הנוכחית; 0 כשאין RenderingControl או בכל שגיאה */
  async getVolume(): Promise<number> {
    const renderingControl = this.current?.renderingControl;
    if (!renderingControl) {
      return 0;
    }
    try {
      return await renderingControl.readVolume(this.instanceId, this.channel);
    } catch (error: unknown) {
      logger.debug(`GetVolume failed: ${errorMessage(error)}`);
      return 0;
    }
  }

  async getMute(): Promise<boolean> {
    const renderingControl = this.current?.renderingControl;
    if (!renderingControl) {
      return false;
    }
    try {
      return await renderingControl.readMute(this.instanceId, this.channel);
    } catch (error: unknown) {
      logger.debug(`GetMute failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async setVolume(volume: number): Promise<void> {
    const renderingControl = this.current?.renderingControl;
    if (!renderingControl) {
      return;
    }
    const clamped = Math.min(100, Math.max(0, Math.round(volume)));
    await renderingControl.setVolume(this.instanceId, this.channel, clamped);
  }

  async setMute(mute: boolean): Promise<void> {
    const renderingControl = this.current?.renderingControl;
    if (!renderingControl) {
      return;
    }
    await renderingControl.setMute(this.instanceId, this.channel, mute);
  }

  /** מיקום ומשך נוכחיים; 00:00:00 כשאין סשן או בכל שגיאה */
  async getPosition(): Promise<PositionInfo> {
    const session = this.current;
    if (!session) {
      return { relTime: ZERO_TIME, duration: ZERO_TIME };
    }
    try {
      return await session.avTransport.readPositionInfo(this.instanceId);
    } catch (error: unknown) {
      logger.debug(`GetPositionInfo failed: ${errorMessage(error)}`);
      return { relTime: ZERO_TIME, duration: ZERO_TIME };
    }
  }

  /** מיקום ומשך בשניות, לפס התקדמות */
  async getProgress(): Promise<PlaybackProgress> {
    const { relTime, duration } = await this.getPosition();
    return { positionSeconds: hhmmssToSeconds(relTime), durationSeconds: hhmmssToSeconds(duration) };
  }
}
