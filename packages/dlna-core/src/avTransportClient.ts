import { createModuleLogger } from './logger';
import { ControlError } from './errors';
import { buildMediaMetadata } from './didlLiteUtils';
import { guessMediaMimeType } from './mimeTypes';
import { SoapControlClient, parseActionResponse } from './upnpSoapClient';
import type { PositionInfo, SeekUnit, SoapClientOptions } from './types';
import { errorMessage, formatTime } from './utils';

const logger = createModuleLogger('avTransportClient');

export const AV_TRANSPORT_SERVICE_TYPE = 'urn:schemas-upnp-org:service:AVTransport:1';

/**
 * @hebrew לקוח לשירות AVTransport של מקרן. כל מתודה שולחת פעולה אחת ומחזירה את גוף התגובה.
 * שגיאות מגיעות כ-ControlError מ-SoapControlClient.
 */
export class AVTransportClient {
  private readonly soap: SoapControlClient;

  constructor(controlUrl: string, options: SoapClientOptions = {}) {
    this.soap = new SoapControlClient(controlUrl, options);
  }

  get controlUrl(): string {
    return this.soap.controlUrl;
  }

  setAVTransportURI(instanceId: number, currentUri: string, currentUriMetadata: string): Promise<string> {
    return this.soap.invoke(AV_TRANSPORT_SERVICE_TYPE, 'SetAVTransportURI', [
      ['InstanceID', instanceId],
      ['CurrentURI', currentUri],
      ['CurrentURIMetaData', currentUriMetadata],
    ]);
  }

  /**
   * @hebrew טוען URI עם מטא-דאטה של DIDL-Lite. מכשירים שדוחים את המטא-דאטה
   * מקבלים ניסיון חוזר אחד עם מטא-דאטה ריקה.
   * @param mimeType - אם לא ניתן, מנוחש מסיומת ה-URL
   */
  async setUriWithMetadata(instanceId: number, contentUrl: string, title: string, mimeType?: string): Promise<string> {
    const mime = mimeType ?? guessMediaMimeType(contentUrl);
    const metadata = buildMediaMetadata(contentUrl, title, mime);
    try {
      return await this.setAVTransportURI(instanceId, contentUrl, metadata);
    } catch (error: unknown) {
      if (!(error instanceof ControlError)) {
        throw error;
      }
      logger.warn(`SetAVTransportURI with metadata was rejected, retrying without metadata: ${errorMessage(error)}`);
      return this.setAVTransportURI(instanceId, contentUrl, '');
    }
  }

  play(instanceId: number, speed = '1'): Promise<string> {
    return this.soap.invoke(AV_TRANSPORT_SERVICE_TYPE, 'Play', [
      ['InstanceID', instanceId],
      ['Speed', speed],
    ]);
  }

  pause(instanceId: number): Promise<string> {
    return this.soap.invoke(AV_TRANSPORT_SERVICE_TYPE, 'Pause', [['InstanceID', instanceId]]);
  }

  stop(instanceId: number): Promise<string> {
    return this.soap.invoke(AV_TRANSPORT_SERVICE_TYPE, 'Stop', [['InstanceID', instanceId]]);
  }

  seek(instanceId: number, target: string, unit: SeekUnit = 'REL_TIME'): Promise<string> {
    return this.soap.invoke(AV_TRANSPORT_SERVICE_TYPE, 'Seek', [
      ['InstanceID', instanceId],
      ['Unit', unit],
      ['Target', target],
    ]);
  }

  getPositionInfo(instanceId: number): Promise<string> {
    return this.soap.invoke(AV_TRANSPORT_SERVICE_TYPE, 'GetPositionInfo', [
      ['InstanceID', instanceId],
      ['MediaBrowserID', 0],
    ]);
  }

  getMediaInfo(instanceId: number): Promise<string> {
    return this.soap.invoke(AV_TRANSPORT_SERVICE_TYPE, 'GetMediaInfo', [['InstanceID', instanceId]]);
  }

  /**
   * @hebrew GetPositionInfo מפוענח: RelTime, ו-TrackDuration (או Duration) כמשך.
   * ערכים חסרים הופכים ל-00:00:00.
   */
  async readPositionInfo(instanceId: number): Promise<PositionInfo> {
    const values = parseActionResponse(await this.getPositionInfo(instanceId), 'GetPositionInfo');
    return {
      relTime: formatTime(values['RelTime']),
      duration: formatTime(values['TrackDuration'] || values['Duration']),
    };
  }
}
