import { SoapControlClient, parseActionResponse } from './upnpSoapClient';
import type { SoapClientOptions } from './types';

export const RENDERING_CONTROL_SERVICE_TYPE = 'urn:schemas-upnp-org:service:RenderingControl:1';

/**
 * @hebrew לקוח לשירות RenderingControl: עוצמה והשתקה לפי ערוץ (בדרך כלל "Master").
 */
export class RenderingControlClient {
  private readonly soap: SoapControlClient;

  constructor(controlUrl: string, options: SoapClientOptions = {}) {
    this.soap = new SoapControlClient(controlUrl, options);
  }

  get controlUrl(): string {
    return this.soap.controlUrl;
  }

  /**
   * @throws {RangeError} כשהעוצמה אינה מספר שלם בין 0 ל-100
   */
  setVolume(instanceId: number, channel: string, volume: number): Promise<string> {
    if (!Number.isInteger(volume) || volume < 0 || volume > 100) {
      return Promise.reject(new RangeError(`Volume must be an integer between 0 and 100, got ${volume}`));
    }
    return this.soap.invoke(RENDERING_CONTROL_SERVICE_TYPE, 'SetVolume', [
      ['InstanceID', instanceId],
      ['Channel', channel],
      ['DesiredVolume', volume],
    ]);
  }

  getVolume(instanceId: number, channel: string): Promise<string> {
    return this.soap.invoke(RENDERING_CONTROL_SERVICE_TYPE, 'GetVolume', [
      ['InstanceID', instanceId],
      ['Channel', channel],
    ]);
  }

  setMute(instanceId: number, channel: string, mute: boolean): Promise<string> {
    return this.soap.invoke(RENDERING_CONTROL_SERVICE_TYPE, 'SetMute', [
      ['InstanceID', instanceId],
      ['Channel', channel],
      ['DesiredMute', mute ? '1' : '0'],
    ]);
  }

  getMute(instanceId: number, channel: string): Promise<string> {
    return this.soap.invoke(RENDERING_CONTROL_SERVICE_TYPE, 'GetMute', [
      ['InstanceID', instanceId],
      ['Channel', channel],
    ]);
  }

  /** @returns CurrentVolume כמספר, או 0 אם חסר */
  async readVolume(instanceId: number, channel: string): Promise<number> {
    const values = parseActionResponse(await this.getVolume(instanceId, channel), 'GetVolume');
    const volume = Number.parseInt(values['CurrentVolume'] ?? '', 10);
    return Number.isNaN(volume) ? 0 : volume;
  }

  async readMute(instanceId: number, channel: string): Promise<boolean> {
    const values = parseActionResponse(await this.getMute(instanceId, channel), 'GetMute');
    return values['CurrentMute'] === '1';
  }
}
