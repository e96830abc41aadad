// שליחת פעולות SOAP לנקודת בקרה של שירות UPnP
import * as http from 'node:http';
import * as https from 'node:https';
import axios from 'axios';

import { createModuleLogger } from './logger';
import { ControlError } from './errors';
import type { SoapArgument, SoapClientOptions, UpnpFault } from './types';
import { errorMessage, escapeXml, extractTagValue } from './utils';

const moduleLogger = createModuleLogger('upnpSoapClient');

const SOAP_ENV_NS = 'http://schemas.xmlsoap.org/soap/envelope/';
const SOAP_ENC_NS = 'http://schemas.xmlsoap.org/soap/encoding/';
const DEFAULT_TIMEOUT_MS = 5000;
const BODY_SNIPPET_LENGTH = 200;

/**
 * @hebrew בונה מעטפת SOAP 1.1 עם אלמנט הפעולה בקידומת `u` הקשורה לסוג השירות.
 * ערכי הארגומנטים מקודדים ל-XML ונשלחים לפי הסדר שהתקבל.
 */
export function buildSoapEnvelope(serviceType: string, actionName: string, args: readonly SoapArgument[]): string {
  const argsXml = args
    .map(([name, value]) => `<${name}>${escapeXml(String(value))}</${name}>`)
    .join('');

  return '<?xml version="1.0" encoding="utf-8"?>' +
    `<s:Envelope xmlns:s="${SOAP_ENV_NS}" s:encodingStyle="${SOAP_ENC_NS}">` +
    '<s:Body>' +
    `<u:${actionName} xmlns:u="${escapeXml(serviceType)}">${argsXml}</u:${actionName}>` +
    '</s:Body>' +
    '</s:Envelope>';
}

/**
 * @hebrew מחלץ את ערכי הפלט מתוך `<ActionNameResponse>` בצורה מקלה (ללא תלות בקידומות).
 * ערך שלא נמצא פשוט לא יופיע ברשומה.
 */
export function parseActionResponse(responseText: string, actionName: string): Record<string, string> {
  const values: Record<string, string> = {};
  const responseBody = extractRawTag(responseText, `${actionName}Response`);
  if (responseBody === undefined) {
    return values;
  }
  const childPattern = /<(?:[\w.-]+:)?([\w.-]+)(?:\s[^>]*?)?(?:\/>|>([\s\S]*?)<\/(?:[\w.-]+:)?\1\s*>)/g;
  for (const match of responseBody.matchAll(childPattern)) {
    const name = match[1];
    if (name !== undefined && !(name in values)) {
      values[name] = extractTagValue(`<${name}>${match[2] ?? ''}</${name}>`, name);
    }
  }
  return values;
}

function extractRawTag(text: string, tag: string): string | undefined {
  const pattern = new RegExp(`<(?:[\\w.-]+:)?${tag}(?:\\s[^>]*)?>([\\s\\S]*?)</(?:[\\w.-]+:)?${tag}\\s*>`);
  return pattern.exec(text)?.[1];
}

/**
 * @hebrew קורא את פרטי ה-UPnPError מתוך גוף Fault, אם יש.
 */
export function parseUpnpFault(responseText: string): UpnpFault {
  const code = extractTagValue(responseText, 'errorCode');
  const description = extractTagValue(responseText, 'errorDescription');
  const fault: UpnpFault = {};
  if (code && /^\d+$/.test(code)) {
    fault.upnpErrorCode = Number(code);
  }
  if (description) {
    fault.upnpErrorDescription = description;
  }
  return fault;
}

/**
 * @hebrew לקוח SOAP לנקודת בקרה אחת. הכתובת מפורקת פעם אחת בבנייה;
 * כל קריאה פותחת חיבור חדש (ללא keep-alive) עם timeout.
 */
export class SoapControlClient {
  readonly controlUrl: string;
  readonly scheme: 'http' | 'https';
  readonly host: string;
  readonly port: number;
  readonly path: string;
  private readonly timeoutMs: number;

  constructor(controlUrl: string, options: SoapClientOptions = {}) {
    let url: URL;
    try {
      url = new URL(controlUrl);
    } catch (error: unknown) {
      throw new ControlError(`Invalid control URL: ${controlUrl}`, { action: 'construct', cause: error });
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new ControlError(`Unsupported control URL scheme: ${url.protocol}`, { action: 'construct' });
    }

    this.scheme = url.protocol === 'https:' ? 'https' : 'http';
    this.host = url.hostname;
    this.port = url.port ? Number(url.port) : (this.scheme === 'https' ? 443 : 80);
    this.path = `${url.pathname}${url.search}`;
    this.controlUrl = url.toString();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * @hebrew שולח פעולה ומחזיר את גוף התגובה כטקסט.
   * @throws {ControlError} בסטטוס 400 ומעלה (עם קטע מהגוף), או בכשל תעבורה/timeout (ללא סטטוס)
   */
  async invoke(serviceType: string, actionName: string, args: readonly SoapArgument[] = []): Promise<string> {
    moduleLogger.debug(`Sending command: Action='${actionName}', Service='${serviceType}', URL='${this.controlUrl}'`);
    const envelope = buildSoapEnvelope(serviceType, actionName, args);
    moduleLogger.trace('SOAP Envelope:', { envelope });

    // סוכן חדש לכל קריאה: חיבור TCP/TLS טרי שנסגר בסיום
    const agentOptions = { keepAlive: false };
    const httpAgent = this.scheme === 'http' ? new http.Agent(agentOptions) : undefined;
    const httpsAgent = this.scheme === 'https' ? new https.Agent(agentOptions) : undefined;

    let status: number;
    let body: string;
    try {
      const response = await axios.post<string>(this.controlUrl, envelope, {
        headers: {
          'Content-Type': 'text/xml; charset="utf-8"',
          'SOAPACTION': `"${serviceType}#${actionName}"`,
          'Connection': 'close',
        },
        timeout: this.timeoutMs,
        responseType: 'text',
        httpAgent,
        httpsAgent,
        maxRedirects: 0,
        validateStatus: () => true,
      });
      status = response.status;
      body = typeof response.data === 'string' ? response.data : String(response.data ?? '');
    } catch (error: unknown) {
      moduleLogger.warn(`Transport error for action ${actionName} to ${this.controlUrl}: ${errorMessage(error)}`);
      throw new ControlError(`${actionName} failed: ${errorMessage(error)}`, { action: actionName, cause: error });
    } finally {
      httpAgent?.destroy();
      httpsAgent?.destroy();
    }

    if (status >= 400) {
      const bodySnippet = body.slice(0, BODY_SNIPPET_LENGTH);
      const fault = parseUpnpFault(body);
      moduleLogger.warn(`SOAP action ${actionName} failed with HTTP ${status}`, { ...fault, bodySnippet });
      const faultSuffix = fault.upnpErrorCode !== undefined
        ? ` (UPnP ${fault.upnpErrorCode}${fault.upnpErrorDescription ? ` ${fault.upnpErrorDescription}` : ''})`
        : '';
      throw new ControlError(`${actionName} failed with HTTP ${status}${faultSuffix}`, {
        action: actionName,
        statusCode: status,
        bodySnippet,
        ...fault,
      });
    }

    moduleLogger.trace(`Received SOAP response for ${actionName} (Status ${status})`);
    return body;
  }
}
