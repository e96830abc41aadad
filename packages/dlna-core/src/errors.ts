import type { UpnpFault } from './types';

/**
 * @hebrew מסמך התיאור לא אוחזר: שגיאת תעבורה, timeout או סטטוס שאינו 2xx.
 */
export class FetchError extends Error {
  url: string;
  statusCode?: number;
  constructor(message: string, url: string, options?: { statusCode?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'FetchError';
    this.url = url;
    this.statusCode = options?.statusCode;
    Object.setPrototypeOf(this, FetchError.prototype);
  }
}

/**
 * @hebrew מסמך התיאור אינו XML תקין.
 */
export class ParseError extends Error {
  url: string;
  constructor(message: string, url: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'ParseError';
    this.url = url;
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

export interface ControlErrorDetails extends UpnpFault {
  action: string;
  statusCode?: number;
  bodySnippet?: string;
  cause?: unknown;
}

/**
 * @hebrew קריאת SOAP נכשלה: סטטוס 400 ומעלה, או כשל תעבורה (אז אין statusCode).
 */
export class ControlError extends Error {
  action: string;
  statusCode?: number;
  bodySnippet: string;
  upnpErrorCode?: number;
  upnpErrorDescription?: string;
  constructor(message: string, details: ControlErrorDetails) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = 'ControlError';
    this.action = details.action;
    this.statusCode = details.statusCode;
    this.bodySnippet = details.bodySnippet ?? '';
    this.upnpErrorCode = details.upnpErrorCode;
    this.upnpErrorDescription = details.upnpErrorDescription;
    Object.setPrototypeOf(this, ControlError.prototype);
  }
}

/**
 * @hebrew כשל קלט/פלט בשרת ההזרמה (קובץ נעלם, אין הרשאה). מוצג ללקוח כ-404/500.
 */
export class StreamingIOError extends Error {
  filePath: string;
  code?: string;
  constructor(message: string, filePath: string, code?: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'StreamingIOError';
    this.filePath = filePath;
    this.code = code;
    Object.setPrototypeOf(this, StreamingIOError.prototype);
  }
}
