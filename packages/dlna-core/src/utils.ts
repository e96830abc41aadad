// פונקציות עזר: XML מקל, זמני HH:MM:SS והודעות שגיאה

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

/**
 * @hebrew מקודד את חמשת התווים המיוחדים של XML.
 */
export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, ch => XML_ESCAPES[ch] ?? ch);
}

const XML_UNESCAPES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&apos;': "'",
};

function unescapeXml(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|apos);/g, entity => XML_UNESCAPES[entity] ?? entity);
}

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * @hebrew מחלץ את תוכן המופע הראשון של `<tag>...</tag>` מתוך טקסט, תוך התעלמות מקידומת namespace
 * (`<u:tag>`, `<m:tag attr="x">`). זהו חילוץ טקסטואלי ולא ניתוח XML מלא:
 * מכשירים רבים שולחים תגובות עם קידומות לא עקביות.
 * @returns התוכן לאחר trim ופענוח ישויות, או מחרוזת ריקה אם התגית לא נמצאה.
 */
export function extractTagValue(text: string, tag: string): string {
  const name = escapeRegExp(tag);
  const pattern = new RegExp(
    `<(?:[\\w.-]+:)?${name}(?:\\s[^>]*)?>([\\s\\S]*?)</(?:[\\w.-]+:)?${name}\\s*>`
  );
  const match = pattern.exec(text);
  if (!match || match[1] === undefined) {
    return '';
  }
  return unescapeXml(match[1].trim());
}

// ==========================================================================================
// Time helpers
// ==========================================================================================

/**
 * @hebrew ממיר `H:MM:SS` לשניות. חלק עשרוני של שניות נחתך. קלט לא תקין מחזיר 0.
 */
export function hhmmssToSeconds(hhmmss: string): number {
  if (!hhmmss) {
    return 0;
  }
  const parts = hhmmss.trim().split(':');
  if (parts.length !== 3) {
    return 0;
  }
  const [h, m, s] = parts.map(part => /^\d+(?:\.\d+)?$/.test(part) ? Math.floor(Number(part)) : NaN);
  if (h === undefined || m === undefined || s === undefined || [h, m, s].some(Number.isNaN)) {
    return 0;
  }
  return h * 3600 + m * 60 + s;
}

export function secondsToHhmmss(seconds: number): string {
  const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(h)}:${pad(m)}:${pad(s)}`;
}

export function formatTime(hhmmss: string | undefined): string {
  return hhmmss || '00:00:00';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
