/**
 * @hebrew תוצאת פענוח כותרת Range מול גודל קובץ ידוע.
 * `none`: אין כותרת או שהיא פגומה, ולכן תגובה מלאה (200).
 * `unsatisfiable`: ההתחלה מעבר לסוף הקובץ (416).
 * `range`: טווח סגור `[start, end]` לאחר חיתוך לגודל הקובץ (206).
 */
export type RangeResolution =
  | { kind: 'none' }
  | { kind: 'unsatisfiable' }
  | { kind: 'range'; start: number; end: number };

const DIGITS = /^\d*$/;

export function parseRangeHeader(header: string | undefined, size: number): RangeResolution {
  if (!header) {
    return { kind: 'none' };
  }

  const parts = header.trim().split('=');
  if (parts.length !== 2 || parts[0]?.trim() !== 'bytes') {
    return { kind: 'none' };
  }

  const bounds = (parts[1] ?? '').split('-');
  if (bounds.length !== 2) {
    return { kind: 'none' };
  }
  const startText = (bounds[0] ?? '').trim();
  const endText = (bounds[1] ?? '').trim();
  if (!DIGITS.test(startText) || !DIGITS.test(endText)) {
    return { kind: 'none' };
  }

  const start = startText ? Number(startText) : 0;
  const requestedEnd = endText ? Number(endText) : size - 1;
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(requestedEnd)) {
    return { kind: 'none' };
  }

  if (start >= size) {
    return { kind: 'unsatisfiable' };
  }
  const end = Math.min(requestedEnd, size - 1);
  if (start > end) {
    return { kind: 'none' };
  }
  return { kind: 'range', start, end };
}

export function contentRange(start: number, end: number, size: number): string {
  return `bytes ${start}-${end}/${size}`;
}
