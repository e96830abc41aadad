import dotenv from 'dotenv';
import path from 'node:path';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

// נתיב לקובץ .env בשורש הפרויקט
const parentEnvPath = path.resolve(moduleDir, '../../../.env');

// נתיב לקובץ .env מקומי, בתוך חבילת השרת (packages/server/.env)
const localEnvPath = path.resolve(moduleDir, '../.env');

/**
 * @hebrew טוען קובץ .env אם הוא קיים. קובץ חסר אינו שגיאה.
 * @returns true אם הקובץ נטען
 */
export const loadEnvFile = (filePath: string, override = false): boolean => {
  if (!fs.existsSync(filePath)) {
    return false;
  }
  const result = dotenv.config({ path: filePath, override });
  if (result.error) {
    // הלוגר עוד לא מוגדר בשלב הזה, הוא נבנה לפי משתני הסביבה שנטענים כאן
    console.warn(`[EnvLoader] Error loading .env file from ${filePath}:`, result.error.message);
    return false;
  }
  return true;
};

// 1. קובץ השורש: בסיס, ללא דריסה של משתנים שכבר הוגדרו בסביבה
loadEnvFile(parentEnvPath);

// 2. הקובץ המקומי דורס ערכים זהים מקובץ השורש
loadEnvFile(localEnvPath, true);
