import * as winston from 'winston';
import { Logtail } from '@logtail/node';
import { LogtailTransport } from '@logtail/winston';

// הרחבת טיפוסים כדי לזהות שדות מותאמים אישית ב-info object
declare module 'winston' {
  namespace Logform {
    interface TransformableInfo {
      environment?: string;
      module?: string;
      label?: string;
    }
  }
}

/*
```sh
LOG_LEVEL=debug LOG_MODULES=ssdpDiscovery,upnpSoapClient npm test
```
*/

const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4
};

// מאפשר ל-TypeScript לזהות את trace(), debug() וכו' על אובייקט הלוגר.
export type CustomLogger = winston.Logger & {
  [level in keyof typeof logLevels]: winston.LeveledLogMethod;
};

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
  trace: 'magenta'
};

winston.addColors(logColors);

const splitModuleList = (value: string): string[] =>
  value.split(',').map(m => m.trim()).filter(m => m);

/**
 * @hebrew קובע האם הודעות של מודול מסוים יוצגו, לפי LOG_HIDE_MODULES ו-LOG_MODULES.
 * רשימת ההסתרה גוברת על רשימת ההצגה. LOG_MODULES ריק או "*" מציג הכל.
 */
export function isModuleVisible(moduleName: string | undefined, env: NodeJS.ProcessEnv = process.env): boolean {
  if (!moduleName) {
    return true;
  }

  const hidden = env.LOG_HIDE_MODULES;
  if (hidden && hidden.trim() !== '' && splitModuleList(hidden).includes(moduleName)) {
    return false;
  }

  const allowed = env.LOG_MODULES;
  if (!allowed || allowed.trim() === '' || allowed.trim() === '*') {
    return true;
  }
  const allowedModules = splitModuleList(allowed);
  return allowedModules.length === 0 || allowedModules.includes(moduleName);
}

const moduleVisibilityFormat = winston.format((info) => {
  return isModuleVisible(info.label) ? info : false;
});

const ERROR_LIKE_KEYS = ['message', 'code', 'errno', 'syscall', 'address', 'port'] as const;

/**
 * @hebrew פורמט של מטא-דאטה, כולל טיפול בשגיאות ובאובייקטים דמויי שגיאה (שגיאות סוקט וכו').
 */
export function formatLogMetadata(metadata: Record<string, unknown>): string {
  const entries = Object.entries(metadata);
  if (entries.length === 0) {
    return '';
  }

  const metaString = entries
    .map(([key, value]) => {
      if (value instanceof Error) {
        return `${key}=Error: ${value.message}${value.stack ? `\nStack: ${value.stack}` : ''}`;
      }
      if (typeof value === 'object' && value !== null && ERROR_LIKE_KEYS.some(k => k in value)) {
        const record: Record<string, unknown> = { ...value };
        const parts = ERROR_LIKE_KEYS
          .filter(k => record[k] !== undefined && record[k] !== '')
          .map(k => typeof record[k] === 'number' ? `${k}: ${record[k]}` : `${k}: "${String(record[k])}"`);
        let errMsg = `${key}=PotentialError: { ${parts.join(', ')} }`;
        if (typeof record.stack === 'string' && record.stack) {
          errMsg += `\nStack: ${record.stack}`;
        }
        return errMsg;
      }
      try {
        return `${key}=${JSON.stringify(value)}`;
      } catch {
        return `${key}=[UnstringifiableObject]`;
      }
    })
    .join(' ');

  return metaString ? ` ${metaString}` : '';
}

function renderLine(info: winston.Logform.TransformableInfo, levelString: string): string {
  let logMessage = `${info.timestamp} [${info.environment?.toUpperCase()}] [${levelString}]`;
  if (info.module) {
    logMessage += ` (${info.module})`;
  }
  logMessage += `: ${info.message}`;

  const {
    level: _level, message: _message, timestamp: _timestamp, label: _label,
    module: _module, environment: _environment,
    [Symbol.for('level')]: _levelSymbol, [Symbol.for('message')]: _messageSymbol,
    stack,
    ...otherMeta
  } = info;

  logMessage += formatLogMetadata(otherMeta);

  if (typeof stack === 'string' && stack) {
    logMessage += `\n${stack}`;
  }
  return logMessage;
}

// פורמט טקסט ללא צבעים (קובץ)
const createTextFormat = () => winston.format.combine(
  moduleVisibilityFormat(),
  winston.format.printf((info) => {
    const originalLevel = info[Symbol.for('level')];
    const levelString = typeof originalLevel === 'string' ? originalLevel.toUpperCase() : 'UNKNOWN_LEVEL';
    return renderLine(info, levelString);
  })
);

export const consoleFormat = () => winston.format.combine(
  winston.format.padLevels(),
  moduleVisibilityFormat(),
  winston.format.printf((info) => renderLine(info, info.level.toUpperCase())),
  winston.format.colorize({ colors: logColors, message: true, level: true, all: true }),
);

export const fileFormat = () => createTextFormat();

function setupLogtailTransport(moduleName: string, environment: string): winston.transport | null {
  const logtailSourceToken = process.env.LOGTAIL_SOURCE_TOKEN;
  const logtailIngestingHost = process.env.LOGTAIL_INGESTING_HOST;
  const logToLogtail = process.env.LOG_TO_LOGTAIL === 'true';
  const consoleEnabled = process.env.LOG_TO_CONSOLE === 'true' || process.env.LOG_TO_CONSOLE === undefined;

  if (!logToLogtail) {
    return null;
  }

  if (!logtailSourceToken || !logtailIngestingHost) {
    if (consoleEnabled) {
      console.warn(`[LoggerSetup] LOG_TO_LOGTAIL=true but LOGTAIL_SOURCE_TOKEN or LOGTAIL_INGESTING_HOST are missing. Logtail will not be initialized for module: ${moduleName} in environment: ${environment}.`);
    }
    return null;
  }

  try {
    const logtail = new Logtail(logtailSourceToken, {
      endpoint: `https://${logtailIngestingHost}`,
    });
    return new LogtailTransport(logtail);
  } catch (error) {
    // הלוגר עצמו עדיין לא קיים בשלב זה
    console.warn(`[LoggerSetup] Failed to initialize Logtail transport for module: ${moduleName} in environment: ${environment}. Error:`, error);
    return null;
  }
}

/**
 * @hebrew יוצר לוגר winston עבור מודול. ההגדרות נקראות ממשתני הסביבה:
 * LOG_LEVEL, LOG_TO_CONSOLE, LOG_TO_FILE, LOG_FILE_PATH, LOG_TO_LOGTAIL, LOG_MODULES, LOG_HIDE_MODULES.
 */
const createModuleLogger = (moduleName: string): CustomLogger => {
  const environment = process.env.NODE_ENV || 'unknown';
  const activeTransports: winston.transport[] = [];
  const logToFile = process.env.LOG_TO_FILE === 'true';

  if (process.env.LOG_TO_CONSOLE === 'true' || process.env.LOG_TO_CONSOLE === undefined) {
    activeTransports.push(new winston.transports.Console({ format: consoleFormat() }));
  }

  if (logToFile) {
    activeTransports.push(new winston.transports.File({
      filename: process.env.LOG_FILE_PATH || 'logs/app.log',
      format: fileFormat(),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
      tailable: true,
    }));
  }

  const logtailTransportInstance = setupLogtailTransport(moduleName, environment);
  if (logtailTransportInstance) {
    activeTransports.push(logtailTransportInstance);
  }

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    levels: logLevels,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format((info) => {
        info.environment = environment;
        if (moduleName) {
          info.module = moduleName;
          // פורמט הסינון עובד על label
          info.label = moduleName;
        }
        return info;
      })(),
      winston.format.errors({ stack: true })
    ),
    transports: activeTransports,
    // handlers לקבצים רק כשהלוג לקובץ מופעל, כדי לא ליצור תיקיית logs בכל הרצה
    exceptionHandlers: logToFile ? [
      new winston.transports.File({
        filename: process.env.LOG_EXCEPTIONS_PATH || 'logs/exceptions.log',
        format: fileFormat()
      })
    ] : undefined,
    rejectionHandlers: logToFile ? [
      new winston.transports.File({
        filename: process.env.LOG_REJECTIONS_PATH || 'logs/rejections.log',
        format: fileFormat()
      })
    ] : undefined,
    exitOnError: false,
  }) as CustomLogger;
};

export default createModuleLogger;

export { createTextFormat, createModuleLogger };
