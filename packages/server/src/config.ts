import './envLoader';
import { createModuleLogger, DEFAULT_SEARCH_TARGETS } from '@media-cast/dlna-core';

const logger = createModuleLogger('config');

/**
 * אובייקט התצורה המרכזי של האפליקציה.
 * כל עלה ניתן לדריסה ממשתנה סביבה ששמו נגזר מהנתיב שלו:
 * `http.port` → `HTTP_PORT`, `session.advertiseAddress` → `SESSION_ADVERTISE_ADDRESS`.
 */
const defaultConfig = {
  discovery: {
    timeoutMs: 2000,
    mx: 1,
    searchTargets: [...DEFAULT_SEARCH_TARGETS],
    // ריק: הממשק היוצא שנמצא לפי session.outboundProbeHost
    multicastInterface: '',
  },
  description: {
    timeoutMs: 5000,
  },
  soap: {
    timeoutMs: 5000,
  },
  http: {
    port: 0,
    noDelay: true,
    keepAlive: true,
    keepAliveInitialDelayMs: 60 * 1000,
    streamChunkBytes: 64 * 1024,
    keepAliveTimeoutMs: 65 * 1000,
  },
  session: {
    instanceId: 0,
    channel: 'Master',
    // ריק: הכתובת נקבעת לפי ממשק הרשת היוצא
    advertiseAddress: '',
    outboundProbeHost: '8.8.8.8',
    outboundProbePort: 80,
  },
};

export type AppConfig = typeof defaultConfig;

type ConfigLeaf = string | number | boolean | string[];
export interface ConfigTree {
  [key: string]: ConfigLeaf | ConfigTree;
}

// פונקציית עזר להמרת camelCase ל-SNAKE_CASE
const camelToSnakeCase = (str: string) => str.replace(/[A-Z]/g, letter => `_${letter}`).toUpperCase();

/**
 * @hebrew ממיר ערך משתנה סביבה לטיפוס של ערך ברירת המחדל.
 * @returns undefined אם הערך אינו תקין לטיפוס הזה
 */
function coerceEnvValue(raw: string, defaultValue: ConfigLeaf): ConfigLeaf | undefined {
  if (typeof defaultValue === 'number') {
    const trimmed = raw.trim();
    const num = Number(trimmed);
    return trimmed !== '' && Number.isFinite(num) ? num : undefined;
  }
  if (typeof defaultValue === 'boolean') {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
    return undefined;
  }
  if (Array.isArray(defaultValue)) {
    return raw.split(',').map(item => item.trim()).filter(item => item !== '');
  }
  return raw;
}

function overrideTree(tree: ConfigTree, env: NodeJS.ProcessEnv, path: string[]): void {
  for (const key of Object.keys(tree)) {
    const value = tree[key];
    if (value === undefined) {
      continue;
    }
    const newPath = [...path, key];
    if (typeof value === 'object' && !Array.isArray(value)) {
      overrideTree(value, env, newPath);
      continue;
    }
    const envVarName = newPath.map(camelToSnakeCase).join('_');
    const raw = env[envVarName];
    if (raw === undefined) {
      continue;
    }
    const coerced = coerceEnvValue(raw, value);
    if (coerced === undefined) {
      logger.warn(`Ignoring invalid value for ${envVarName}: '${raw}' (keeping ${JSON.stringify(value)})`);
      continue;
    }
    tree[key] = coerced;
  }
}

/**
 * פונקציה שמאתחלת את התצורה.
 * היא עוברת על עותק של ברירות המחדל ומחפשת משתני סביבה תואמים
 * כדי לדרוס את הערכים, לפי הטיפוס של כל ערך ברירת מחדל.
 */
export function applyEnvOverrides<T extends ConfigTree>(defaults: T, env: NodeJS.ProcessEnv = process.env): T {
  const config = structuredClone(defaults);
  overrideTree(config, env, []);
  return config;
}

export const config: AppConfig = applyEnvOverrides(defaultConfig);
