/**
 * Tunables for the reader: page size, cache bounds, request limits and the
 * render tick. Defaults are overridden by the config file, then the
 * environment, then command line flags.
 */

import { DEFAULT_API_URL } from "./api.js";
import { loadConfig, type Config } from "./config.js";

// ============================================================================
// Settings Interface
// ============================================================================

export interface ReaderSettings {
  // Story list
  pageSize: number;              // Stories per page (default: 10)

  // Cache
  cacheTtlSeconds: number;       // Age after which an entry is refreshed (default: 10)
  maxCachedPages: number;        // Category pages kept (default: 32)
  maxCachedItems: number;        // Stories and comments kept (default: 500)

  // Network
  maxConcurrentFetches: number;  // Requests in flight at once (default: 8)
  requestTimeoutSeconds: number; // Per request (default: 10)

  // Rendering
  tickMs: number;                // Event loop period (default: 50)
}

// ============================================================================
// Default Values
// ============================================================================

export const DEFAULT_SETTINGS: ReaderSettings = {
  pageSize: 10,
  cacheTtlSeconds: 10,
  maxCachedPages: 32,
  maxCachedItems: 500,
  maxConcurrentFetches: 8,
  requestTimeoutSeconds: 10,
  tickMs: 50,
};

// ============================================================================
// Validation Ranges
// ============================================================================

export interface SettingRange {
  min: number;
  max: number;
  step: number;
  label: string;
  description: string;
}

export const SETTING_RANGES: Record<keyof ReaderSettings, SettingRange> = {
  pageSize: {
    min: 1,
    max: 50,
    step: 1,
    label: "Page Size",
    description: "Stories shown per page",
  },
  cacheTtlSeconds: {
    min: 1,
    max: 300,
    step: 1,
    label: "Cache TTL (s)",
    description: "Seconds before a cached entry is refreshed on the next visit",
  },
  maxCachedPages: {
    min: 1,
    max: 256,
    step: 1,
    label: "Cached Pages",
    description: "Category pages kept in memory",
  },
  maxCachedItems: {
    min: 50,
    max: 10000,
    step: 1,
    label: "Cached Items",
    description: "Stories and comments kept in memory",
  },
  maxConcurrentFetches: {
    min: 1,
    max: 32,
    step: 1,
    label: "Concurrent Fetches",
    description: "Requests allowed in flight at once",
  },
  requestTimeoutSeconds: {
    min: 1,
    max: 60,
    step: 1,
    label: "Request Timeout (s)",
    description: "Seconds before a request is abandoned",
  },
  tickMs: {
    min: 16,
    max: 500,
    step: 1,
    label: "Tick (ms)",
    description: "Milliseconds between event loop ticks",
  },
};

const SETTING_KEYS = Object.keys(DEFAULT_SETTINGS).filter(isSettingKey);

export function isSettingKey(key: string): key is keyof ReaderSettings {
  return Object.prototype.hasOwnProperty.call(DEFAULT_SETTINGS, key);
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate and clamp a setting value to its allowed range.
 */
export function validateSetting(key: keyof ReaderSettings, value: number): number {
  const range = SETTING_RANGES[key];
  if (!Number.isFinite(value)) return DEFAULT_SETTINGS[key];
  // Clamp to min/max
  const clamped = Math.max(range.min, Math.min(range.max, value));
  // Round to step
  const steps = Math.round((clamped - range.min) / range.step);
  return range.min + steps * range.step;
}

/**
 * Validate all settings, returning a sanitized copy.
 */
export function validateSettings(settings: Partial<Record<string, number>>): ReaderSettings {
  const validated: ReaderSettings = { ...DEFAULT_SETTINGS };

  for (const key of SETTING_KEYS) {
    const value = settings[key];
    if (value !== undefined) {
      validated[key] = validateSetting(key, value);
    }
  }

  return validated;
}

// ============================================================================
// Load
// ============================================================================

const ENV_SETTINGS: Record<string, keyof ReaderSettings> = {
  HNTERM_CACHE_TTL: "cacheTtlSeconds",
  HNTERM_MAX_PAGES: "maxCachedPages",
  HNTERM_MAX_ITEMS: "maxCachedItems",
  HNTERM_CONCURRENCY: "maxConcurrentFetches",
  HNTERM_TIMEOUT: "requestTimeoutSeconds",
};

export interface LoadedSettings {
  settings: ReaderSettings;
  apiUrl: string;
  storyType: Config["storyType"];
}

/**
 * Merge defaults, the config file and the environment. Unparseable
 * environment values are ignored.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env, config: Config = loadConfig()): LoadedSettings {
  const merged: Partial<Record<string, number>> = { ...config.settings };

  for (const [name, key] of Object.entries(ENV_SETTINGS)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") continue;
    const value = Number(raw);
    if (Number.isFinite(value)) {
      merged[key] = value;
    }
  }

  return {
    settings: validateSettings(merged),
    apiUrl: env.HNTERM_API_URL || config.apiUrl || DEFAULT_API_URL,
    storyType: config.storyType,
  };
}
