/**
 * Shared Application Configuration
 *
 * Centralizes all environment variable access. Core modules (catalog,
 * classification, sequencing, pipeline) never read this; the worker and the
 * server pass the values they need explicitly.
 *
 * Environment variables:
 * - AUTOMATION_KILL_SWITCH: Set to 'true' to reject new runs
 * - REDIS_URL / REDIS_HOST / REDIS_PORT / REDIS_PASSWORD: Redis connection
 * - PORT: HTTP server port (default 3000)
 * - GEMINI_API_KEY: Text extraction backend (runs halt without it)
 * - TEXT_EXTRACTION_MODEL: Gemini model (default gemini-2.0-flash)
 * - SORTER_*: Output directory, catalog override, bundle detection tuning
 */

import 'dotenv/config';
import type { BundleThresholds } from './bundle/types.js';

export interface AppConfig {
  isDev: boolean;
  killSwitch: boolean;
  redis: {
    url: string | undefined;
    host: string;
    port: number;
    password: string | undefined;
  };
  server: {
    port: number;
  };
  gemini: {
    apiKey: string;
    model: string;
  };
  sorter: {
    outputDir: string;
    /** JSON rule catalog; the bundled catalog is used when unset */
    catalogPath: string | undefined;
    specialJurisdiction: string;
    bundleScanPages: number;
    bundleThresholds: BundleThresholds;
    classificationPages: number;
    minTextChars: number;
    /** YYMM; the run start month is used when unset */
    defaultPeriod: string | undefined;
  };
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

function intEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new Error(`Invalid environment variable ${key}: expected a non-negative integer, got "${raw}"`);
  }
  return value;
}

const isDev = optionalEnv('APP_ENV', 'development') !== 'production';

export const appConfig: AppConfig = {
  isDev,
  killSwitch: process.env.AUTOMATION_KILL_SWITCH === 'true',
  redis: {
    url: process.env.REDIS_URL ?? undefined,
    host: optionalEnv('REDIS_HOST', 'localhost'),
    port: intEnv('REDIS_PORT', 6379),
    password: process.env.REDIS_PASSWORD ?? undefined,
  },
  server: {
    port: intEnv('PORT', 3000),
  },
  gemini: {
    // Not required at startup: a missing key surfaces per file as ExtractionUnavailableError
    apiKey: optionalEnv('GEMINI_API_KEY'),
    model: optionalEnv('TEXT_EXTRACTION_MODEL', 'gemini-2.0-flash'),
  },
  sorter: {
    outputDir: optionalEnv('SORTER_OUTPUT_DIR', './output'),
    catalogPath: process.env.SORTER_CATALOG_PATH || undefined,
    specialJurisdiction: optionalEnv('SORTER_SPECIAL_JURISDICTION', '東京都'),
    bundleScanPages: intEnv('SORTER_BUNDLE_SCAN_PAGES', 10),
    bundleThresholds: {
      receipt: intEnv('SORTER_BUNDLE_MIN_RECEIPT', 1),
      payment: intEnv('SORTER_BUNDLE_MIN_PAYMENT', 1),
      codes: intEnv('SORTER_BUNDLE_MIN_CODES', 1),
    },
    classificationPages: intEnv('SORTER_CLASSIFICATION_PAGES', 3),
    minTextChars: intEnv('SORTER_MIN_TEXT_CHARS', 20),
    defaultPeriod: process.env.SORTER_DEFAULT_PERIOD || undefined,
  },
};
