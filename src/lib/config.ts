/**
 * Runtime configuration from environment variables
 *
 * All variables are prefixed with SHADERPAPER_. Values are read once at import;
 * runtime constructor options take precedence over them.
 *
 * Usage:
 *   import { config } from '@/lib/config';
 *   const threshold = config.render.maxConsecutiveGpuErrors;
 */

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface AppConfig {
  logLevel: LogLevelName;
  presetsDir: string;
  overlayDurationMs: number;
  render: {
    maxConsecutiveGpuErrors: number;
  };
  reloadDebounceMs: number;
  isDev: boolean;
}

const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function getEnvVar(key: string, defaultValue: string): string {
  const value = process.env[key];
  return typeof value === 'string' && value !== '' ? value : defaultValue;
}

function getNumberEnvVar(key: string, defaultValue: number, min: number): number {
  const parsed = Number(getEnvVar(key, String(defaultValue)));
  return Number.isFinite(parsed) && parsed >= min ? parsed : defaultValue;
}

function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVEL_NAMES.some((name) => name === value);
}

const isDev = process.env.NODE_ENV === 'development';

function getLogLevel(): LogLevelName {
  const raw = getEnvVar('SHADERPAPER_LOG_LEVEL', isDev ? 'debug' : 'warn').toLowerCase();
  return isLogLevelName(raw) ? raw : 'warn';
}

export const config: AppConfig = {
  logLevel: getLogLevel(),
  presetsDir: getEnvVar('SHADERPAPER_PRESETS_DIR', './presets'),
  overlayDurationMs: getNumberEnvVar('SHADERPAPER_OVERLAY_MS', 5000, 0),
  render: {
    maxConsecutiveGpuErrors: getNumberEnvVar('SHADERPAPER_MAX_GPU_ERRORS', 3, 1),
  },
  reloadDebounceMs: getNumberEnvVar('SHADERPAPER_RELOAD_DEBOUNCE_MS', 100, 0),
  isDev,
};
