// Environment variable parsing

import { DEFAULT_CACHE_DIR, DEFAULT_REQUEST_TIMEOUT_MS, resolveBaseUrl } from './defaults.js';

export interface IEnvCredentials {
  token?: string | undefined;
  username?: string | undefined;
  password?: string | undefined;
}

export interface IEnvCacheConfig {
  dir: string;
  enabled: boolean;
}

export interface IEnvConfig {
  baseUrl: string;
  credentials: IEnvCredentials;
  cache: IEnvCacheConfig;
  requestTimeoutMs: number;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseIntEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): IEnvConfig {
  return {
    baseUrl: resolveBaseUrl(nonEmpty(env.NOMAD_URL), nonEmpty(env.NOMAD_OASIS)),
    credentials: {
      token: nonEmpty(env.NOMAD_CLIENT_ACCESS_TOKEN),
      username: nonEmpty(env.NOMAD_USERNAME),
      password: env.NOMAD_PASSWORD || undefined,
    },
    cache: {
      dir: nonEmpty(env.NOMAD_CACHE_DIR) ?? DEFAULT_CACHE_DIR,
      enabled: parseBooleanEnv(env.NOMAD_CACHE_ENABLED, true),
    },
    requestTimeoutMs: parseIntEnv(env.NOMAD_REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS),
  };
}
