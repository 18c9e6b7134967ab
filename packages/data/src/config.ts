/**
 * Environment configuration
 *
 * `.env` is read through dotenv; loadConfig() validates the variables and
 * raises ConfigurationError naming the first bad one.
 */

import fs from 'fs';
import { config as loadDotenv } from 'dotenv';
import { ConfigurationError } from '@navi-morph/core';
import { DictionaryApiProvider, type FetchFn } from './providers/api.js';
import { TsvLexiconProvider } from './providers/tsv.js';
import type { LexiconProvider } from './lexicon.js';

export const PROVIDER_TYPES = ['tsv', 'api'] as const;
export type ProviderType = typeof PROVIDER_TYPES[number];

export type ProviderConfig =
  | { type: 'tsv'; tsvPath: string }
  | { type: 'api'; apiUrl: string; timeoutMs: number; retries: number };

export interface NaviConfig {
  /** Absent when NAVI_PROVIDER is unset; lemmatize and generate need none */
  provider?: ProviderConfig;
  exceptionsPath: string;
  lemmaCacheSize: number;
  debug: boolean;
  trace: boolean;
}

export const DEFAULTS = {
  apiTimeoutMs: 5000,
  apiRetries: 3,
  exceptionsPath: 'exceptions.json',
  lemmaCacheSize: 1000
} as const;

export type Env = Readonly<Record<string, string | undefined>>;

// Populate process.env from .env without overriding what is already set
export function loadEnvFile(path?: string): void {
  loadDotenv(path ? { path } : undefined);
}

function flag(env: Env, name: string): boolean {
  const value = env[name]?.trim().toLowerCase();
  if (value === undefined || value === '') return false;
  if (['1', 'true', 'yes', 'on'].includes(value)) return true;
  if (['0', 'false', 'no', 'off'].includes(value)) return false;
  throw new ConfigurationError(`expected a boolean, got '${env[name]}'`, name);
}

function nonNegativeInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`expected a non-negative integer, got '${raw}'`, name);
  }
  return value;
}

function positiveInteger(env: Env, name: string, fallback: number): number {
  const value = nonNegativeInteger(env, name, fallback);
  if (value === 0) {
    throw new ConfigurationError('expected a positive integer, got \'0\'', name);
  }
  return value;
}

function required(env: Env, name: string, detail: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(detail, name);
  }
  return value;
}

function checkUrl(value: string): void {
  try {
    new URL(value);
  } catch {
    throw new ConfigurationError(`invalid URL '${value}'`, 'NAVI_API_URL');
  }
}

function parseProvider(env: Env): ProviderConfig | undefined {
  const raw = env.NAVI_PROVIDER?.trim().toLowerCase();
  if (!raw) return undefined;

  switch (raw) {
    case 'tsv':
      return { type: 'tsv', tsvPath: required(env, 'NAVI_TSV_PATH', 'a TSV path is required for the tsv provider') };
    case 'api': {
      const apiUrl = required(env, 'NAVI_API_URL', 'an API URL is required for the api provider');
      checkUrl(apiUrl);
      return {
        type: 'api',
        apiUrl,
        timeoutMs: positiveInteger(env, 'NAVI_API_TIMEOUT_MS', DEFAULTS.apiTimeoutMs),
        retries: nonNegativeInteger(env, 'NAVI_API_RETRIES', DEFAULTS.apiRetries)
      };
    }
    default:
      throw new ConfigurationError(`unknown provider '${raw}', expected one of: ${PROVIDER_TYPES.join(', ')}`, 'NAVI_PROVIDER');
  }
}

export function loadConfig(env: Env = process.env): NaviConfig {
  return {
    provider: parseProvider(env),
    exceptionsPath: env.NAVI_EXCEPTIONS_PATH?.trim() || DEFAULTS.exceptionsPath,
    lemmaCacheSize: nonNegativeInteger(env, 'NAVI_LEMMA_CACHE_SIZE', DEFAULTS.lemmaCacheSize),
    debug: flag(env, 'NAVI_DEBUG'),
    trace: flag(env, 'NAVI_TRACE')
  };
}

/**
 * Build the configured provider. A TSV path that does not exist is a
 * configuration error rather than an empty dictionary.
 */
export function createProvider(provider: ProviderConfig, fetchFn?: FetchFn): LexiconProvider {
  switch (provider.type) {
    case 'tsv':
      if (!fs.existsSync(provider.tsvPath)) {
        throw new ConfigurationError(`TSV file not found: ${provider.tsvPath}`, 'NAVI_TSV_PATH');
      }
      return new TsvLexiconProvider(provider.tsvPath);
    case 'api':
      return new DictionaryApiProvider({
        url: provider.apiUrl,
        timeoutMs: provider.timeoutMs,
        retries: provider.retries,
        fetch: fetchFn
      });
  }
}
