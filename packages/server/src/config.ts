/**
 * Server configuration.
 *
 * Reads `soulrelay.config.json`, searched for from the working directory up
 * to the filesystem root, overlays `SOULRELAY_*` environment variables and
 * validates the result. Built on Node's `fs` and `path` only.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';

import type { SoulRegistration } from '@soulrelay/identity';
import type { ListingVisibility } from '@soulrelay/protocol';
import { SoulRelayError, SoulRelayErrorCode, isPlainObject, parseJsonSafe, parseLogLevel } from '@soulrelay/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/**
 * `price-time`: best price for the seeker, then arrival.
 * `reputation-first`: the owner's reputation score, then price-time.
 */
export type MatchPriority = 'price-time' | 'reputation-first';

/** Shape of a validated configuration. */
export interface ServerConfig {
  host: string;
  port: number;
  /** Root directory for the record collections. */
  dataDir: string;
  logLevel: string;
  authChallengeTtlMs: number;
  tradeDeadlineMs: number;
  listingTtlMs: number;
  maxOpenListingsPerSoul: number;
  maxPrice: number;
  settlementCredit: number;
  listingVisibility: ListingVisibility;
  /** How resting listings are ranked when several can match. */
  matchPriority: MatchPriority;
  /** 0 disables the per-session limit. */
  commandsPerMinute: number;
  /** JSON file of `soulId → private key hex` for server-side signing. */
  keyFile?: string;
  /** Souls registered at start-up. */
  souls: SoulRegistration[];
}

/** Name of the configuration file. */
export const CONFIG_FILE_NAME = 'soulrelay.config.json';

export const DEFAULT_CONFIG: ServerConfig = {
  host: '0.0.0.0',
  port: 6667,
  dataDir: './data',
  logLevel: 'info',
  authChallengeTtlMs: 60_000,
  tradeDeadlineMs: 5 * 60_000,
  listingTtlMs: 60 * 60_000,
  maxOpenListingsPerSoul: 20,
  maxPrice: 1_000_000_000,
  settlementCredit: 1,
  listingVisibility: 'tagged',
  matchPriority: 'price-time',
  commandsPerMinute: 120,
  souls: [],
};

export interface LoadConfigOptions {
  /** Where the search for the config file starts. Defaults to `process.cwd()`. */
  cwd?: string;
  /** Explicit config file; skips the search. */
  file?: string;
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
}

export interface LoadedConfig {
  config: ServerConfig;
  /** Absolute path of the file that was read, if any. */
  source?: string;
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Search for `soulrelay.config.json` starting from `cwd` and walking up to
 * the filesystem root. Returns the absolute path if found.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');

  for (;;) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = resolve(dir, '..');
    if (parent === dir) break;
    dir = parent;
  }

  return undefined;
}

/**
 * Resolve the effective configuration: defaults, then the config file, then
 * the environment.
 *
 * @throws {SoulRelayError} CONFIG_INVALID when the file cannot be parsed or
 *   any value is out of range.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const source = options.file ? resolve(options.file) : findConfigFile(options.cwd);
  const fromFile = source ? readConfigFile(source) : {};
  const merged = { ...fromFile, ...envOverrides(options.env ?? process.env) };
  const config = validateConfig(merged);
  return source ? { config, source } : { config };
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new SoulRelayError(
      SoulRelayErrorCode.CONFIG_INVALID,
      `Cannot read ${filePath}`,
      error instanceof Error ? { cause: error } : undefined,
    );
  }
  const parsed = parseJsonSafe(raw);
  if (!isPlainObject(parsed)) {
    throw new SoulRelayError(SoulRelayErrorCode.CONFIG_INVALID, `${filePath} must contain a JSON object`);
  }
  return parsed;
}

/** Values taken from `SOULRELAY_*` variables. Empty variables are ignored. */
export function envOverrides(env: Record<string, string | undefined>): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const set = (name: string, key: string, convert: (value: string) => unknown = (v) => v): void => {
    const value = env[name];
    if (value !== undefined && value !== '') {
      overrides[key] = convert(value);
    }
  };
  set('SOULRELAY_HOST', 'host');
  set('SOULRELAY_PORT', 'port', (v) => (/^\d+$/.test(v) ? Number(v) : v));
  set('SOULRELAY_DATA_DIR', 'dataDir');
  set('SOULRELAY_LOG_LEVEL', 'logLevel');
  set('SOULRELAY_MATCH_PRIORITY', 'matchPriority');
  set('SOULRELAY_KEY_FILE', 'keyFile');
  return overrides;
}

// ─── Validation ───────────────────────────────────────────────────────────────

function invalid(field: string, expected: string): SoulRelayError {
  return new SoulRelayError(SoulRelayErrorCode.CONFIG_INVALID, `Config field "${field}" must be ${expected}`, {
    context: { field },
  });
}

function stringField(raw: Record<string, unknown>, field: string, fallback: string): string {
  const value = raw[field] ?? fallback;
  if (typeof value !== 'string' || value.length === 0) throw invalid(field, 'a non-empty string');
  return value;
}

function integerField(raw: Record<string, unknown>, field: string, fallback: number, min: number): number {
  const value = raw[field] ?? fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw invalid(field, `an integer of at least ${min}`);
  }
  return value;
}

function soulsField(raw: Record<string, unknown>): SoulRegistration[] {
  const value = raw['souls'] ?? [];
  if (!Array.isArray(value)) throw invalid('souls', 'an array');
  return value.map((entry: unknown, index) => {
    const field = `souls[${index}]`;
    if (!isPlainObject(entry) || typeof entry['publicKey'] !== 'string') {
      throw invalid(field, 'an object with a publicKey');
    }
    const registration: SoulRegistration = { publicKey: entry['publicKey'] };
    for (const key of ['id', 'paradigm', 'mode', 'agentName'] as const) {
      const optional = entry[key];
      if (optional === undefined) continue;
      if (typeof optional !== 'string') throw invalid(`${field}.${key}`, 'a string');
      registration[key] = optional;
    }
    return registration;
  });
}

/**
 * Check every field of a raw config object and fill in defaults.
 *
 * @throws {SoulRelayError} CONFIG_INVALID naming the first bad field.
 */
export function validateConfig(raw: Record<string, unknown>): ServerConfig {
  const logLevel = stringField(raw, 'logLevel', DEFAULT_CONFIG.logLevel);
  if (parseLogLevel(logLevel) === undefined) {
    throw invalid('logLevel', 'one of debug, info, warn, error, silent');
  }

  const port = integerField(raw, 'port', DEFAULT_CONFIG.port, 0);
  if (port > 65_535) throw invalid('port', 'at most 65535');

  const maxPrice = raw['maxPrice'] ?? DEFAULT_CONFIG.maxPrice;
  if (typeof maxPrice !== 'number' || !Number.isFinite(maxPrice) || maxPrice <= 0) {
    throw invalid('maxPrice', 'a positive number');
  }

  const listingVisibility = raw['listingVisibility'] ?? DEFAULT_CONFIG.listingVisibility;
  if (listingVisibility !== 'tagged' && listingVisibility !== 'anonymous') {
    throw invalid('listingVisibility', '"tagged" or "anonymous"');
  }

  const matchPriority = raw['matchPriority'] ?? DEFAULT_CONFIG.matchPriority;
  if (matchPriority !== 'price-time' && matchPriority !== 'reputation-first') {
    throw invalid('matchPriority', '"price-time" or "reputation-first"');
  }

  const keyFile = raw['keyFile'];
  if (keyFile !== undefined && (typeof keyFile !== 'string' || keyFile.length === 0)) {
    throw invalid('keyFile', 'a non-empty string');
  }

  const config: ServerConfig = {
    host: stringField(raw, 'host', DEFAULT_CONFIG.host),
    port,
    dataDir: stringField(raw, 'dataDir', DEFAULT_CONFIG.dataDir),
    logLevel,
    authChallengeTtlMs: integerField(raw, 'authChallengeTtlMs', DEFAULT_CONFIG.authChallengeTtlMs, 1),
    tradeDeadlineMs: integerField(raw, 'tradeDeadlineMs', DEFAULT_CONFIG.tradeDeadlineMs, 1),
    listingTtlMs: integerField(raw, 'listingTtlMs', DEFAULT_CONFIG.listingTtlMs, 1),
    maxOpenListingsPerSoul: integerField(raw, 'maxOpenListingsPerSoul', DEFAULT_CONFIG.maxOpenListingsPerSoul, 1),
    maxPrice,
    settlementCredit: integerField(raw, 'settlementCredit', DEFAULT_CONFIG.settlementCredit, 1),
    listingVisibility,
    matchPriority,
    commandsPerMinute: integerField(raw, 'commandsPerMinute', DEFAULT_CONFIG.commandsPerMinute, 0),
    souls: soulsField(raw),
  };
  return typeof keyFile === 'string' ? { ...config, keyFile } : config;
}
