/**
 * Library-wide configuration.
 *
 * Values come from defaults, then TESSERA_* environment variables, then
 * explicit `configure()` calls. Override precedence: configure > env > defaults.
 *
 * @packageDocumentation
 */

import { DEFAULT_COMPACT_MIN_SLOTS, DEFAULT_COMPACT_RATIO } from './internal/constants';
import { InvalidArgumentError } from './errors';

export interface TesseraConfig {
  /** Emit debug-level log entries to stderr. */
  readonly debug: boolean;
  /** Fraction of tombstoned slots that triggers store compaction. */
  readonly compactRatio: number;
  /** Stores with fewer slots than this are never compacted. */
  readonly compactMinSlots: number;
}

export type EnvRecord = Record<string, string | undefined>;

export const DEFAULT_CONFIG: TesseraConfig = {
  debug: false,
  compactRatio: DEFAULT_COMPACT_RATIO,
  compactMinSlots: DEFAULT_COMPACT_MIN_SLOTS,
};

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  constructor(envVar: string, rawValue: string, expectedType: string) {
    super(`Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

const ENV_DEBUG = 'TESSERA_DEBUG';
const ENV_COMPACT_RATIO = 'TESSERA_COMPACT_RATIO';
const ENV_COMPACT_MIN_SLOTS = 'TESSERA_COMPACT_MIN_SLOTS';

function getDefaultEnv(): EnvRecord {
  return process.env;
}

function coerceBoolean(envVar: string, raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
  throw new EnvCoercionError(envVar, raw, 'boolean');
}

function coerceNumber(envVar: string, raw: string): number {
  const n = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(n)) {
    throw new EnvCoercionError(envVar, raw, 'number');
  }
  return n;
}

function validated(config: TesseraConfig): TesseraConfig {
  if (!(config.compactRatio > 0 && config.compactRatio <= 1)) {
    throw new InvalidArgumentError(`compactRatio must be in (0, 1], got ${String(config.compactRatio)}.`);
  }
  if (!Number.isInteger(config.compactMinSlots) || config.compactMinSlots < 0) {
    throw new InvalidArgumentError(
      `compactMinSlots must be a non-negative integer, got ${String(config.compactMinSlots)}.`
    );
  }
  return config;
}

/**
 * Applies TESSERA_* environment overrides on top of a base config.
 *
 * @throws EnvCoercionError If a variable cannot be read as its field's type.
 */
export function applyEnvOverrides(base: TesseraConfig, env: EnvRecord = getDefaultEnv()): TesseraConfig {
  let result: TesseraConfig = base;

  const debug = env[ENV_DEBUG];
  if (debug !== undefined) {
    result = { ...result, debug: coerceBoolean(ENV_DEBUG, debug) };
  }

  const ratio = env[ENV_COMPACT_RATIO];
  if (ratio !== undefined) {
    result = { ...result, compactRatio: coerceNumber(ENV_COMPACT_RATIO, ratio) };
  }

  const minSlots = env[ENV_COMPACT_MIN_SLOTS];
  if (minSlots !== undefined) {
    result = { ...result, compactMinSlots: coerceNumber(ENV_COMPACT_MIN_SLOTS, minSlots) };
  }

  return validated(result);
}

let current: TesseraConfig = applyEnvOverrides(DEFAULT_CONFIG);

export function getConfig(): TesseraConfig {
  return current;
}

/**
 * Merges `partial` into the active configuration and returns the result.
 *
 * @throws InvalidArgumentError If a value is out of range; the active config is unchanged.
 */
export function configure(partial: Partial<TesseraConfig>): TesseraConfig {
  current = validated({ ...current, ...partial });
  return current;
}

/**
 * Restores defaults plus environment overrides.
 */
export function resetConfig(env?: EnvRecord): TesseraConfig {
  current = applyEnvOverrides(DEFAULT_CONFIG, env);
  return current;
}
