import type { BackoffOptions } from './backoff';

const DEFAULT_JITTER_RATIO = 0.2;

export type NormalizePositiveNumberOptions = {
  minimum?: number;
  integer?: boolean;
};

function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      return Number.NaN;
    }
    return Number(trimmed);
  }
  return Number.NaN;
}

export function normalizePositiveNumber(
  value: unknown,
  fallback: number,
  options: NormalizePositiveNumberOptions = {}
): number {
  const minimum = options.minimum ?? 1;
  const integer = options.integer ?? false;

  const fallbackValue = integer ? Math.floor(fallback) : fallback;
  const parsed = toNumber(value);

  if (!Number.isFinite(parsed) || parsed < minimum) {
    return fallbackValue;
  }

  return integer ? Math.floor(parsed) : parsed;
}

function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

export function normalizeRatio(value: unknown, fallback: number): number {
  const normalizedFallback = clamp(fallback, 0, 1);
  const parsed = toNumber(value);
  if (!Number.isFinite(parsed)) {
    return normalizedFallback;
  }
  return clamp(parsed, 0, 1);
}

export type RetryPolicyDefaults = {
  attempts: number;
  baseMs: number;
  factor: number;
  maxMs: number;
  jitterRatio?: number;
};

export type RetryPolicy = Readonly<{
  attempts: number;
  baseMs: number;
  factor: number;
  maxMs: number;
  jitterRatio: number;
}>;

type RetryKey = keyof RetryPolicy;

const KEY_SUFFIX: Record<RetryKey, string> = {
  attempts: 'ATTEMPTS',
  baseMs: 'BASE_MS',
  factor: 'FACTOR',
  maxMs: 'MAX_MS',
  jitterRatio: 'JITTER_RATIO'
};

export type ResolveRetryPolicyOptions = {
  prefix: string;
  env?: Record<string, string | undefined>;
};

/**
 * Reads `<PREFIX>_ATTEMPTS`, `<PREFIX>_BASE_MS`, `<PREFIX>_FACTOR`, `<PREFIX>_MAX_MS`
 * and `<PREFIX>_JITTER_RATIO`, falling back to the defaults for blank or invalid values.
 */
export function resolveRetryPolicy(defaults: RetryPolicyDefaults, options: ResolveRetryPolicyOptions): RetryPolicy {
  const env = options.env ?? process.env;
  const read = (key: RetryKey): string | undefined => env[`${options.prefix}_${KEY_SUFFIX[key]}`];

  return Object.freeze({
    attempts: normalizePositiveNumber(read('attempts'), defaults.attempts, { integer: true }),
    baseMs: normalizePositiveNumber(read('baseMs'), defaults.baseMs),
    factor: normalizePositiveNumber(read('factor'), defaults.factor),
    maxMs: normalizePositiveNumber(read('maxMs'), defaults.maxMs),
    jitterRatio: normalizeRatio(read('jitterRatio'), defaults.jitterRatio ?? DEFAULT_JITTER_RATIO)
  });
}

export function retryPolicyToBackoff(policy: RetryPolicy): BackoffOptions {
  return {
    baseMs: policy.baseMs,
    factor: policy.factor,
    maxMs: policy.maxMs,
    jitterRatio: policy.jitterRatio
  } satisfies BackoffOptions;
}
