export type BackoffOptions = {
  baseMs?: number;
  factor?: number;
  maxMs?: number;
  jitterRatio?: number;
  random?: () => number;
};

type ResolvedBackoff = Required<Omit<BackoffOptions, 'random'>> & { random: () => number };

const DEFAULT_BACKOFF: ResolvedBackoff = {
  baseMs: 500,
  factor: 2,
  maxMs: 10_000,
  jitterRatio: 0.2,
  random: Math.random
};

function withinBounds(value: number, { baseMs, maxMs }: ResolvedBackoff): number {
  if (Number.isNaN(value)) {
    return baseMs;
  }
  return Math.min(Math.max(value, baseMs), maxMs);
}

/**
 * Delay before retry `attempt` (1-based): `baseMs * factor^(attempt-1)`, capped at
 * `maxMs`, then spread by +/- `jitterRatio` and clamped back into `[baseMs, maxMs]`.
 */
export function computeExponentialBackoff(attempt: number, options: BackoffOptions = {}): number {
  const resolved: ResolvedBackoff = {
    baseMs: options.baseMs ?? DEFAULT_BACKOFF.baseMs,
    factor: options.factor ?? DEFAULT_BACKOFF.factor,
    maxMs: options.maxMs ?? DEFAULT_BACKOFF.maxMs,
    jitterRatio: options.jitterRatio ?? DEFAULT_BACKOFF.jitterRatio,
    random: options.random ?? DEFAULT_BACKOFF.random
  };
  const exponent = Math.max(1, Math.floor(attempt)) - 1;
  const delay = withinBounds(resolved.baseMs * resolved.factor ** exponent, resolved);
  if (resolved.jitterRatio <= 0) {
    return Math.round(delay);
  }

  const offset = (resolved.random() * 2 - 1) * delay * resolved.jitterRatio;
  return Math.round(withinBounds(delay + offset, resolved));
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, Math.max(0, ms));
  });
