export type BackoffOptions = {
  baseMs: number;
  maxMs: number;
  /** Fractional spread around the delay, e.g. 0.2 for +/-20%. */
  jitter?: number;
};

export function jitter(ms: number, spread = 0.2, random: () => number = Math.random): number {
  const j = ms * (spread * (random() * 2 - 1));
  return Math.max(0, Math.floor(ms + j));
}

/** Capped exponential delay for the given zero-based attempt. */
export function backoffDelay(attempt: number, opts: BackoffOptions, random: () => number = Math.random): number {
  const exp = Math.min(opts.maxMs, opts.baseMs * Math.pow(2, Math.max(0, attempt)));
  return Math.min(opts.maxMs, jitter(exp, opts.jitter ?? 0.2, random));
}

/**
 * Sleeps for `ms`, resolving early (with `false`) when the signal aborts.
 * Resolves `true` when the full delay elapsed.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise<boolean>((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
