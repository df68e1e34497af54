import { performance } from 'node:perf_hooks';

/** Milliseconds on a monotonic clock. Only differences are meaningful. */
export function monotonicNow(): number {
  return performance.now();
}

export function elapsedSince(start: number): number {
  return monotonicNow() - start;
}

export function isoNow(): string {
  return new Date().toISOString();
}
