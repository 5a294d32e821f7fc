/**
 * packages/core/src/perf/perf.ts — Lightweight layout timing.
 *
 * Opt-in via BARKIT_PERF=1 environment variable. Zero-cost when disabled.
 */

import { readEnvFlag } from "./env.js";

/** Phases tracked by the instrumentation system. */
export type InstrumentationPhase = "layout" | "layout_fixed" | "layout_flex";

export const PERF_PHASES: readonly InstrumentationPhase[] = Object.freeze([
  "layout",
  "layout_fixed",
  "layout_flex",
]);

/** Statistics for a single phase. */
export type PhaseStats = Readonly<{
  count: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  max: number;
  /** Top 10 worst (highest) samples for spike analysis. */
  worst10: readonly number[];
}>;

/** Aggregated perf snapshot. */
export type PerfSnapshot = Readonly<{
  phases: Readonly<{ [K in InstrumentationPhase]?: PhaseStats }>;
}>;

/** Token returned by perfMarkStart for timing correlation. */
export type PerfToken = number;

export const PERF_ENABLED: boolean = readEnvFlag("BARKIT_PERF");

const now = (): number => performance.now();

/** Maximum samples kept per phase (ring buffer). */
export const RING_CAP = 1024;

type PhaseRing = {
  samples: Float64Array;
  cursor: number;
  count: number;
  sum: number;
  max: number;
};

function createPhaseRing(): PhaseRing {
  return {
    samples: new Float64Array(RING_CAP),
    cursor: 0,
    count: 0,
    sum: 0,
    max: 0,
  };
}

function recordSample(ring: PhaseRing, dt: number): void {
  if (ring.count >= RING_CAP) {
    ring.sum -= ring.samples[ring.cursor] ?? 0;
  }

  ring.samples[ring.cursor] = dt;
  ring.sum += dt;
  ring.cursor = (ring.cursor + 1) % RING_CAP;
  ring.count = Math.min(ring.count + 1, RING_CAP);

  if (dt > ring.max) {
    ring.max = dt;
  }
}

function computeStats(ring: PhaseRing): PhaseStats | null {
  if (ring.count === 0) return null;

  const arr: number[] = [];
  for (let i = 0; i < ring.count; i++) {
    const sample = ring.samples[i];
    if (sample !== undefined) arr.push(sample);
  }
  arr.sort((a, b) => a - b);

  const p50Idx = Math.min(arr.length - 1, Math.floor(arr.length * 0.5));
  const p95Idx = Math.min(arr.length - 1, Math.floor(arr.length * 0.95));
  const p99Idx = Math.min(arr.length - 1, Math.floor(arr.length * 0.99));

  // Highest values sit at the end of the sorted copy.
  const worst10 = Object.freeze(arr.slice(Math.max(0, arr.length - 10)).reverse());

  return Object.freeze({
    count: ring.count,
    avg: ring.sum / ring.count,
    p50: arr[p50Idx] ?? 0,
    p95: arr[p95Idx] ?? 0,
    p99: arr[p99Idx] ?? 0,
    max: ring.max,
    worst10,
  });
}

/** Per-phase sample store. The module keeps one global instance for BARKIT_PERF. */
export class PerfAggregator {
  private readonly rings = new Map<InstrumentationPhase, PhaseRing>();

  markStart(_phase: InstrumentationPhase): PerfToken {
    return now();
  }

  markEnd(phase: InstrumentationPhase, token: PerfToken): void {
    this.record(phase, now() - token);
  }

  /** Record a duration directly (for cases where timing is computed elsewhere). */
  record(phase: InstrumentationPhase, durationMs: number): void {
    let ring = this.rings.get(phase);
    if (!ring) {
      ring = createPhaseRing();
      this.rings.set(phase, ring);
    }
    recordSample(ring, durationMs);
  }

  snapshot(): PerfSnapshot {
    const phases: { [K in InstrumentationPhase]?: PhaseStats } = {};
    for (const p of PERF_PHASES) {
      const ring = this.rings.get(p);
      if (!ring) continue;
      const stats = computeStats(ring);
      if (stats) phases[p] = stats;
    }
    return Object.freeze({ phases: Object.freeze(phases) });
  }

  reset(): void {
    this.rings.clear();
  }
}

let globalAggregator: PerfAggregator | null = null;

function getAggregator(): PerfAggregator {
  if (!globalAggregator) {
    globalAggregator = new PerfAggregator();
  }
  return globalAggregator;
}

/**
 * Mark the start of a phase. Returns a token to pass to perfMarkEnd.
 * No-op when perf is disabled.
 */
export function perfMarkStart(phase: InstrumentationPhase): PerfToken {
  if (!PERF_ENABLED) return 0;
  return getAggregator().markStart(phase);
}

export function perfMarkEnd(phase: InstrumentationPhase, token: PerfToken): void {
  if (!PERF_ENABLED) return;
  getAggregator().markEnd(phase, token);
}

/**
 * Get a snapshot of all collected perf data.
 * Returns empty snapshot when perf is disabled.
 */
export function perfSnapshot(): PerfSnapshot {
  if (!PERF_ENABLED) {
    return Object.freeze({ phases: Object.freeze({}) });
  }
  return getAggregator().snapshot();
}

export function perfReset(): void {
  if (!PERF_ENABLED) return;
  getAggregator().reset();
}
