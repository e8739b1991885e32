import type { AlignmentPair } from "./alignment";

export type TimeSpan = {
  start: number;
  end: number;
};

export type WordTiming = {
  startTime: number | null;
  endTime: number | null;
};

/**
 * Spreads `durationSec` over the words in order, each word getting a share
 * proportional to its length (at least one character).
 */
export function estimateSpans(words: readonly string[], durationSec: number): TimeSpan[] {
  if (!(durationSec > 0) || words.length === 0) return [];
  const weights = words.map((word) => Math.max(1, Array.from(word).length));
  const total = weights.reduce((acc, weight) => acc + weight, 0);

  const spans: TimeSpan[] = [];
  let cumulative = 0;
  for (const weight of weights) {
    const start = (durationSec * cumulative) / total;
    cumulative += weight;
    spans.push({ start, end: (durationSec * cumulative) / total });
  }
  return spans;
}

/**
 * Carries recognized-word spans over to the reference words they were
 * aligned with. Deleted reference words were never heard and stay untimed.
 */
export function timingForReference(
  alignment: readonly AlignmentPair[],
  referenceCount: number,
  recognizedSpans: readonly (TimeSpan | null)[]
): WordTiming[] {
  const timings: WordTiming[] = Array.from({ length: referenceCount }, () => ({
    startTime: null,
    endTime: null,
  }));

  for (const pair of alignment) {
    if (pair.refIndex === null || pair.recIndex === null) continue;
    const span = recognizedSpans[pair.recIndex];
    if (!span) continue;
    timings[pair.refIndex] = { startTime: span.start, endTime: span.end };
  }

  return timings;
}
