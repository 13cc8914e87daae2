export type StreamTimings = {
    /** null when the stream ended without a single chunk. */
    timeToFirstChunkMs: number | null;
    durationMs: number;
    gapCount: number;
    medianGapMs: number;
    p95GapMs: number;
};

/** Linear interpolation between the closest ranks; 0 for an empty list. */
export function percentile(values: readonly number[], q: number): number {
    if (values.length === 0) return 0;
    const ordered = [...values].sort((a, b) => a - b);
    const position = (ordered.length - 1) * q;
    const lower = Math.floor(position);
    const upper = Math.min(lower + 1, ordered.length - 1);
    return ordered[lower] + (ordered[upper] - ordered[lower]) * (position - lower);
}

export function formatMs(value: number): string {
    return `${value.toFixed(1)} ms`;
}

/**
 * Summarizes chunk arrival times of one stream. `startedAt` is taken just
 * before the request is issued; `arrivals` holds one timestamp per chunk.
 */
export function summarizeStream(startedAt: number, arrivals: readonly number[]): StreamTimings {
    if (arrivals.length === 0) {
        return { timeToFirstChunkMs: null, durationMs: 0, gapCount: 0, medianGapMs: 0, p95GapMs: 0 };
    }

    const first = arrivals[0];
    const gaps = arrivals.slice(1).map((t, i) => t - arrivals[i]);

    return {
        timeToFirstChunkMs: first - startedAt,
        durationMs: arrivals[arrivals.length - 1] - first,
        gapCount: gaps.length,
        medianGapMs: percentile(gaps, 0.5),
        p95GapMs: percentile(gaps, 0.95),
    };
}
