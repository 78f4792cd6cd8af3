import type { ChartSample, ChartShares, ChartState, HealthCounts, HealthState, RGB } from '../state/types';
import { STATE_COLORS } from './colors';

// Bottom to top.
export const CHART_SERIES = ['infected', 'recovered', 'susceptible', 'deceased'] as const satisfies readonly HealthState[];

export function createChart(width: number, now: number): ChartState {
  return {
    width,
    samples: Array.from({ length: width }, (): ChartSample => ({ kind: 'share', values: [0, 0, 1, 0] })),
    lastUpdate: now,
    eventMarker: null,
  };
}

export function shareOf(counts: HealthCounts): ChartShares {
  const total = CHART_SERIES.reduce((s, k) => s + counts[k], 0);
  if (total <= 0) return [0, 0, 0, 0];
  return [counts.infected / total, counts.recovered / total, counts.susceptible / total, counts.deceased / total];
}

/** The next sample slot shows this colour instead of the population shares. */
export function markEvent(chart: ChartState, color: RGB): void {
  chart.eventMarker = [...color];
}

/**
 * Appends one sample when `interval` seconds have passed since the last one.
 * The buffer always keeps exactly `width` samples.
 */
export function sampleChart(chart: ChartState, counts: HealthCounts, now: number, interval: number): boolean {
  if (now - chart.lastUpdate < interval) return false;
  if (chart.eventMarker) {
    chart.samples.push({ kind: 'marker', color: chart.eventMarker });
    chart.eventMarker = null;
  } else {
    chart.samples.push({ kind: 'share', values: shareOf(counts) });
  }
  const overflow = chart.samples.length - chart.width;
  if (overflow > 0) chart.samples.splice(0, overflow);
  chart.lastUpdate = now;
  return true;
}

export interface ColumnSegment {
  color: RGB;
  top: number;
  bottom: number;
}

/** Stacked pixel rows for one sample, y growing downwards. */
export function columnSegments(sample: ChartSample, height: number): ColumnSegment[] {
  if (sample.kind === 'marker') return [{ color: sample.color, top: 0, bottom: height }];
  const segments: ColumnSegment[] = [];
  let filled = 0;
  sample.values.forEach((value, i) => {
    const length = Math.round(value * height);
    if (length <= 0) return;
    const bottom = height - filled;
    let top = bottom - length;
    if (top === 1) top = 0; // rounding leaves a stray pixel row
    segments.push({ color: STATE_COLORS[CHART_SERIES[i]], top, bottom });
    filled += length;
  });
  return segments;
}
