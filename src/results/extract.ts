import { LATENCY_LABEL, SUCCESS_MARKER } from '../runner/logPaths.js';
import { JobMetricsSample } from '../types.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Every numeric value printed right after `label` (e.g. `busbw: 187.4`). */
export function collectLabeledValues(text: string, label: string): number[] {
  const pattern = new RegExp(`${escapeRegExp(label)}\\s+(\\S+)`, 'g');
  const values: number[] = [];
  for (const match of text.matchAll(pattern)) {
    const value = Number.parseFloat(match[1]);
    if (Number.isFinite(value)) values.push(value);
  }
  return values;
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Averages latency and bus bandwidth independently over however many
 * iterations and ranks reported them. No samples yields zero.
 */
export function extractMetrics(text: string): JobMetricsSample {
  const latency = collectLabeledValues(text, LATENCY_LABEL);
  const busbw = collectLabeledValues(text, SUCCESS_MARKER);
  return {
    latencyAvg: mean(latency),
    busbwAvg: mean(busbw),
    latencySamples: latency.length,
    busbwSamples: busbw.length
  };
}
