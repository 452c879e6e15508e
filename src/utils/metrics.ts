/**
 * Minimal in-memory metrics recorder.
 * Counters with optional labels; each increment is also logged at debug level.
 */
import logger from './logger';

type Labels = Record<string, string | number | boolean | undefined>;

function formatLabels(labels?: Labels): string | undefined {
  if (!labels) return undefined;
  const entries = Object.entries(labels).filter(([, v]) => v !== undefined);
  if (entries.length === 0) return undefined;
  return entries.map(([k, v]) => `${k}=${v}`).join(',');
}

function keyFor(name: string, labels?: Labels): string {
  const formatted = formatLabels(labels);
  return formatted ? `${name}{${formatted}}` : name;
}

export class MetricsRecorder {
  private counters = new Map<string, number>();

  increment(name: string, labels?: Labels, value = 1): void {
    const key = keyFor(name, labels);
    const next = (this.counters.get(key) || 0) + value;
    this.counters.set(key, next);
    logger.debug('metric.increment', { name, labels, value, total: next });
  }

  get(name: string, labels?: Labels): number | undefined {
    return this.counters.get(keyFor(name, labels));
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.counters);
  }

  reset(): void {
    this.counters.clear();
  }
}

export const metrics = new MetricsRecorder();
