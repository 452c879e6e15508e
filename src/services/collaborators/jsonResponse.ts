import { isRecord } from '../aggregation/reportAggregator';

const FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pull a JSON object out of a model reply: bare JSON, a fenced block, or the
 * outermost braces of a chattier answer.
 */
export function parseJsonObject(text: string): Record<string, unknown> {
  const trimmed = text.trim();
  const fenced = FENCE.exec(trimmed);
  const candidates = [trimmed];
  if (fenced) {
    candidates.push(fenced[1].trim());
  }
  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start !== -1 && end > start) {
    candidates.push(trimmed.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (isRecord(parsed)) {
      return parsed;
    }
  }
  throw new Error('LLM reply did not contain a JSON object');
}

export function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}
