import type { OutputFormat } from './flags.js';

/**
 * Write generated strings to stdout.
 * - text: one value per line, as is
 * - ndjson: one JSON string per line
 * - json: a single pretty-printed array
 */
export function writeValues(
  values: Iterable<string>,
  format: OutputFormat
): number {
  if (format === 'json') {
    const items = Array.from(values);
    process.stdout.write(JSON.stringify(items, null, 2) + '\n');
    return items.length;
  }

  let written = 0;
  for (const value of values) {
    const line = format === 'ndjson' ? JSON.stringify(value) : value;
    process.stdout.write(line + '\n');
    written += 1;
  }
  return written;
}

export function* take<T>(values: Iterable<T>, limit: number): Generator<T> {
  if (limit <= 0) return;
  let taken = 0;
  for (const value of values) {
    yield value;
    taken += 1;
    if (taken >= limit) return;
  }
}
