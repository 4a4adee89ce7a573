// NDJSON helpers for append-only snapshot logs
//
// One JSON document per line. A log cut short mid-append ends in a malformed
// line, which is reported with its line number like any other.

export class NdjsonParseError extends Error {
  readonly line: number;

  constructor(source: string, line: number, reason: string) {
    super(`Malformed NDJSON in ${source} at line ${line}: ${reason}`);
    this.name = 'NdjsonParseError';
    this.line = line;
  }
}

/**
 * Parse every non-blank line of an NDJSON log.
 *
 * @param source - Name used in error messages (usually the log's path)
 * @throws NdjsonParseError on the first line that is not valid JSON
 */
export function parseNdjson<T>(content: string, source = 'log'): T[] {
  const records: T[] = [];

  content.split('\n').forEach((raw, index) => {
    const line = raw.trim();
    if (!line) return;

    try {
      records.push(JSON.parse(line) as T);
    } catch (error) {
      throw new NdjsonParseError(source, index + 1, error instanceof Error ? error.message : String(error));
    }
  });

  return records;
}

/**
 * One record as an NDJSON line, newline included
 */
export function stringifyNdjsonLine(record: unknown): string {
  return `${JSON.stringify(record)}\n`;
}
