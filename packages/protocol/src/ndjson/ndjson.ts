// NDJSON (Newline Delimited JSON) helpers
// Used for the append-only entity registry log

/**
 * Options for parsing NDJSON content
 */
export type ParseNdjsonOptions = {
  /**
   * Drop a final line that fails to parse instead of throwing.
   * An append interrupted by a crash leaves exactly that shape behind:
   * every earlier line is newline-terminated, the last one is not.
   */
  tolerateTornTail?: boolean;
};

/**
 * Result of a tolerant parse
 */
export type NdjsonParseResult<T> = {
  items: T[];

  /** The unparseable trailing fragment, if one was dropped */
  droppedTail: string | null;
};

/**
 * Parse an NDJSON string into an array of objects
 */
export function parseNdjson<T>(content: string, options: ParseNdjsonOptions = {}): T[] {
  return parseNdjsonDetailed<T>(content, options).items;
}

/**
 * Parse an NDJSON string, reporting any dropped torn tail.
 */
export function parseNdjsonDetailed<T>(
  content: string,
  options: ParseNdjsonOptions = {}
): NdjsonParseResult<T> {
  if (!content.trim()) {
    return { items: [], droppedTail: null };
  }

  const lines = content.split('\n');
  const items: T[] = [];
  const endsWithNewline = content.endsWith('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    const isLastLine = i === lines.length - 1;

    try {
      items.push(JSON.parse(line) as T);
    } catch (error) {
      if (options.tolerateTornTail && isLastLine && !endsWithNewline) {
        return { items, droppedTail: lines[i] };
      }
      throw new Error(
        `Failed to parse NDJSON at line ${i + 1}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  return { items, droppedTail: null };
}

/**
 * Stringify an array of objects to NDJSON format
 */
export function stringifyNdjson<T>(items: T[]): string {
  return items.map((item) => JSON.stringify(item)).join('\n') + (items.length > 0 ? '\n' : '');
}
