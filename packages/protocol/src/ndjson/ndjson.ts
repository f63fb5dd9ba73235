// NDJSON (Newline Delimited JSON) helpers
// Used for the append-only record logs (session summaries, knowledge items)

import type { ValidationIssue, ValidationResult } from '../validation/common.js';

/**
 * Parse an NDJSON string into an array of values.
 * Throws on the first malformed line, naming its line number.
 */
export function parseNdjson(content: string): unknown[] {
  if (!content.trim()) {
    return [];
  }

  const lines = content.split('\n');
  const results: unknown[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    try {
      results.push(JSON.parse(line));
    } catch (error) {
      throw new Error(
        `Failed to parse NDJSON at line ${i + 1}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  return results;
}

/**
 * A line that could not be turned into a record
 */
export type SkippedNdjsonLine = {
  line: number;
  reason: string;
};

/**
 * Records recovered from a log plus the lines that were skipped
 */
export type NdjsonReplayResult<T> = {
  records: T[];
  skipped: SkippedNdjsonLine[];
};

/**
 * Replay an append-only log, validating each line.
 *
 * Unlike parseNdjson this never throws: a torn final write or a record
 * that no longer matches the schema is reported in `skipped`.
 */
export function replayNdjson<T>(
  content: string,
  validate: (value: unknown) => ValidationResult<T>
): NdjsonReplayResult<T> {
  const records: T[] = [];
  const skipped: SkippedNdjsonLine[] = [];
  const lines = content.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      skipped.push({
        line: i + 1,
        reason: error instanceof Error ? error.message : 'Unknown parse error',
      });
      continue;
    }

    const result = validate(value);
    if (result.valid) {
      records.push(result.value);
    } else {
      skipped.push({ line: i + 1, reason: describeIssues(result.errors) });
    }
  }

  return { records, skipped };
}

/**
 * Stringify an array of values to NDJSON format
 */
export function stringifyNdjson<T>(items: T[]): string {
  return items.map((item) => JSON.stringify(item)).join('\n') + (items.length > 0 ? '\n' : '');
}

/**
 * Stringify a single item as an NDJSON line (for appending)
 */
export function stringifyNdjsonLine<T>(item: T): string {
  return JSON.stringify(item) + '\n';
}

function describeIssues(issues: ValidationIssue[]): string {
  return issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
}
