// Append-only NDJSON log backed by the local filesystem.
// Uses Node.js fs module for local filesystem operations.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  replayNdjson,
  stringifyNdjsonLine,
  type SkippedNdjsonLine,
  type ValidationResult,
} from '@huddle/protocol';

export type AppendLogOptions<T> = {
  /** Absolute or relative path of the .ndjson file */
  filePath: string;

  /** Validates each replayed line */
  validate: (value: unknown) => ValidationResult<T>;

  /** Deduplication key; the first record with a key wins */
  keyOf: (record: T) => string;

  /** Called once after replay when lines had to be skipped */
  onSkipped?: (filePath: string, skipped: SkippedNdjsonLine[]) => void;
};

/**
 * An append-only log of records keyed for idempotent replay.
 *
 * The file is replayed lazily on first access. Duplicate keys (a retried
 * write that reached disk twice) collapse to the first record. Appends are
 * serialized so the has-key check and the write cannot interleave.
 */
export class NdjsonAppendLog<T> {
  private records: Map<string, T> | null = null;
  private loading: Promise<Map<string, T>> | null = null;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: AppendLogOptions<T>) {}

  /**
   * Append a record unless one with the same key exists.
   * @returns true if the record was written
   */
  append(record: T): Promise<boolean> {
    const run = this.tail.then(async () => {
      const records = await this.load();
      const key = this.options.keyOf(record);
      if (records.has(key)) {
        return false;
      }

      await fs.mkdir(path.dirname(this.options.filePath), { recursive: true });
      await fs.appendFile(this.options.filePath, stringifyNdjsonLine(record), 'utf-8');
      records.set(key, record);
      return true;
    });

    // Keep the chain alive after a failed write; the caller still sees the rejection.
    this.tail = run.catch(() => undefined);
    return run;
  }

  async get(key: string): Promise<T | null> {
    const records = await this.load();
    return records.get(key) ?? null;
  }

  /**
   * All records in file order
   */
  async all(): Promise<T[]> {
    const records = await this.load();
    return Array.from(records.values());
  }

  private load(): Promise<Map<string, T>> {
    if (this.records) {
      return Promise.resolve(this.records);
    }
    if (!this.loading) {
      this.loading = this.replay().then(
        (records) => {
          this.records = records;
          return records;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        }
      );
    }
    return this.loading;
  }

  private async replay(): Promise<Map<string, T>> {
    const records = new Map<string, T>();

    let content: string;
    try {
      content = await fs.readFile(this.options.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return records;
      }
      throw error;
    }

    const { records: parsed, skipped } = replayNdjson(content, this.options.validate);
    for (const record of parsed) {
      const key = this.options.keyOf(record);
      if (!records.has(key)) {
        records.set(key, record);
      }
    }

    if (skipped.length > 0) {
      this.options.onSkipped?.(this.options.filePath, skipped);
    }

    return records;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
