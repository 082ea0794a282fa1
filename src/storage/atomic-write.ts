import { writeFileSync, appendFileSync, renameSync, mkdirSync, existsSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Atomically writes JSON data to a file (write to .tmp, then rename).
 * Readers see either the previous document or the new one, never a mix.
 */
export function atomicWriteJson(filePath: string, data: unknown): void {
  mkdirSync(dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.tmp`;
  writeFileSync(tmp, JSON.stringify(data, null, 2), 'utf-8');
  renameSync(tmp, filePath);
}

/**
 * Reads a JSON file written by atomicWriteJson.
 * Returns undefined when the file does not exist; parse errors propagate.
 */
export function readJsonFile(filePath: string): unknown {
  if (!existsSync(filePath)) return undefined;
  return JSON.parse(readFileSync(filePath, 'utf-8')) as unknown;
}

/**
 * Appends a single JSON line to a JSONL file.
 * Returns the number of bytes written.
 */
export function appendJsonLine(filePath: string, data: unknown): number {
  mkdirSync(dirname(filePath), { recursive: true });
  const line = JSON.stringify(data) + '\n';
  appendFileSync(filePath, line, 'utf-8');
  return Buffer.byteLength(line, 'utf-8');
}

/**
 * Splits JSONL content into parsed records, handing each to `accept`.
 * Unparseable lines are reported through `onCorrupt` and skipped.
 */
export function parseJsonLines<T>(
  content: string,
  accept: (value: unknown) => T | undefined,
  onCorrupt?: (line: string) => void,
): T[] {
  const out: T[] = [];
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    let value: unknown;
    try {
      value = JSON.parse(trimmed);
    } catch {
      onCorrupt?.(trimmed);
      continue;
    }
    const accepted = accept(value);
    if (accepted === undefined) {
      onCorrupt?.(trimmed);
    } else {
      out.push(accepted);
    }
  }
  return out;
}

/**
 * Formats a Date as a Windows-safe timestamp filename: YYYY-MM-DDTHH-mm-ss-SSSZ
 */
export function formatTimestampFilename(date: Date = new Date()): string {
  return date.toISOString().replace(/[:.]/g, '-');
}
