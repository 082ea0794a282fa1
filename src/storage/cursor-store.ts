import { createLogger } from '../logging/logger.js';
import { atomicWriteJson, readJsonFile } from './atomic-write.js';
import { CursorState, cursorStateSchema } from './types.js';

const log = createLogger('cursor-store');

/**
 * Persists the store high-water mark and each conversation's last-seen id,
 * so a restart resumes where the previous process stopped.
 */
export class CursorStore {
  private lastWritten: string | undefined;

  constructor(private readonly filePath: string) {}

  /** Undefined on first start or when the file cannot be trusted. */
  load(): CursorState | undefined {
    try {
      const raw = readJsonFile(this.filePath);
      if (raw === undefined) return undefined;
      const parsed = cursorStateSchema.safeParse(raw);
      if (parsed.success) {
        this.lastWritten = JSON.stringify(parsed.data);
        return parsed.data;
      }
      log.error('Cursor file has an unexpected shape, starting from now', { file: this.filePath });
    } catch (err) {
      log.error('Failed to read cursor file, starting from now', { file: this.filePath, error: String(err) });
    }
    return undefined;
  }

  /** Writes only when the state changed since the last save. */
  save(state: CursorState): void {
    const serialized = JSON.stringify(state);
    if (serialized === this.lastWritten) return;
    atomicWriteJson(this.filePath, state);
    this.lastWritten = serialized;
  }
}
