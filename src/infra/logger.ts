import fs from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuid } from 'uuid';
import { toJsonSafe } from '../utils/json.js';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  id: string;
  ts: string;
  level: LogLevel;
  event: string;
  data: unknown;
}

/**
 * Append-only NDJSON event log. Writes are serialised so lines never interleave.
 */
export class EventLogger {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly logFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  /** Resolves once the line is written; a failed write is reported as a process warning. */
  log(level: LogLevel, event: string, data: unknown): Promise<LogEntry> {
    const entry: LogEntry = {
      id: uuid(),
      ts: isoNow(),
      level,
      event,
      data: toJsonSafe(data),
    };

    const write = this.queue.then(() => fs.appendFile(this.logFilePath, `${JSON.stringify(entry)}\n`));
    this.queue = write.catch((error: unknown) => {
      process.emitWarning(`event log write failed: ${String(error)}`);
    });

    return this.queue.then(() => entry);
  }

  async flush(): Promise<void> {
    await this.queue;
  }
}
