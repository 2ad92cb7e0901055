import { appendFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync } from 'fs';
import { dirname } from 'path';

export interface LogFileOptions {
  maxBytes: number;
  backupCount: number;
}

export const DEFAULT_LOG_FILE_OPTIONS: LogFileOptions = {
  maxBytes: 10 * 1024 * 1024,
  backupCount: 5
};

/**
 * Appends log lines to a file. When the next line would push the file past
 * maxBytes it becomes `<path>.1`, older backups shift up one and the
 * oldest beyond backupCount is removed.
 */
export class RotatingLogFile {
  private size: number;

  constructor(
    private readonly path: string,
    private readonly options: LogFileOptions = DEFAULT_LOG_FILE_OPTIONS
  ) {
    mkdirSync(dirname(path), { recursive: true });
    this.size = existsSync(path) ? statSync(path).size : 0;
  }

  write(line: string): void {
    const data = `${line}\n`;
    const bytes = Buffer.byteLength(data);
    if (this.size > 0 && this.size + bytes > this.options.maxBytes) {
      this.rotate();
    }
    appendFileSync(this.path, data);
    this.size += bytes;
  }

  private rotate(): void {
    const { backupCount } = this.options;
    if (backupCount < 1) {
      rmSync(this.path, { force: true });
    } else {
      for (let index = backupCount - 1; index >= 1; index--) {
        const backup = `${this.path}.${index}`;
        if (existsSync(backup)) renameSync(backup, `${this.path}.${index + 1}`);
      }
      renameSync(this.path, `${this.path}.1`);
    }
    this.size = 0;
  }
}
