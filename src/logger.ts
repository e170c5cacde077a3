import * as fs from 'fs';
import * as path from 'path';

/** Strip ANSI escape codes for clean log file output */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

/** Timestamp prefix: [YYYY-MM-DD HH:MM:SS] */
function timestamp(): string {
  const now = new Date();
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `[${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())} ` +
    `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}]`
  );
}

/**
 * Sink for run detail. The console only gets progress lines; everything
 * else goes through a Logger.
 */
export interface RunLogger {
  log(message: string): void;
}

/**
 * Per-run log file: <outputDir>/mergeres-<startTs>.log
 */
export class Logger implements RunLogger {
  private logPath: string;
  private fd: number | undefined;

  constructor(outputDir: string, startTs: string) {
    fs.mkdirSync(outputDir, { recursive: true });
    this.logPath = path.join(outputDir, `mergeres-${startTs}.log`);
    // Open (create or truncate) the log file immediately
    this.fd = fs.openSync(this.logPath, 'w');
  }

  /** Append a line to the log file immediately (ANSI codes are stripped). */
  log(message: string): void {
    const clean = stripAnsi(message);
    const line =
      clean.trim() === '' || clean.startsWith('─') ? `${clean}\n` : `${timestamp()} ${clean}\n`;
    this.write(line);
  }

  /** Close the log file handle. Call once after all analyses are done. */
  close(): void {
    if (this.fd === undefined) return;
    fs.closeSync(this.fd);
    this.fd = undefined;
  }

  getLogPath(): string {
    return this.logPath;
  }

  private write(text: string): void {
    if (this.fd === undefined) return;
    try {
      fs.writeSync(this.fd, text);
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      // stop logging to a broken file instead of failing the run
      process.stderr.write(`Warning: cannot write log "${this.logPath}": ${msg}\n`);
      this.fd = undefined;
    }
  }
}
