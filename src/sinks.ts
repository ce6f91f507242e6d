import * as fs from 'node:fs';

import { report } from './errors';
import type { ChannelState } from './state';
import type { ConsoleFormatter, OpenResult, Sink } from './types';

/**
 * Line-oriented output destination
 */
export interface LineSink {
  write(line: string): void;
}

/**
 * Append-only file owned by one channel.
 * Rotates once per process at first open when the file is larger than `maxBytes`:
 * `<path>` becomes `<path>.old`, replacing any previous backup.
 *
 * The sink does no locking; callers hold the channel mutex around
 * `ensureOpen()`, `write()` and `close()`.
 */
export class RotatingFileSink implements LineSink {
  readonly path: string;
  readonly backupPath: string;
  private readonly maxBytes: number;
  private readonly state: ChannelState;
  private readonly onError: Sink;

  constructor(path: string, maxBytes: number, state: ChannelState, onError: Sink) {
    this.path = path;
    this.backupPath = `${path}.old`;
    this.maxBytes = maxBytes;
    this.state = state;
    this.onError = onError;
  }

  get isOpen(): boolean {
    return this.state.fd >= 0;
  }

  ensureOpen(): OpenResult {
    if (!this.state.initialized) {
      this.rotateIfTooLarge();
      // Marked even on failure: rotation is decided once per process.
      this.state.initialized = true;
      return this.open() ? 'initialized' : 'failed';
    }
    if (this.isOpen) return 'open';
    return this.open() ? 'reopened' : 'failed';
  }

  /**
   * Append one line. Dropped when the file is not open.
   */
  write(line: string): void {
    const fd = this.state.fd;
    if (fd < 0) return;
    try {
      fs.writeSync(fd, line + '\n');
    } catch (err) {
      report(this.onError, `write failed: ${this.path}`, err);
    }
  }

  close(): void {
    const fd = this.state.fd;
    if (fd < 0) return;
    this.state.fd = -1;
    try {
      fs.closeSync(fd);
    } catch (err) {
      report(this.onError, `close failed: ${this.path}`, err);
    }
  }

  private open(): boolean {
    try {
      this.state.fd = fs.openSync(this.path, 'a');
      return true;
    } catch (err) {
      report(this.onError, `open failed: ${this.path}`, err);
      return false;
    }
  }

  private rotateIfTooLarge(): void {
    let size: number;
    try {
      size = fs.statSync(this.path).size;
    } catch {
      return; // nothing to rotate yet
    }
    if (size <= this.maxBytes) return;

    try {
      fs.rmSync(this.backupPath, { force: true });
      fs.renameSync(this.path, this.backupPath);
    } catch (err) {
      report(this.onError, `rotation failed: ${this.path}`, err);
    }
  }
}

/**
 * Console sink for message-log lines.
 * Passes the raw message through `formatter` when one is set.
 */
export class ConsoleSink {
  private readonly out: Sink;
  private readonly formatter?: ConsoleFormatter;

  constructor(out?: Sink, formatter?: ConsoleFormatter) {
    this.out = out ?? ((msg) => console.info(msg));
    this.formatter = formatter;
  }

  write(msg: string, ctx: { timestamp: string; threadId: number }): void {
    this.out(this.formatter ? this.formatter(msg, ctx) : msg);
  }
}
