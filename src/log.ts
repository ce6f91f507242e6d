import { threadId } from 'node:worker_threads';

import { resolveConfig } from './config';
import { nullSink, report, ReportQueue } from './errors';
import { formatDateTime, formatMessageLine, formatValue } from './format';
import { ConsoleSink, RotatingFileSink } from './sinks';
import { ChannelState } from './state';
import type { ConsoleFormatter, LogOptions, SharedChannel, Sink } from './types';

export type MessageLogOptions = LogOptions & {
  /** Console output. Default: console.info */
  console?: Sink;
  /** Applied to console output only; the file line format is fixed. */
  consoleFormatter?: ConsoleFormatter;
  /** Attach to a message log owned by another thread (see `share()`). */
  shared?: SharedChannel;
  /** Receives internal I/O failures. Default: drop them. */
  onError?: Sink;
  /** Clock source for testing. Default: () => Date.now() */
  now?: () => number;
};

export type EntryOptions = {
  toFile?: boolean;
  toConsole?: boolean;
};

/**
 * General-purpose message log: one `[ts] tid=<thread> "<message>"` line per entry,
 * to the output file and/or the console.
 */
export class MessageLog {
  readonly filePath: string;
  readonly toFile: boolean;
  readonly toConsole: boolean;
  private readonly maxBytes: number;
  private readonly state: ChannelState;
  private readonly sink: RotatingFileSink;
  private readonly console: ConsoleSink;
  private readonly reports: ReportQueue;
  private readonly now: () => number;

  constructor(options: MessageLogOptions = {}) {
    const config = resolveConfig(options);
    this.filePath = options.shared?.filePath ?? config.outputFile;
    this.maxBytes = options.shared?.maxBytes ?? config.outputMaxBytes;
    this.toFile = config.toFile;
    this.toConsole = config.toConsole;
    this.state = new ChannelState(options.shared?.buffer);
    this.reports = new ReportQueue(options.onError ?? nullSink);
    this.now = options.now ?? (() => Date.now());
    this.sink = new RotatingFileSink(this.filePath, this.maxBytes, this.state, this.reports.sink);
    this.console = new ConsoleSink(options.console, options.consoleFormatter);
  }

  /**
   * Start a new entry. Per-entry switches override the log-wide defaults
   * (`entry({ toFile: false })` keeps a message off the file).
   */
  entry(opts?: EntryOptions): LogEntry {
    return new LogEntry(this, opts?.toFile ?? this.toFile, opts?.toConsole ?? this.toConsole);
  }

  /** Shorthand: one entry with `values`, committed immediately. */
  write(...values: unknown[]): void {
    this.entry().add(...values).commit();
  }

  /**
   * Emit one finished message.
   * Only the file write runs under the channel lock; the console sink and the
   * error sink are called after it is released and may log to this channel.
   */
  emit(msg: string, toFile: boolean, toConsole: boolean): void {
    try {
      const timestamp = formatDateTime(this.now());
      if (toFile) {
        this.state.mutex.withLock(() => {
          this.sink.ensureOpen();
          this.sink.write(formatMessageLine(timestamp, threadId, msg));
        });
      }
      if (toConsole) this.console.write(msg, { timestamp, threadId });
    } catch (err) {
      report(this.reports.sink, 'message log write failed', err);
    } finally {
      this.reports.flush();
    }
  }

  /** Handle for worker threads: `new MessageLog({ shared })`. */
  share(): SharedChannel {
    return this.state.share(this.filePath, this.maxBytes);
  }

  /** Close the output file now. A later entry reopens it in append mode. */
  terminate(): void {
    try {
      this.state.mutex.withLock(() => this.sink.close());
    } catch (err) {
      report(this.reports.sink, 'message log close failed', err);
    } finally {
      this.reports.flush();
    }
  }
}

/**
 * Builder for one message. Values are joined with a space unless
 * `nospace()` is active; `space()` turns separation back on.
 */
export class LogEntry {
  private parts = '';
  private hasLog = false;
  private noSpace = false;

  constructor(
    private readonly log: MessageLog,
    private readonly toFile: boolean,
    private readonly toConsole: boolean,
  ) {}

  add(...values: unknown[]): this {
    for (const v of values) {
      if (this.hasLog && !this.noSpace) this.parts += ' ';
      this.parts += formatValue(v);
      this.hasLog = true;
    }
    return this;
  }

  nospace(): this {
    this.noSpace = true;
    return this;
  }

  space(): this {
    this.noSpace = false;
    return this;
  }

  /** Write the accumulated message and reset. Nothing is written for an empty entry. */
  commit(): void {
    if (!this.hasLog) return;
    const msg = this.parts;
    this.parts = '';
    this.hasLog = false;
    this.log.emit(msg, this.toFile, this.toConsole);
  }
}
