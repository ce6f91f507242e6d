/**
 * scope-diag: crash-point scope diagnostics and a timestamped message log
 * for Node main and worker threads
 */

import { resolveConfig } from './config';
import { ScopeDiagnostics } from './diagnostics';
import type { ScopeFn } from './diagnostics';
import { MessageLog } from './log';
import type { EntryOptions, LogEntry } from './log';
import type { LogOptions } from './types';

export { ScopeDiagnostics, ScopeLogger } from './diagnostics';
export type { DiagnosticsOptions, ScopeFn, ScopeWriter } from './diagnostics';
export { MessageLog, LogEntry } from './log';
export type { EntryOptions, MessageLogOptions } from './log';
export { RotatingFileSink, ConsoleSink } from './sinks';
export type { LineSink } from './sinks';
export { detectCrash, parseOpenCount, readLastLine } from './crash';
export { captureCallSite, parseCallSite } from './callsite';
export type { CallSite } from './callsite';
export { CRASH_MARKER, createConsoleFormatter, formatDateTime, formatScopeLine } from './format';
export type { ColorMode } from './format';
export { resolveConfig, parseToggle } from './config';
export type {
  ConsoleFormatter,
  LogOptions,
  OpenResult,
  ResolvedLogConfig,
  ScopePhase,
  ScopeRecord,
  SharedChannel,
  Sink,
} from './types';

/* ---------------------------- Process defaults ----------------------------- */

let options: LogOptions = {};
let diagnostics: ScopeDiagnostics | undefined;
let messageLog: MessageLog | undefined;

/**
 * Set process-wide options (paths, file/console switches, thresholds).
 * Takes effect for channels not created yet; call it before the first log or scope.
 */
export function configure(next: LogOptions): void {
  options = { ...options, ...next };
}

/** The process-wide diagnostics channel, created on first use. */
export function getDiagnostics(): ScopeDiagnostics {
  if (!diagnostics) {
    const config = resolveConfig(options);
    diagnostics = new ScopeDiagnostics({ filePath: config.diagnosticsFile, maxBytes: config.diagnosticsMaxBytes });
  }
  return diagnostics;
}

/** The process-wide message log, created on first use. */
export function getMessageLog(): MessageLog {
  if (!messageLog) messageLog = new MessageLog(options);
  return messageLog;
}

/** `withScope` on the process-wide diagnostics channel. */
export function scope<T>(label: string, source: string, fn: ScopeFn<T>): T;
export function scope<T>(label: string, name: string, source: string, fn: ScopeFn<T>): T;
export function scope<T>(label: string, ...rest: [string, ScopeFn<T>] | [string, string, ScopeFn<T>]): T {
  const diag = getDiagnostics();
  return rest.length === 2 ? diag.withScope(label, rest[0], rest[1]) : diag.withScope(label, rest[0], rest[1], rest[2]);
}

/** Scope named after the calling function, on the process-wide diagnostics channel. */
export function trace<T>(fn: ScopeFn<T>, name?: string): T {
  return getDiagnostics().traceAt(1, fn, name);
}

/** One message on the process-wide message log. */
export function log(...values: unknown[]): void {
  getMessageLog().write(...values);
}

/** Entry builder on the process-wide message log. */
export function logEntry(opts?: EntryOptions): LogEntry {
  return getMessageLog().entry(opts);
}

/**
 * Close both process-wide files, e.g. at normal shutdown.
 * Independent of object lifetimes; later writes reopen the files.
 */
export function terminate(): void {
  diagnostics?.terminate();
  messageLog?.terminate();
}

export default {
  configure,
  scope,
  trace,
  log,
  terminate,
};
