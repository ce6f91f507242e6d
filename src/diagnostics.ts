// src/diagnostics.ts
// Scope diagnostics: nested scope entry/exit records with a live open-scope count,
// and crash-point detection from the tail of the previous run's file.
//
// Line format:  [YYYY-MM-DD HH:MM:SS] <label>:<start...|end!|message> <source> |<count>
// Start lines carry the depth including the scope being started; end lines carry
// the depth after the scope closed. A run that stops inside a scope therefore
// leaves a last line with a count > 0.

import { ANONYMOUS, captureCallSite } from './callsite';
import { DEFAULT_DIAGNOSTICS_FILE, DEFAULT_DIAGNOSTICS_MAX_BYTES } from './config';
import { detectCrash } from './crash';
import { nullSink, report, ReportQueue } from './errors';
import { CRASH_MARKER, formatDateTime, formatScopeLine } from './format';
import { RotatingFileSink } from './sinks';
import { ChannelState, CrashVerdict } from './state';
import type { OpenResult, ScopePhase, SharedChannel, Sink } from './types';

/* ---------------------------------- Types ---------------------------------- */

export type DiagnosticsOptions = {
    /** Diagnostics file path. Default: `diagnostics.log`. Ignored when `shared` is set. */
    filePath?: string;

    /** Rotation threshold in bytes. Default: 2 MiB. Ignored when `shared` is set. */
    maxBytes?: number;

    /** Attach to a channel owned by another thread (see `share()`). */
    shared?: SharedChannel;

    /** Receives internal I/O failures. Default: drop them. */
    onError?: Sink;

    /** Clock source for testing. Default: () => Date.now() */
    now?: () => number;
};

/**
 * Low-level record writer behind `ScopeLogger`.
 * `enter` and `exit` move the open-scope count; `annotate` leaves it alone.
 */
export interface ScopeWriter {
    enter(label: string, source: string): void;
    annotate(label: string, source: string, message: string): void;
    exit(label: string, source: string): void;
}

export type ScopeFn<T> = (scope: ScopeLogger) => T;

const UNKNOWN_SOURCE = '<unknown>';

/* ------------------------------- ScopeLogger ------------------------------- */

/**
 * One live scope. Construction writes the start record; `end()` writes the end record.
 * Prefer `ScopeDiagnostics.withScope()`, which ends the scope on every exit path.
 */
export class ScopeLogger {
    readonly label: string;
    readonly source: string;
    private readonly writer: ScopeWriter;
    private ended = false;

    constructor(writer: ScopeWriter, label: string, source: string) {
        this.writer = writer;
        this.label = label;
        this.source = source;
        writer.enter(label, source);
    }

    get isEnded(): boolean {
        return this.ended;
    }

    /** Write a free-text annotation at the current depth. */
    here(message: string): void {
        this.writer.annotate(this.label, this.source, message);
    }

    /** Close the scope. Idempotent. */
    end(): void {
        if (this.ended) return;
        this.ended = true;
        this.writer.exit(this.label, this.source);
    }
}

/* ---------------------------- ScopeDiagnostics ----------------------------- */

/**
 * The diagnostics channel: one file, one counter, one lock.
 * Construct one per process (or attach workers to it with `share()`) and pass it
 * to whatever needs to open scopes.
 */
export class ScopeDiagnostics implements ScopeWriter {
    readonly filePath: string;
    private readonly maxBytes: number;
    private readonly state: ChannelState;
    private readonly sink: RotatingFileSink;
    private readonly reports: ReportQueue;
    private readonly now: () => number;

    constructor(options?: DiagnosticsOptions) {
        const opts = options ?? {};
        this.filePath = opts.shared?.filePath ?? opts.filePath ?? DEFAULT_DIAGNOSTICS_FILE;
        this.maxBytes = opts.shared?.maxBytes ?? opts.maxBytes ?? DEFAULT_DIAGNOSTICS_MAX_BYTES;
        this.state = new ChannelState(opts.shared?.buffer);
        this.reports = new ReportQueue(opts.onError ?? nullSink);
        this.now = opts.now ?? (() => Date.now());
        this.sink = new RotatingFileSink(this.filePath, this.maxBytes, this.state, this.reports.sink);
    }

    /** Scopes currently alive on every thread attached to this channel. */
    get openCount(): number {
        return this.state.count;
    }

    /**
     * Whether the previous run stopped inside a scope.
     * Evaluated once per process against the file as it was before this process touched it.
     */
    get crashedLastTime(): boolean {
        return this.locked(() => this.checkCrash(), false);
    }

    /** Open the file now instead of on the first record. Idempotent. */
    ensureOpen(): OpenResult {
        return this.locked(() => this.openLocked(), 'failed');
    }

    /* --------------------------------- Scopes -------------------------------- */

    open(label: string, source: string): ScopeLogger;
    open(label: string, name: string, source: string): ScopeLogger;
    open(label: string, a: string, b?: string): ScopeLogger {
        return b === undefined
            ? new ScopeLogger(this, label, a)
            : new ScopeLogger(this, `${label}:${a}`, b);
    }

    /**
     * Run `fn` inside a scope and end the scope on every exit path:
     * return, throw, promise fulfilment or rejection.
     */
    withScope<T>(label: string, source: string, fn: ScopeFn<T>): T;
    withScope<T>(label: string, name: string, source: string, fn: ScopeFn<T>): T;
    withScope<T>(label: string, ...rest: [string, ScopeFn<T>] | [string, string, ScopeFn<T>]): T {
        if (rest.length === 2) return runScoped(this.open(label, rest[0]), rest[1]);
        return runScoped(this.open(label, rest[0], rest[1]), rest[2]);
    }

    /**
     * `withScope` labelled with the calling function's name and file.
     * `name` distinguishes sibling scopes within one function (`func:name`).
     */
    trace<T>(fn: ScopeFn<T>, name?: string): T {
        return this.traceAt(1, fn, name);
    }

    /** `trace` for wrappers: `skip` counts the wrapper frames between the traced function and here. */
    traceAt<T>(skip: number, fn: ScopeFn<T>, name?: string): T {
        const site = captureCallSite(skip + 1);
        const func = site?.func ?? ANONYMOUS;
        const label = name === undefined ? func : `${func}:${name}`;
        return runScoped(new ScopeLogger(this, label, site?.file ?? UNKNOWN_SOURCE), fn);
    }

    /* --------------------------------- Writer -------------------------------- */

    enter(label: string, source: string): void {
        this.locked(() => {
            this.openLocked();
            this.writeLocked('start', label, source, this.state.increment());
        }, undefined);
    }

    annotate(label: string, source: string, message: string): void {
        this.locked(() => {
            this.openLocked();
            this.writeLocked('annotation', label, source, this.state.count, message);
        }, undefined);
    }

    exit(label: string, source: string): void {
        this.locked(() => {
            this.openLocked();
            this.writeLocked('end', label, source, this.state.decrement());
        }, undefined);
    }

    /* ------------------------------- Lifecycle ------------------------------- */

    /** Handle for worker threads: `new ScopeDiagnostics({ shared })`. */
    share(): SharedChannel {
        return this.state.share(this.filePath, this.maxBytes);
    }

    /**
     * Close the file now. A later record reopens it in append mode.
     * Counter and crash verdict are untouched.
     */
    terminate(): void {
        this.locked(() => this.sink.close(), undefined);
    }

    /* -------------------------------- Internals ------------------------------ */

    private locked<T>(fn: () => T, fallback: T): T {
        try {
            return this.state.mutex.withLock(fn);
        } catch (err) {
            report(this.reports.sink, 'diagnostics operation failed', err);
            return fallback;
        } finally {
            // With the lock released the error sink may open scopes on this channel.
            this.reports.flush();
        }
    }

    private checkCrash(): boolean {
        if (this.state.crash === CrashVerdict.UNCHECKED) {
            this.state.crash = detectCrash(this.filePath, this.reports.sink) ? CrashVerdict.CRASHED : CrashVerdict.CLEAN;
        }
        return this.state.crash === CrashVerdict.CRASHED;
    }

    private openLocked(): OpenResult {
        // Crash check reads the previous run's file before rotation can move it.
        if (!this.state.initialized) this.checkCrash();

        const result = this.sink.ensureOpen();
        if (result !== 'open' && result !== 'failed' && !this.state.marked && this.checkCrash()) {
            this.sink.write(CRASH_MARKER);
            this.state.marked = true;
        }
        return result;
    }

    private writeLocked(phase: ScopePhase, label: string, source: string, openCount: number, message?: string): void {
        this.sink.write(formatScopeLine({
            label,
            source,
            phase,
            message,
            timestamp: formatDateTime(this.now()),
            openCount,
        }));
    }
}

/* --------------------------------- Helpers --------------------------------- */

function isPromiseLike(v: unknown): v is PromiseLike<unknown> {
    return !!v && (typeof v === 'object' || typeof v === 'function') && 'then' in v && typeof v.then === 'function';
}

function runScoped<T>(scope: ScopeLogger, fn: ScopeFn<T>): T {
    let pending = false;
    try {
        const r = fn(scope);
        if (isPromiseLike(r)) {
            // Registered before the caller can await `r`, so the end record lands first.
            void r.then(() => scope.end(), () => scope.end());
            // Set only once `then` has taken the handlers; if it throws, `finally` ends the scope.
            pending = true;
        }
        return r;
    } finally {
        if (!pending) scope.end();
    }
}
