/* ---------------------------------- Sinks ---------------------------------- */

/**
 * Output function signature used for console output and internal error reports.
 * - `msg`: display-ready text.
 * - `data`: optional structured payload (e.g., a normalized error).
 */
export type Sink = (msg: string, data?: unknown) => void;

/**
 * Console formatter for the message log.
 * Receives the raw message plus the line context; returns the text handed to the console sink.
 */
export type ConsoleFormatter = (msg: string, ctx: { timestamp: string; threadId: number }) => string;

/* ------------------------------- Scope records ------------------------------ */

export type ScopePhase = 'start' | 'annotation' | 'end';

/**
 * One line of the diagnostics file, before serialization.
 * Only the formatted line is durable; this object never leaves the process.
 */
export interface ScopeRecord {
    /** Function name, optionally suffixed with a block name (`func:block`). */
    label: string;
    /** Originating file path. */
    source: string;
    phase: ScopePhase;
    /** Annotation text; ignored for start/end. */
    message?: string;
    /** Formatted wall-clock time (`YYYY-MM-DD HH:MM:SS`). */
    timestamp: string;
    /** Scopes alive process-wide when the line was written. */
    openCount: number;
}

/* -------------------------------- Channels --------------------------------- */

/**
 * Everything a worker thread needs to attach to a channel owned by another thread.
 * Post it through `workerData`; `SharedArrayBuffer` is shared, not copied.
 */
export interface SharedChannel {
    buffer: SharedArrayBuffer;
    filePath: string;
    maxBytes: number;
}

/** Result of `RotatingFileSink.ensureOpen()`. */
export type OpenResult =
    | 'initialized' // first open for this channel (rotation ran)
    | 'reopened'    // descriptor was closed and has been reopened
    | 'open'        // already open, nothing to do
    | 'failed';     // could not open; writes are dropped

/* ------------------------------- Configuration ------------------------------ */

export type LogOptions = {
    /** Message log path. Env: `LOG_OUTPUT_FILE`. Default: `output.log`. */
    outputFile?: string;

    /** Diagnostics path. Env: `LOG_DIAGNOSTICS_FILE`. Default: `diagnostics.log`. */
    diagnosticsFile?: string;

    /** Write message-log lines to the output file. Env: `LOG_TO_FILE`. Default: true. */
    toFile?: boolean;

    /** Echo message-log lines to the console sink. Env: `LOG_TO_CONSOLE`. Default: true. */
    toConsole?: boolean;

    /** Rotation threshold for the message log, in bytes. Default: 5 MiB. */
    outputMaxBytes?: number;

    /** Rotation threshold for the diagnostics file, in bytes. Default: 2 MiB. */
    diagnosticsMaxBytes?: number;

    /**
     * Optional environment bag used for resolving the options above.
     * Provide in tests; defaults to `process.env`.
     */
    env?: Record<string, string | undefined>;
};

export type ResolvedLogConfig = Required<Omit<LogOptions, 'env'>>;
