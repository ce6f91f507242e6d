import type { Sink } from './types';

/* ------------------------------ Error helpers ------------------------------ */

/** Fast-ish error-like detection */
export function isErrorLike(e: unknown): e is Error & Record<string, unknown> {
    return !!e && typeof e === 'object' && 'message' in e;
}

/**
 * Convert a thrown value into a small, JSON-friendly object.
 * - Always includes `name` and `message`.
 * - Keeps the fs error fields worth reading in a report (`code`, `syscall`, `path`).
 */
export function normalizeError(err: unknown): Record<string, unknown> {
    if (!isErrorLike(err)) return { name: 'Error', message: String(err) };

    const out: Record<string, unknown> = { name: err.name || 'Error', message: err.message };
    for (const k of ['code', 'syscall', 'path'] as const) {
        if (err[k] !== undefined) out[k] = err[k];
    }
    return out;
}

export const nullSink: Sink = () => {};

/**
 * Hand an internal failure to the configured error sink.
 * A throwing sink is not allowed to escape into the host application.
 */
export function report(onError: Sink, msg: string, err: unknown): void {
    try {
        onError(msg, normalizeError(err));
    } catch {
        // the error sink itself failed; nowhere left to report it
        return;
    }
}

/**
 * Holds reports raised while a channel lock is held and delivers them once it is
 * released, so an error sink may write to the channel that failed.
 * The channel mutex is not re-entrant.
 */
export class ReportQueue {
    /** Enqueuing sink to hand to code that runs under the lock. */
    readonly sink: Sink;
    private pending: Array<[msg: string, data: unknown]> = [];
    private readonly target: Sink;

    constructor(target: Sink) {
        this.target = target;
        this.sink = (msg, data) => {
            this.pending.push([msg, data]);
        };
    }

    /** Deliver everything queued so far. Call only with the lock released. */
    flush(): void {
        if (this.pending.length === 0) return;
        const batch = this.pending;
        this.pending = [];
        for (const [msg, data] of batch) {
            try {
                this.target(msg, data);
            } catch {
                // the error sink itself failed; nowhere left to report it
                continue;
            }
        }
    }
}
