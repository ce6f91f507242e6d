import type { ConsoleFormatter, ScopeRecord } from './types';

/* ---------------------------------- Types ---------------------------------- */

export type ColorMode = 'auto' | 'on' | 'off';

/** Sentinel written once when the previous run ended with a scope still open. */
export const CRASH_MARKER = '## CRASH POINT ##';

export const START_TEXT = 'start...';
export const END_TEXT = 'end!';

const CSI = '\x1b[';
const colors = {
    dim:  (s: string) => `${CSI}2m${s}${CSI}22m`,
};

/* ------------------------------- Timestamps -------------------------------- */

const pad2 = (n: number) => (n < 10 ? `0${n}` : String(n));

/** Local wall-clock time at second resolution: `YYYY-MM-DD HH:MM:SS`. */
export function formatDateTime(ms: number): string {
    const d = new Date(ms);
    return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} `
        + `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

/* ------------------------------- Line formats ------------------------------ */

/** `[ts] <label>:<phase-or-message> <source> |<count>` */
export function formatScopeLine(r: ScopeRecord): string {
    const text = r.phase === 'start' ? START_TEXT : r.phase === 'end' ? END_TEXT : (r.message ?? '');
    return `[${r.timestamp}] ${r.label}:${text} ${r.source} |${r.openCount}`;
}

/** `[ts] tid=<id> "<msg>"` */
export function formatMessageLine(timestamp: string, threadId: number, msg: string): string {
    return `[${timestamp}] tid=${threadId} "${msg}"`;
}

/* ------------------------------- Formatters -------------------------------- */

/**
 * Console formatter that prefixes the message with its timestamp and thread tag.
 * Color is auto by default: on for a TTY outside production.
 */
export function createConsoleFormatter(color: ColorMode = 'auto'): ConsoleFormatter {
    const nodeEnv = typeof process !== 'undefined' ? process.env.NODE_ENV : undefined;
    const isTTY = typeof process !== 'undefined' && !!process.stdout?.isTTY;
    const useColor = color === 'on' || (color === 'auto' && isTTY && nodeEnv !== 'production');

    return (msg, ctx) => {
        const prefix = `[${ctx.timestamp}] tid=${ctx.threadId}`;
        return `${useColor ? colors.dim(prefix) : prefix} ${msg}`;
    };
}

/* ----------------------------- Format helpers ------------------------------ */

/** Render one appended value the way it should read inside a message line. */
export function formatValue(v: unknown): string {
    if (typeof v === 'string') return v;
    if (v instanceof Error) return v.message;
    if (v === null || typeof v !== 'object') return String(v);
    return safeJson(v);
}

export function safeJson(data: unknown): string {
    const seen = new WeakSet<object>();
    try {
        return JSON.stringify(data, (_k, v: unknown) => {
            if (typeof v === 'bigint') return v.toString();
            if (v && typeof v === 'object') {
                if (seen.has(v)) return '[Circular]';
                seen.add(v);
            }
            return v;
        });
    } catch {
        try { return String(data); } catch { return '[Unserializable]'; }
    }
}
