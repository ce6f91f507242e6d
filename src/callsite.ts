import { fileURLToPath } from 'node:url';

export interface CallSite {
    func: string;
    file: string;
    line: number;
}

export const ANONYMOUS = '<anonymous>';

// `at fn (file:line:col)`, `at async fn (file:line:col)`, `at file:line:col`
const FRAME = /^\s*at (?:(?:async )?(.+?) \((.+):(\d+):\d+\)|(.+):(\d+):\d+)$/;

/**
 * Pick frame `depth` (0 = first `at` line) out of a V8 stack string.
 * Returns `undefined` for frames without a file position (native, eval).
 */
export function parseCallSite(stack: string, depth: number): CallSite | undefined {
    const frames = stack.split('\n').filter((l) => /^\s*at /.test(l));
    const frame = frames[depth];
    if (frame === undefined) return undefined;

    const m = FRAME.exec(frame);
    if (!m) return undefined;

    const named = m[2] !== undefined;
    const rawFile = named ? m[2] : m[4];
    const rawLine = named ? m[3] : m[5];
    if (rawFile === undefined || rawLine === undefined) return undefined;

    return {
        func: named && m[1] ? cleanName(m[1]) : ANONYMOUS,
        file: toPath(rawFile),
        line: Number(rawLine),
    };
}

/** Call site of the function calling `captureCallSite`, `skip` frames further up. */
export function captureCallSite(skip = 0): CallSite | undefined {
    const stack = new Error().stack;
    // frame 0 is captureCallSite, frame 1 its caller
    return stack ? parseCallSite(stack, skip + 1) : undefined;
}

function cleanName(name: string): string {
    const n = name.replace(/^new /, '').replace(/^Object\./, '');
    return n === '<anonymous>' ? ANONYMOUS : n;
}

function toPath(file: string): string {
    if (!file.startsWith('file://')) return file;
    try {
        return fileURLToPath(file);
    } catch {
        return file.slice('file://'.length);
    }
}
