import * as fs from 'node:fs';

import { report, nullSink } from './errors';
import type { Sink } from './types';

const CHUNK_BYTES = 64 * 1024;
const NEWLINE = 0x0a;

/**
 * Last non-empty line of a file, without its line terminator.
 * Reads fixed-size chunks backwards from the end, so the file size does not matter.
 * Returns '' when the file is missing, empty or unreadable.
 */
export function readLastLine(path: string, onError: Sink = nullSink): string {
    let fd: number;
    try {
        fd = fs.openSync(path, 'r');
    } catch (err) {
        if (!isMissing(err)) report(onError, `crash check could not read ${path}`, err);
        return '';
    }

    try {
        let pos = fs.fstatSync(fd).size;
        // Bytes after `pos` not yet known to hold a complete non-empty line.
        let tail = Buffer.alloc(0);
        while (pos > 0) {
            const len = Math.min(CHUNK_BYTES, pos);
            pos -= len;
            const chunk = Buffer.alloc(len);
            fs.readSync(fd, chunk, 0, len, pos);
            tail = Buffer.concat([chunk, tail]);

            const line = lastNonEmptyLine(tail, pos === 0);
            if (line !== undefined) return line;

            // Every complete line was blank; only the leading fragment can still grow.
            const firstBreak = tail.indexOf(NEWLINE);
            if (firstBreak >= 0) tail = tail.subarray(0, firstBreak);
        }
        return '';
    } catch (err) {
        report(onError, `crash check could not read ${path}`, err);
        return '';
    } finally {
        try {
            fs.closeSync(fd);
        } catch (err) {
            report(onError, `crash check could not close ${path}`, err);
        }
    }
}

/**
 * Last non-empty line in `buf`. Unless `atStart`, the text before the first
 * line break may be cut off, so it is not a candidate.
 */
function lastNonEmptyLine(buf: Buffer, atStart: boolean): string | undefined {
    const lines = buf.toString('utf8').split('\n');
    const first = atStart ? 0 : 1;
    for (let i = lines.length - 1; i >= first; i--) {
        const line = lines[i];
        if (line === undefined) continue;
        const text = line.endsWith('\r') ? line.slice(0, -1) : line;
        if (text.trim() !== '') return text;
    }
    return undefined;
}

/**
 * Open-scope count trailing a diagnostics line (`... |<count>`).
 * Leading whitespace and trailing garbage after the digits are tolerated.
 * Returns `undefined` when there is no `|` or no integer after the last one.
 */
export function parseOpenCount(line: string): number | undefined {
    const pos = line.lastIndexOf('|');
    if (pos < 0) return undefined;
    const n = Number.parseInt(line.slice(pos + 1), 10);
    return Number.isNaN(n) ? undefined : n;
}

/**
 * Did the run that wrote `path` stop with a scope still open?
 * The crash marker line carries no count, so a file ending in it reads as clean.
 */
export function detectCrash(path: string, onError: Sink = nullSink): boolean {
    const n = parseOpenCount(readLastLine(path, onError));
    return n !== undefined && n > 0;
}

function isMissing(err: unknown): boolean {
    return !!err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT';
}
