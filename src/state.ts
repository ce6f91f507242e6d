import type { SharedChannel } from './types';

/* --------------------------------- Layout ---------------------------------- */

const LOCK = 0;
const INITIALIZED = 1;
const FD = 2;
const COUNT = 3;
const CRASH = 4;
const MARKED = 5;
const CELLS = 6;

const UNLOCKED = 0;
const LOCKED = 1;

export enum CrashVerdict {
    UNCHECKED = 0,
    CLEAN = 1,
    CRASHED = 2,
}

/* ---------------------------------- Mutex ---------------------------------- */

/**
 * Blocking mutex over one cell of a shared Int32Array.
 * Works across worker threads that see the same SharedArrayBuffer.
 * Not re-entrant: `fn` must not call `withLock` on the same mutex.
 */
export class Mutex {
    constructor(private readonly cells: Int32Array, private readonly index: number = LOCK) {}

    withLock<T>(fn: () => T): T {
        this.lock();
        try {
            return fn();
        } finally {
            this.unlock();
        }
    }

    private lock(): void {
        while (Atomics.compareExchange(this.cells, this.index, UNLOCKED, LOCKED) !== UNLOCKED) {
            Atomics.wait(this.cells, this.index, LOCKED);
        }
    }

    private unlock(): void {
        Atomics.store(this.cells, this.index, UNLOCKED);
        Atomics.notify(this.cells, this.index, 1);
    }
}

/* ------------------------------ Channel state ------------------------------ */

/**
 * Process-wide state of one logging channel: lock, one-time-init flag,
 * file descriptor, open-scope counter, cached crash verdict and marker flag.
 * The message log only uses the first three.
 * Backed by a SharedArrayBuffer so that worker threads can attach to it.
 */
export class ChannelState {
    readonly buffer: SharedArrayBuffer;
    readonly mutex: Mutex;
    private readonly cells: Int32Array;

    constructor(buffer?: SharedArrayBuffer) {
        const fresh = !buffer;
        this.buffer = buffer ?? new SharedArrayBuffer(CELLS * Int32Array.BYTES_PER_ELEMENT);
        this.cells = new Int32Array(this.buffer);
        this.mutex = new Mutex(this.cells, LOCK);
        if (fresh) Atomics.store(this.cells, FD, -1);
    }

    get initialized(): boolean { return Atomics.load(this.cells, INITIALIZED) === 1; }
    set initialized(v: boolean) { Atomics.store(this.cells, INITIALIZED, v ? 1 : 0); }

    /** Open file descriptor, or -1 when closed. Descriptors are valid on every thread of the process. */
    get fd(): number { return Atomics.load(this.cells, FD); }
    set fd(v: number) { Atomics.store(this.cells, FD, v); }

    get count(): number { return Atomics.load(this.cells, COUNT); }

    get crash(): CrashVerdict {
        const v = Atomics.load(this.cells, CRASH);
        return v === CrashVerdict.CRASHED ? CrashVerdict.CRASHED : v === CrashVerdict.CLEAN ? CrashVerdict.CLEAN : CrashVerdict.UNCHECKED;
    }
    set crash(v: CrashVerdict) { Atomics.store(this.cells, CRASH, v); }

    /** Crash marker already written for this process. */
    get marked(): boolean { return Atomics.load(this.cells, MARKED) === 1; }
    set marked(v: boolean) { Atomics.store(this.cells, MARKED, v ? 1 : 0); }

    /** Returns the new count. */
    increment(): number {
        return Atomics.add(this.cells, COUNT, 1) + 1;
    }

    /** Returns the new count; never goes below zero. */
    decrement(): number {
        for (;;) {
            const cur = Atomics.load(this.cells, COUNT);
            if (cur <= 0) return 0;
            if (Atomics.compareExchange(this.cells, COUNT, cur, cur - 1) === cur) return cur - 1;
        }
    }

    share(filePath: string, maxBytes: number): SharedChannel {
        return { buffer: this.buffer, filePath, maxBytes };
    }
}
