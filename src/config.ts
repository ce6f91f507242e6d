import type { LogOptions, ResolvedLogConfig } from './types';

export const DEFAULT_OUTPUT_FILE = 'output.log';
export const DEFAULT_DIAGNOSTICS_FILE = 'diagnostics.log';
export const DEFAULT_OUTPUT_MAX_BYTES = 5 * 1024 * 1024;
export const DEFAULT_DIAGNOSTICS_MAX_BYTES = 2 * 1024 * 1024;

/**
 * Parse an on/off switch from the environment.
 * Accepts `1|true|yes|on` and `0|false|no|off` (case-insensitive).
 * Returns `undefined` if unparsable; callers decide fallback behavior.
 */
export function parseToggle(s?: string): boolean | undefined {
    switch (s?.trim().toLowerCase()) {
        case '1': case 'true': case 'yes': case 'on': return true;
        case '0': case 'false': case 'no': case 'off': return false;
    }
    return undefined;
}

function nonEmpty(s?: string): string | undefined {
    const v = s?.trim();
    return v ? v : undefined;
}

/**
 * Resolve the process-wide configuration in the following order:
 * 1) Explicit options
 * 2) Environment: `LOG_OUTPUT_FILE`, `LOG_DIAGNOSTICS_FILE`, `LOG_TO_FILE`, `LOG_TO_CONSOLE`
 * 3) Defaults
 */
export function resolveConfig(options?: LogOptions): ResolvedLogConfig {
    const opts = options ?? {};
    const env = opts.env ?? (typeof process !== 'undefined' ? process.env : undefined);

    return {
        outputFile: opts.outputFile ?? nonEmpty(env?.LOG_OUTPUT_FILE) ?? DEFAULT_OUTPUT_FILE,
        diagnosticsFile: opts.diagnosticsFile ?? nonEmpty(env?.LOG_DIAGNOSTICS_FILE) ?? DEFAULT_DIAGNOSTICS_FILE,
        toFile: opts.toFile ?? parseToggle(env?.LOG_TO_FILE) ?? true,
        toConsole: opts.toConsole ?? parseToggle(env?.LOG_TO_CONSOLE) ?? true,
        outputMaxBytes: opts.outputMaxBytes ?? DEFAULT_OUTPUT_MAX_BYTES,
        diagnosticsMaxBytes: opts.diagnosticsMaxBytes ?? DEFAULT_DIAGNOSTICS_MAX_BYTES,
    };
}
