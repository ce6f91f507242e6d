import { describe, expect, it } from 'vitest';

import { parseToggle, resolveConfig } from './config';

describe('parseToggle', () => {
  it('accepts common spellings', () => {
    expect(parseToggle(' ON ')).toBe(true);
    expect(parseToggle('yes')).toBe(true);
    expect(parseToggle('0')).toBe(false);
    expect(parseToggle('False')).toBe(false);
    expect(parseToggle('maybe')).toBeUndefined();
    expect(parseToggle(undefined)).toBeUndefined();
  });
});

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveConfig({ env: {} })).toEqual({
      outputFile: 'output.log',
      diagnosticsFile: 'diagnostics.log',
      toFile: true,
      toConsole: true,
      outputMaxBytes: 5 * 1024 * 1024,
      diagnosticsMaxBytes: 2 * 1024 * 1024,
    });
  });

  it('reads the environment', () => {
    const config = resolveConfig({
      env: {
        LOG_OUTPUT_FILE: 'logs/app.log',
        LOG_DIAGNOSTICS_FILE: 'logs/diag.log',
        LOG_TO_FILE: 'off',
        LOG_TO_CONSOLE: 'nonsense',
      },
    });
    expect(config.outputFile).toBe('logs/app.log');
    expect(config.diagnosticsFile).toBe('logs/diag.log');
    expect(config.toFile).toBe(false);
    expect(config.toConsole).toBe(true);
  });

  it('prefers explicit options', () => {
    const config = resolveConfig({
      outputFile: 'explicit.log',
      toConsole: false,
      env: { LOG_OUTPUT_FILE: 'env.log', LOG_TO_CONSOLE: '1' },
    });
    expect(config.outputFile).toBe('explicit.log');
    expect(config.toConsole).toBe(false);
  });

  it('ignores blank paths', () => {
    expect(resolveConfig({ env: { LOG_DIAGNOSTICS_FILE: '  ' } }).diagnosticsFile).toBe('diagnostics.log');
  });
});
