import { describe, expect, it } from 'vitest';

import { ANONYMOUS, captureCallSite, parseCallSite } from './callsite';

const STACK = [
  'Error',
  '    at captureCallSite (/app/src/callsite.ts:40:19)',
  '    at async loadUser (/app/src/users.ts:12:7)',
  '    at new Repository (/app/src/repo.ts:5:3)',
  '    at Object.<anonymous> (file:///app/src/main.js:3:1)',
  '    at /app/src/boot.ts:9:14',
  '    at Array.map (<anonymous>)',
].join('\n');

describe('parseCallSite', () => {
  it('reads named frames', () => {
    expect(parseCallSite(STACK, 1)).toEqual({ func: 'loadUser', file: '/app/src/users.ts', line: 12 });
    expect(parseCallSite(STACK, 2)).toEqual({ func: 'Repository', file: '/app/src/repo.ts', line: 5 });
  });

  it('converts file URLs and anonymous names', () => {
    expect(parseCallSite(STACK, 3)).toEqual({ func: ANONYMOUS, file: '/app/src/main.js', line: 3 });
    expect(parseCallSite(STACK, 4)).toEqual({ func: ANONYMOUS, file: '/app/src/boot.ts', line: 9 });
  });

  it('returns undefined for frames without a position', () => {
    expect(parseCallSite(STACK, 5)).toBeUndefined();
    expect(parseCallSite(STACK, 6)).toBeUndefined();
  });
});

describe('captureCallSite', () => {
  it('finds the calling function', () => {
    function whereAmI() {
      return captureCallSite();
    }
    expect(whereAmI()?.func).toBe('whereAmI');
  });
});
