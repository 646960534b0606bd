import { homedir } from 'node:os';
import { describe, it, expect } from 'vitest';
import { expandPath } from './expand.js';

describe('expandPath', () => {
  it('should expand a leading tilde to the home directory', () => {
    expect(expandPath('~/notes.txt', {})).toBe(`${homedir()}/notes.txt`);
    expect(expandPath('~', {})).toBe(homedir());
  });

  it('should leave a tilde that is not leading alone', () => {
    expect(expandPath('/data/~backup', {})).toBe('/data/~backup');
  });

  it('should expand bare and braced variables', () => {
    const env = { DATA: '/srv/data', USER_DIR: 'alice' };
    expect(expandPath('$DATA/${USER_DIR}/a.txt', env)).toBe('/srv/data/alice/a.txt');
  });

  it('should keep unknown variables as written', () => {
    expect(expandPath('$MISSING/a.txt', {})).toBe('$MISSING/a.txt');
  });
});
