import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { getDefaultDataPath, resolveConfig, parseCorruptDataPolicy } from '../src/config.js';
import { ValidationError } from '../src/errors.js';

describe('getDefaultDataPath', () => {
  it('uses XDG_DATA_HOME on linux', () => {
    expect(getDefaultDataPath('linux', { XDG_DATA_HOME: '/data' })).toBe(join('/data', 'dolist', 'tasks.json'));
  });

  it('falls back to ~/.local/share on linux', () => {
    expect(getDefaultDataPath('linux', {})).toBe(join(homedir(), '.local', 'share', 'dolist', 'tasks.json'));
  });

  it('uses Application Support on macOS', () => {
    expect(getDefaultDataPath('darwin', {})).toBe(join(homedir(), 'Library', 'Application Support', 'dolist', 'tasks.json'));
  });

  it('uses APPDATA on windows', () => {
    expect(getDefaultDataPath('win32', { APPDATA: '/appdata' })).toBe(join('/appdata', 'dolist', 'tasks.json'));
  });
});

describe('parseCorruptDataPolicy', () => {
  it('accepts known policies', () => {
    expect(parseCorruptDataPolicy('fail')).toBe('fail');
    expect(parseCorruptDataPolicy('Start-Empty')).toBe('start-empty');
    expect(parseCorruptDataPolicy('empty')).toBe('start-empty');
  });

  it('rejects anything else', () => {
    expect(() => parseCorruptDataPolicy('ignore')).toThrow(ValidationError);
  });
});

describe('resolveConfig', () => {
  it('prefers explicit options over the environment', () => {
    const config = resolveConfig(
      { dataFile: '/tmp/explicit.json', onCorrupt: 'start-empty' },
      { DOLIST_DATA_FILE: '/tmp/env.json', DOLIST_ON_CORRUPT: 'fail' },
    );
    expect(config).toEqual({ dataFile: '/tmp/explicit.json', onCorrupt: 'start-empty' });
  });

  it('reads the environment', () => {
    const config = resolveConfig({}, { DOLIST_DATA_FILE: '/tmp/env.json', DOLIST_ON_CORRUPT: 'start-empty' });
    expect(config).toEqual({ dataFile: '/tmp/env.json', onCorrupt: 'start-empty' });
  });

  it('defaults to failing on corrupt data', () => {
    expect(resolveConfig({}, { XDG_DATA_HOME: '/data' }).onCorrupt).toBe('fail');
  });
});
