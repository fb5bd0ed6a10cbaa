import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { openTaskStore } from '../../src/store/open-store.js';
import { CorruptDataError } from '../../src/errors.js';

let tmpDir: string;
let dataFile: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'dolist-open-test-'));
  dataFile = join(tmpDir, 'tasks.json');
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('openTaskStore', () => {
  it('starts empty on first run', () => {
    const { store, recovery } = openTaskStore({ dataFile, onCorrupt: 'fail' });
    expect(store.size).toBe(0);
    expect(recovery).toBeNull();
  });

  it('creates the file on the first mutation', () => {
    const nested = join(tmpDir, 'a', 'b', 'tasks.json');
    const { store } = openTaskStore({ dataFile: nested, onCorrupt: 'fail' });
    store.add({ title: 'First' });
    expect(JSON.parse(readFileSync(nested, 'utf8'))).toHaveLength(1);
  });

  it('fails on a corrupt file under the fail policy', () => {
    writeFileSync(dataFile, '[{"id": "one"}');
    expect(() => openTaskStore({ dataFile, onCorrupt: 'fail' })).toThrow(CorruptDataError);
    expect(readFileSync(dataFile, 'utf8')).toBe('[{"id": "one"}');
  });

  it('moves a corrupt file aside under the start-empty policy', () => {
    writeFileSync(dataFile, 'garbage');
    const now = new Date(2026, 0, 2, 3, 4, 5);
    const { store, recovery } = openTaskStore({ dataFile, onCorrupt: 'start-empty' }, { now: () => now });

    expect(store.size).toBe(0);
    expect(recovery?.quarantinedTo).toBe(`${dataFile}.corrupt-2026-01-02T03-04-05`);
    expect(recovery?.reason).toContain('invalid JSON');
    expect(readFileSync(`${dataFile}.corrupt-2026-01-02T03-04-05`, 'utf8')).toBe('garbage');
  });

  it('treats an unreadable path as corrupt', () => {
    mkdirSync(join(tmpDir, 'dir.json'));
    expect(() => openTaskStore({ dataFile: join(tmpDir, 'dir.json'), onCorrupt: 'fail' })).toThrow(CorruptDataError);
  });
});
