import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { loadConfig, resolveDataFile } from '../src/config/loader.js';

let tempDir: string;
let originalHome: string | undefined;

beforeEach(() => {
  originalHome = process.env.HOME;
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tdui-config-'));
  process.env.HOME = tempDir;
});

afterEach(() => {
  process.env.HOME = originalHome;
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function writeGlobalConfig(content: string): void {
  const dir = path.join(tempDir, '.config', 'tdui');
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, 'config.json'), content, 'utf-8');
}

describe('loadConfig', () => {
  it('returns defaults when no config exists', () => {
    expect(loadConfig()).toEqual({});
  });

  it('reads the global config from the home directory', () => {
    writeGlobalConfig(JSON.stringify({ dataFile: '/tmp/tasks.json', interactive: { weekStart: 'monday' } }));
    const config = loadConfig();
    expect(config.dataFile).toBe('/tmp/tasks.json');
    expect(config.interactive?.weekStart).toBe('monday');
  });

  it('prefers an explicit config path', () => {
    writeGlobalConfig(JSON.stringify({ dataFile: 'global.json' }));
    const explicit = path.join(tempDir, 'custom.json');
    fs.writeFileSync(explicit, JSON.stringify({ interactive: { colors: { disable: true } } }), 'utf-8');

    const config = loadConfig(explicit);
    expect(config.dataFile).toBeUndefined();
    expect(config.interactive?.colors?.disable).toBe(true);
  });

  it('rejects invalid JSON with the file path', () => {
    writeGlobalConfig('{ nope');
    const expectedPath = path.join(tempDir, '.config', 'tdui', 'config.json');
    expect(() => loadConfig()).toThrow(`Invalid JSON in config file: ${expectedPath}`);
  });

  it('rejects values outside the schema', () => {
    writeGlobalConfig(JSON.stringify({ interactive: { weekStart: 'friday' } }));
    expect(() => loadConfig()).toThrow();
  });
});

describe('resolveDataFile', () => {
  it('prefers the flag, then the config, then the default', () => {
    expect(resolveDataFile({ dataFile: 'from-config.json' }, 'from-flag.json')).toBe('from-flag.json');
    expect(resolveDataFile({ dataFile: 'from-config.json' })).toBe('from-config.json');
    expect(resolveDataFile({})).toBe(path.join(tempDir, '.local', 'share', 'tdui', 'todos.json'));
  });
});
