import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { expandPath, loadConfig, parseCliArgs } from './config';

describe('parseCliArgs', () => {
  it('reads flags with separate and inline values', () => {
    expect(parseCliArgs(['--port=8080', '--host', 'localhost', '--data-dir', '~/reading'])).toEqual({
      port: 8080,
      host: 'localhost',
      dataDir: '~/reading',
    });
  });

  it('drops an unparseable port', () => {
    expect(parseCliArgs(['--port', 'abc']).port).toBeUndefined();
  });

  it('ignores unknown flags', () => {
    expect(parseCliArgs(['--verbose', '--corpus-dir', '/srv/bibles'])).toEqual({ corpusDir: '/srv/bibles' });
  });
});

describe('expandPath', () => {
  it('expands a leading ~/', () => {
    expect(expandPath('~/notes')).toBe(path.join(os.homedir(), 'notes'));
    expect(expandPath('/abs/~/notes')).toBe('/abs/~/notes');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'versepace-config-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lets CLI flags override the config file', () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, JSON.stringify({ server: { port: 9000, host: '0.0.0.0' }, storage: { dataDir: dir } }));

    const config = loadConfig(['--config', file, '--port', '9100']);

    expect(config.server).toEqual({ port: 9100, host: '0.0.0.0' });
    expect(config.storage).toEqual({
      dataDir: dir,
      corpusDir: path.join(dir, 'corpus'),
      settingsPath: path.join(dir, 'settings.json'),
      historyPath: path.join(dir, 'history.json'),
      dbPath: path.join(dir, 'versepace.db'),
    });
  });

  it('falls back to defaults when the config file is malformed', () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, '[1, 2]');
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const config = loadConfig(['--config', file, '--data-dir', dir]);

    expect(error).toHaveBeenCalledOnce();
    expect(config.server).toEqual({ port: 7788, host: '127.0.0.1' });
    expect(config.storage.dataDir).toBe(dir);
  });
});
