import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { defaultStateFile, hostLabel, loadConfig } from '../src/config.js';
import { DEFAULT_TTLS } from '../src/engine/scan-cache.js';
import { StateError } from '../src/types/errors.js';

const HOME = '/home/tester';

function captureStateError(fn: () => unknown): StateError {
  try {
    fn();
  } catch (err) {
    if (err instanceof StateError) return err;
    throw err;
  }
  throw new Error('expected a StateError');
}

describe('loadConfig', () => {
  it('環境変数が無ければ既定値', () => {
    const config = loadConfig({}, HOME);
    expect(config).toEqual({
      stateFile: path.join(HOME, '.localhost-state.json'),
      host: 'localhost',
      romRoot: '$HOME/RetroPie/roms',
      categories: ['system', 'hardware', 'network', 'software', 'services', 'gaming'],
      ttls: DEFAULT_TTLS,
      scanTimeoutMs: 30_000,
      lockTimeoutMs: 5_000,
      staleLockMs: 60_000,
      logLevel: 'info',
    });
  });

  it('SSH ターゲットのホスト部分から状態ファイル名を決める', () => {
    const config = loadConfig({ HOSTSTATE_SSH_TARGET: 'pi@retropie.local' }, HOME);
    expect(config.host).toBe('retropie.local');
    expect(config.sshTarget).toBe('pi@retropie.local');
    expect(config.stateFile).toBe(path.join(HOME, '.retropie.local-state.json'));
  });

  it('TTL は秒で指定する', () => {
    const config = loadConfig({ HOSTSTATE_TTL_SYSTEM: '5', HOSTSTATE_TTL_GAMING: '0' }, HOME);
    expect(config.ttls.system).toBe(5_000);
    expect(config.ttls.gaming).toBe(0);
    expect(config.ttls.network).toBe(DEFAULT_TTLS.network);
  });

  it('カテゴリの絞り込みと重複除去', () => {
    const config = loadConfig({ HOSTSTATE_CATEGORIES: 'system, gaming,system' }, HOME);
    expect(config.categories).toEqual(['system', 'gaming']);
  });

  it('未知のカテゴリは INVALID_CONFIG', () => {
    const err = captureStateError(() => loadConfig({ HOSTSTATE_CATEGORIES: 'system,gpu' }, HOME));
    expect(err.code).toBe('INVALID_CONFIG');
  });

  it('不正な値は INVALID_CONFIG', () => {
    expect(captureStateError(() => loadConfig({ HOSTSTATE_SCAN_TIMEOUT_MS: 'soon' }, HOME)).code).toBe(
      'INVALID_CONFIG',
    );
    expect(captureStateError(() => loadConfig({ HOSTSTATE_SSH_TARGET: 'pi@host; reboot' }, HOME)).code).toBe(
      'INVALID_CONFIG',
    );
    expect(captureStateError(() => loadConfig({ HOSTSTATE_LOG_LEVEL: 'loud' }, HOME)).code).toBe(
      'INVALID_CONFIG',
    );
  });

  it('明示した状態ファイルは絶対パスに解決する', () => {
    expect(loadConfig({ HOSTSTATE_STATE_FILE: '/var/lib/hoststate/pi.json' }, HOME).stateFile).toBe(
      '/var/lib/hoststate/pi.json',
    );
  });
});

describe('hostLabel / defaultStateFile', () => {
  it('ファイル名に使えない文字を置き換える', () => {
    expect(hostLabel('my host/1')).toBe('my-host-1');
    expect(hostLabel('..')).toBe('localhost');
    expect(defaultStateFile('pi', HOME)).toBe(path.join(HOME, '.pi-state.json'));
  });
});
