import { describe, it, expect } from 'vitest';
import { getPath, joinPath, parsePath, setPath } from '../../src/engine/field-path.js';
import { ValidationError } from '../../src/types/errors.js';

function captureError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('expected a ValidationError');
}

// =========================================================
// parsePath
// =========================================================

describe('parsePath', () => {
  it('ドット区切りでセグメントに分割する', () => {
    expect(parsePath('system.hostname')).toEqual(['system', 'hostname']);
    expect(parsePath('software.packages.2')).toEqual(['software', 'packages', '2']);
  });

  it('空文字列は INVALID_PATH', () => {
    expect(captureError(() => parsePath('')).code).toBe('INVALID_PATH');
  });

  it('空セグメントは INVALID_PATH', () => {
    const err = captureError(() => parsePath('system..hostname'));
    expect(err.code).toBe('INVALID_PATH');
    expect(err.message).toBe('Invalid path "system..hostname": empty segment');
  });

  it('許可されていない文字は INVALID_PATH', () => {
    expect(captureError(() => parsePath('system.host name')).code).toBe('INVALID_PATH');
    expect(captureError(() => parsePath('a/b')).code).toBe('INVALID_PATH');
  });
});

describe('joinPath', () => {
  it('ベースが空ならセグメントのみ', () => {
    expect(joinPath('', 'system')).toBe('system');
    expect(joinPath('software.packages', 0)).toBe('software.packages.0');
  });
});

// =========================================================
// getPath
// =========================================================

describe('getPath', () => {
  const root = { system: { hostname: 'pi', load: [0.1, 0.2] }, notes: [] };

  it('map と list をたどる', () => {
    expect(getPath(root, 'system.hostname')).toEqual({ found: true, value: 'pi' });
    expect(getPath(root, 'system.load.1')).toEqual({ found: true, value: 0.2 });
  });

  it('存在しないキーや範囲外インデックスは found: false', () => {
    expect(getPath(root, 'system.missing')).toEqual({ found: false });
    expect(getPath(root, 'system.load.5')).toEqual({ found: false });
    expect(getPath(root, 'system.hostname.length')).toEqual({ found: false });
  });

  it('先頭ゼロ付きのインデックスは一致しない', () => {
    expect(getPath(root, 'system.load.01')).toEqual({ found: false });
  });
});

// =========================================================
// setPath
// =========================================================

describe('setPath', () => {
  it('既存キーを置き換え、入力は変更しない', () => {
    const root = { system: { hostname: 'pi' } };
    const next = setPath(root, 'system.hostname', 'pi2');
    expect(next).toEqual({ system: { hostname: 'pi2' } });
    expect(root).toEqual({ system: { hostname: 'pi' } });
  });

  it('途中の map が無ければ作成する', () => {
    expect(setPath({}, 'a.b.c', 1)).toEqual({ a: { b: { c: 1 } } });
  });

  it('スカラーを通り抜けようとすると INVALID_PATH', () => {
    const err = captureError(() => setPath({ a: { b: 5 } }, 'a.b.c', 1));
    expect(err.code).toBe('INVALID_PATH');
    expect(err.message).toBe('Cannot set "a.b.c": "a.b" holds a number value');
    expect(err.details).toEqual({ path: 'a.b.c', at: 'a.b', kind: 'number' });
  });

  it('null も通り抜けられない', () => {
    expect(captureError(() => setPath({ a: null }, 'a.b', 1)).details['kind']).toBe('null');
  });

  it('list の要素を置き換え、末尾に追加できる', () => {
    expect(setPath({ l: [1, 2] }, 'l.0', 9)).toEqual({ l: [9, 2] });
    expect(setPath({ l: [1, 2] }, 'l.2', 3)).toEqual({ l: [1, 2, 3] });
  });

  it('list の長さを超える位置は INVALID_PATH', () => {
    expect(captureError(() => setPath({ l: [1] }, 'l.3', 0)).code).toBe('INVALID_PATH');
    expect(captureError(() => setPath({ l: [1] }, 'l.x', 0)).code).toBe('INVALID_PATH');
  });
});
