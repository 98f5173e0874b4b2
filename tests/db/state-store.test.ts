import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { StateStore } from '../../src/db/state-store.js';
import { emptyDocument, setDocumentField, toSerialized } from '../../src/db/document.js';
import { CorruptionError, IoError, SchemaError } from '../../src/types/errors.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('StateStore', () => {
  let dir: string;
  let file: string;
  let store: StateStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hoststate-store-'));
    file = path.join(dir, 'pi-state.json');
    store = new StateStore(file, { lockTimeoutMs: 200 });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  // =========================================================
  // read
  // =========================================================

  it('ファイルが無ければ undefined を返す', async () => {
    expect(await store.read()).toBeUndefined();
    expect(await store.exists()).toBe(false);
  });

  it('write した内容を read で読み戻せる', async () => {
    const doc = setDocumentField(emptyDocument(NOW), 'system.hostname', 'pi', NOW);
    await store.write(doc);
    expect(await store.read()).toEqual(doc);
    expect(await store.exists()).toBe(true);
  });

  it('JSON でないファイルは CorruptionError で、削除されない', async () => {
    fs.writeFileSync(file, 'not json', { mode: 0o600 });
    const err = await store.read().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CorruptionError);
    expect(fs.readFileSync(file, 'utf-8')).toBe('not json');
  });

  it('形の不正なドキュメントも CorruptionError', async () => {
    fs.writeFileSync(file, JSON.stringify({ schema_version: '2.0', last_updated: 'x' }), { mode: 0o600 });
    await expect(store.read()).rejects.toBeInstanceOf(CorruptionError);
  });

  it('ドットを含む map キーを持つファイルは CorruptionError', async () => {
    const raw = { ...toSerialized(emptyDocument(NOW)), gaming: { 'a.b': 1 } };
    fs.writeFileSync(file, JSON.stringify(raw), { mode: 0o600 });
    const err = await store.read().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CorruptionError);
    expect(err).toHaveProperty('code', 'CORRUPT_STATE');
  });

  it('新しすぎるスキーマは SchemaError のまま伝える', async () => {
    fs.writeFileSync(file, JSON.stringify({ schema_version: '3.0', last_updated: NOW.toISOString() }), {
      mode: 0o600,
    });
    const err = await store.read().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SchemaError);
    expect(err).toHaveProperty('code', 'UNSUPPORTED_SCHEMA_VERSION');
  });

  it('緩いパーミッションは 0600 に引き締める', async () => {
    await store.write(emptyDocument(NOW));
    fs.chmodSync(file, 0o644);
    await store.read();
    expect(fs.statSync(file).mode & 0o777).toBe(0o600);
  });

  // =========================================================
  // write
  // =========================================================

  it('0600 で書き込み、一時ファイルを残さない', async () => {
    await store.write(emptyDocument(NOW));
    expect(fs.statSync(file).mode & 0o777).toBe(0o600);
    expect(fs.readdirSync(dir)).toEqual(['pi-state.json']);
  });

  it('rename に失敗すると WRITE_FAILED で、一時ファイルを残さない', async () => {
    // Replace the target with a non-empty directory so rename fails
    fs.rmSync(file);
    fs.mkdirSync(file);
    fs.writeFileSync(path.join(file, 'keep'), 'x');

    const err = await store.write(emptyDocument(new Date('2026-04-01T00:00:00.000Z'))).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(IoError);
    expect(err).toHaveProperty('code', 'WRITE_FAILED');
    expect(fs.readdirSync(dir).filter((name) => name.endsWith('.tmp'))).toEqual([]);
    expect(fs.readFileSync(path.join(file, 'keep'), 'utf-8')).toBe('x');
  });

  it('中断された書き込みの一時ファイルが残っていても確定済みファイルは読める', async () => {
    const doc = setDocumentField(emptyDocument(NOW), 'system.hostname', 'pi', NOW);
    await store.write(doc);
    fs.writeFileSync(path.join(dir, '.pi-state.json.999.dead.tmp'), '{"schema_version": "2.0", "last_', {
      mode: 0o600,
    });
    expect(await store.read()).toEqual(doc);
  });

  it('存在しないディレクトリも作成する', async () => {
    const nested = new StateStore(path.join(dir, 'a', 'b', 'state.json'));
    await nested.write(emptyDocument(NOW));
    expect(await nested.read()).toEqual(emptyDocument(NOW));
  });

  // =========================================================
  // withLock
  // =========================================================

  it('withLock の間だけロックファイルが存在する', async () => {
    const held = await store.withLock(async () => fs.existsSync(store.lockPath));
    expect(held).toBe(true);
    expect(fs.existsSync(store.lockPath)).toBe(false);
    expect(store.lockPath).toBe(`${file}.lock`);
  });
});
