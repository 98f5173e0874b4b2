import { describe, it, expect } from 'vitest';
import { compareDocuments, compareValues, isEmptyDiff, summarizeDiff } from '../../src/engine/diff.js';
import { getPath } from '../../src/engine/field-path.js';
import { parseIpAddr } from '../../src/parser/host-facts-parser.js';
import type { StateDocument } from '../../src/types/state.js';

function doc(lastUpdated: string, sections: StateDocument['sections']): StateDocument {
  return { schemaVersion: '2.0', lastUpdated, sections };
}

describe('compareValues', () => {
  it('同一の値は空の差分', () => {
    const diff = compareValues({ a: 1, b: [1, 2] }, { b: [1, 2], a: 1 });
    expect(isEmptyDiff(diff)).toBe(true);
  });

  it('added / changed / removed をドットパスで返す', () => {
    const diff = compareValues(
      { system: { hostname: 'pi', uptime: 10 } },
      { system: { hostname: 'pi2', kernel: '6.1' } },
    );
    expect(diff).toEqual({
      added: { 'system.kernel': '6.1' },
      changed: { 'system.hostname': { old: 'pi', new: 'pi2' } },
      removed: { 'system.uptime': 10 },
    });
  });

  it('list は位置ごとに比較し、末尾の増減を added / removed にする', () => {
    expect(compareValues({ l: [1, 2, 3] }, { l: [1, 5] })).toEqual({
      added: {},
      changed: { 'l.1': { old: 2, new: 5 } },
      removed: { 'l.2': 3 },
    });
    expect(compareValues({ l: ['a'] }, { l: ['a', 'b'] }).added).toEqual({ 'l.1': 'b' });
  });

  it('種別が変わった値は changed として丸ごと報告する', () => {
    expect(compareValues({ a: { x: 1 } }, { a: [1] }).changed).toEqual({
      a: { old: { x: 1 }, new: [1] },
    });
  });

  it('ドットを含むインターフェース名でもパスが衝突せず、そのまま引ける', () => {
    const before = parseIpAddr('2: eth0    inet 192.168.1.20/24 scope global eth0\n');
    const after = parseIpAddr(
      '2: eth0    inet 192.168.1.20/24 scope global eth0\n4: eth0.100@eth0    inet 10.100.0.2/24 scope global eth0.100\n',
    );
    const diff = compareValues(before, after, 'network');
    expect(diff).toEqual({
      added: { 'network.interfaces.eth0_100': { device: 'eth0.100', ipv4: ['10.100.0.2/24'] } },
      changed: {},
      removed: {},
    });
    expect(getPath({ network: after }, 'network.interfaces.eth0_100.ipv4.0')).toEqual({
      found: true,
      value: '10.100.0.2/24',
    });
  });

  it('basePath を接頭辞にする', () => {
    expect(compareValues({ x: 1 }, { x: 2 }, 'system').changed).toEqual({
      'system.x': { old: 1, new: 2 },
    });
  });
});

describe('compareDocuments', () => {
  it('last_updated の違いは差分に含まれない', () => {
    const a = doc('2026-01-01T00:00:00.000Z', { system: { hostname: 'pi' } });
    const b = doc('2026-06-01T00:00:00.000Z', { system: { hostname: 'pi' } });
    expect(isEmptyDiff(compareDocuments(a, b))).toBe(true);
  });

  it('セクション単位の追加と削除', () => {
    const a = doc('2026-01-01T00:00:00.000Z', { system: {}, legacy: 1 });
    const b = doc('2026-01-01T00:00:00.000Z', { system: {}, gaming: { rom_systems: [] } });
    const diff = compareDocuments(a, b);
    expect(diff.added).toEqual({ gaming: { rom_systems: [] } });
    expect(diff.removed).toEqual({ legacy: 1 });
  });
});

describe('summarizeDiff', () => {
  it('件数を数える', () => {
    const diff = compareValues({ a: 1, b: 2 }, { a: 3, c: 4 });
    expect(summarizeDiff(diff)).toEqual({ added: 1, changed: 1, removed: 1, total: 3 });
  });
});
