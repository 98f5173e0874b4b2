/**
 * Migration 1.0 → 2.0: Add hardware/network/software/services/gaming/notes
 *
 * 1.0 のドキュメントは system と RetroPie 固有セクション
 * （emulators, controllers, roms など）のみを持つ。
 * 既存フィールドはそのまま残し、新しいセクションを空で追加する。
 */

import type { Migration, RawDocument } from './index.js';

const NEW_MAP_SECTIONS = ['hardware', 'network', 'software', 'services', 'gaming'] as const;

const migration: Migration = {
  from: '1.0',
  to: '2.0',
  description: 'Add hardware, network, software, services, gaming and notes sections',
  up(doc: RawDocument): RawDocument {
    const next: RawDocument = { ...doc };
    for (const section of NEW_MAP_SECTIONS) {
      // 1.0 writers stored unpopulated sections as null
      if (next[section] === undefined || next[section] === null) {
        next[section] = {};
      }
    }
    if (next['notes'] === undefined || next['notes'] === null) {
      next['notes'] = [];
    }
    if (next['system'] === undefined || next['system'] === null) {
      next['system'] = {};
    }
    return next;
  },
};

export default migration;
