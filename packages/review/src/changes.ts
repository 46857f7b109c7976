import type { FileRecord } from '@relgate/parser';
import type { ChangeEntry, ChangeSignal, ChangeType } from './types.js';

const MAX_RECENT_CHANGES = 20;

const STATUS_TYPES: Record<string, ChangeType> = {
  A: 'added',
  M: 'modified',
  D: 'deleted',
};

/**
 * All-zero change signal, used when change detection is unavailable.
 */
export function emptyChangeSignal(): ChangeSignal {
  return { added: 0, deleted: 0, modified: 0, total: 0, byType: {}, recent: [] };
}

/**
 * Build a change signal from `git diff --name-status` output.
 *
 * The first letter of the status decides the type; anything other than
 * A, M or D (renames, copies, type changes) counts as modified. Renames
 * are reported under their new path.
 */
export function parseNameStatus(output: string): ChangeSignal {
  const entries: ChangeEntry[] = [];

  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const parts = trimmed.split('\t');
    if (parts.length < 2) continue;

    const status = parts[0];
    const file = parts[parts.length - 1];
    entries.push({ file, type: STATUS_TYPES[status.charAt(0)] ?? 'modified' });
  }

  const byType: Record<ChangeType, number> = { added: 0, modified: 0, deleted: 0 };
  for (const entry of entries) {
    byType[entry.type]++;
  }

  return {
    ...byType,
    total: entries.length,
    byType: { ...byType },
    recent: entries.slice(0, MAX_RECENT_CHANGES),
  };
}

/**
 * Fallback when no version control is available: every scanned file
 * counts towards the total.
 */
export function fileCountSignal(files: readonly FileRecord[]): ChangeSignal {
  return {
    added: 0,
    deleted: 0,
    modified: 0,
    total: files.length,
    byType: { scanned: files.length },
    recent: [],
  };
}
