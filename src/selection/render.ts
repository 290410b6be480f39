/**
 * Plain-text frame for the picker. The session adds terminal control codes.
 */

import type { FlattenedEntry, SelectionTree } from './tree.js';
import { HELP_LINE } from './keys.js';

export interface Frame {
  lines: string[];
  /** Index into `lines` of the row under the cursor */
  cursorLine: number | null;
}

export function formatEntry(entry: FlattenedEntry): string {
  const { node, depth } = entry;
  const indent = '  '.repeat(depth);
  const marker = node.kind === 'file'
    ? (node.selected ? '[✓] ' : '[ ] ')
    : (node.expanded ? '▼ ' : '► ');
  return `${indent}${marker}${node.name}`;
}

/** Start of the visible window so the cursor row stays on screen */
export function windowStart(cursor: number, total: number, visible: number): number {
  if (total <= visible) return 0;
  const start = Math.max(0, cursor - Math.floor(visible / 2));
  return Math.min(start, total - visible);
}

export function renderFrame(tree: SelectionTree, title: string, height: number): Frame {
  const entries = tree.flattened;
  const cursor = tree.getCursor();
  // title, counter, blank line above help, help
  const visible = Math.max(1, height - 4);
  const start = windowStart(cursor ?? 0, entries.length, visible);

  const lines = [title, `Files (${tree.selectedCount()} selected of ${tree.totalFileCount()})`];
  const rows = entries.slice(start, start + visible).map(formatEntry);
  lines.push(...rows, '', HELP_LINE);

  return {
    lines,
    cursorLine: cursor === null ? null : 2 + (cursor - start),
  };
}
