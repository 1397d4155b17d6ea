import * as fs from 'fs';
import * as path from 'path';
import type { DirectorySnapshot, FileEntry, ScrollState } from '@strata/protocol';
import { classifyMode } from '@strata/render';

function isDirectory(entry: FileEntry): boolean {
  return classifyMode(entry.mode) === 'directory';
}

/**
 * Directories first, then by name
 */
export function compareEntries(a: FileEntry, b: FileEntry): number {
  const dirOrder = Number(isDirectory(b)) - Number(isDirectory(a));
  if (dirOrder !== 0) return dirOrder;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * lstat every entry of a directory. Entries that vanish between readdir
 * and lstat are skipped.
 */
export function readEntries(dirPath: string, hidden: boolean): FileEntry[] {
  const entries: FileEntry[] = [];

  for (const name of fs.readdirSync(dirPath)) {
    if (!hidden && name.startsWith('.')) {
      continue;
    }

    const stats = fs.lstatSync(path.join(dirPath, name), { throwIfNoEntry: false });
    if (!stats) {
      continue;
    }

    entries.push({ name, mode: stats.mode, size: stats.size, mtime: stats.mtime });
  }

  return entries.sort(compareEntries);
}

/**
 * One listed directory with its selection
 */
export class Dir implements DirectorySnapshot {
  entries: FileEntry[] = [];
  index = 0;
  pos = 0;
  name?: string;

  constructor(public readonly path: string) {}

  /**
   * Read the directory and restore the selection
   */
  load(scroll: ScrollState, height: number, hidden: boolean): this {
    this.entries = readEntries(this.path, hidden);
    this.restore(scroll, height);
    return this;
  }

  /**
   * Select `scroll.name` if it is still listed, otherwise stay at the same
   * index. `pos` is kept inside both the listing and the pane.
   */
  restore(scroll: ScrollState, height: number): void {
    const last = Math.max(this.entries.length - 1, 0);
    const byName = scroll.name === undefined ? -1 : this.entries.findIndex((e) => e.name === scroll.name);

    this.index = byName !== -1 ? byName : Math.min(Math.max(scroll.index, 0), last);
    this.clampPos(scroll.pos, height);
    this.name = this.entries[this.index]?.name;
  }

  clampPos(pos: number, height: number): void {
    this.pos = Math.max(0, Math.min(pos, this.index, height - 1));
  }

  scrollState(): ScrollState {
    return this.name === undefined
      ? { index: this.index, pos: this.pos }
      : { index: this.index, pos: this.pos, name: this.name };
  }
}
