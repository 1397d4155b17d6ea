import * as fs from 'fs';
import * as path from 'path';
import type { ScrollState } from '@strata/protocol';
import type { Navigation } from '@strata/render';
import { Dir } from './dir.js';

/**
 * `/a/b` -> [`/`, `/a`, `/a/b`]
 */
export function ancestors(dirPath: string): string[] {
  const chain: string[] = [];
  let current = path.resolve(dirPath);

  for (;;) {
    chain.unshift(current);
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return chain;
}

/**
 * Directory stack from the filesystem root down to the working directory,
 * plus marks and remembered selections
 */
export class Nav implements Navigation {
  dirs: Dir[] = [];
  readonly marks = new Set<string>();
  private readonly scrolls = new Map<string, ScrollState>();

  constructor(
    cwd: string,
    private height: number,
    private readonly hidden: boolean
  ) {
    this.cd(cwd);
  }

  currentDir(): Dir | undefined {
    return this.dirs[this.dirs.length - 1];
  }

  currentPath(): string | null {
    const dir = this.currentDir();
    const entry = dir?.entries[dir.index];
    return dir && entry ? path.join(dir.path, entry.name) : null;
  }

  cachedScroll(dirPath: string): ScrollState {
    return this.scrolls.get(dirPath) ?? { index: 0, pos: 0 };
  }

  loadDirectory(dirPath: string, scroll: ScrollState): Dir {
    return new Dir(dirPath).load(scroll, this.height, this.hidden);
  }

  /**
   * Replace the stack with the chain leading to `target`
   */
  cd(target: string): void {
    const chain = ancestors(target);
    const last = chain[chain.length - 1];
    if (last === undefined || !fs.statSync(last).isDirectory()) {
      throw new Error(`not a directory: ${target}`);
    }

    this.dirs = chain.map((dirPath, i) => {
      const child = chain[i + 1];
      const cached = this.cachedScroll(dirPath);
      const scroll = child === undefined ? cached : { ...cached, name: path.basename(child) };
      return this.loadDirectory(dirPath, scroll);
    });
  }

  /**
   * Pane height changed
   */
  renew(height: number): void {
    this.height = height;
    for (const dir of this.dirs) {
      dir.clampPos(dir.pos, height);
    }
  }

  down(count = 1): void {
    this.move((dir) => {
      const target = Math.min(dir.index + count, dir.entries.length - 1);
      dir.pos = Math.min(dir.pos + (target - dir.index), this.height - 1);
      dir.index = target;
    });
  }

  up(count = 1): void {
    this.move((dir) => {
      const target = Math.max(dir.index - count, 0);
      dir.pos = Math.max(dir.pos - (dir.index - target), 0);
      dir.index = target;
    });
  }

  top(): void {
    this.move((dir) => {
      dir.index = 0;
      dir.pos = 0;
    });
  }

  bottom(): void {
    this.move((dir) => {
      dir.index = Math.max(dir.entries.length - 1, 0);
      dir.pos = Math.min(dir.index, this.height - 1);
    });
  }

  /**
   * Leave the current directory; the root stays
   */
  updir(): void {
    if (this.dirs.length <= 1) {
      return;
    }
    const dir = this.dirs.pop();
    if (dir) {
      this.save(dir);
    }
  }

  /**
   * Enter the selection if it is a directory. Returns false otherwise.
   */
  open(): boolean {
    const target = this.currentPath();
    if (target === null || !fs.statSync(target).isDirectory()) {
      return false;
    }
    this.dirs.push(this.loadDirectory(target, this.cachedScroll(target)));
    return true;
  }

  /**
   * Flip the mark on the selection and move down
   */
  toggleMark(): void {
    const target = this.currentPath();
    if (target === null) {
      return;
    }
    if (!this.marks.delete(target)) {
      this.marks.add(target);
    }
    this.down();
  }

  private move(update: (dir: Dir) => void): void {
    const dir = this.currentDir();
    if (!dir || dir.entries.length === 0) {
      return;
    }
    update(dir);
    dir.name = dir.entries[dir.index]?.name;
    this.save(dir);
  }

  private save(dir: Dir): void {
    this.scrolls.set(dir.path, dir.scrollState());
  }
}
