import type { DirectorySnapshot, ScrollState } from '@strata/protocol';

/**
 * Navigation layer the UI draws from. Listing directories and keeping
 * scroll state consistent is its job; the UI only reads.
 */
export interface Navigation {
  /** Directory stack, most recent last */
  readonly dirs: readonly DirectorySnapshot[];
  readonly marks: ReadonlySet<string>;
  currentDir(): DirectorySnapshot | undefined;
  /** Absolute path of the selected entry, or null when nothing is selected */
  currentPath(): string | null;
  /** Scroll state remembered for a path, or the top of the listing */
  cachedScroll(path: string): ScrollState;
  /** Fresh listing of `path` with the selection restored from `scroll` */
  loadDirectory(path: string, scroll: ScrollState): DirectorySnapshot;
}
