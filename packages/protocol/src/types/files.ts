/**
 * One directory entry as seen by lstat
 */
export interface FileEntry {
  name: string;
  /** POSIX st_mode, type bits included */
  mode: number;
  size: number;
  mtime: Date;
}

/**
 * Where the selection sits in a listing.
 * `pos` is the selection's row inside the visible viewport.
 */
export interface ScrollState {
  index: number;
  pos: number;
  /** Name of the selected entry, used to find it again after a reload */
  name?: string;
}

/**
 * A loaded directory listing with its selection
 */
export interface DirectorySnapshot extends ScrollState {
  path: string;
  entries: readonly FileEntry[];
}
