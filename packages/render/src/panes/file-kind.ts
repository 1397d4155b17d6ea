/**
 * Display class of a directory entry, derived once from its st_mode
 */
export type FileKind =
  | 'regular-executable'
  | 'regular'
  | 'directory'
  | 'symlink'
  | 'fifo'
  | 'socket'
  | 'device'
  | 'other';

// st_mode type bits
const S_IFMT = 0o170000;
const S_IFSOCK = 0o140000;
const S_IFLNK = 0o120000;
const S_IFREG = 0o100000;
const S_IFBLK = 0o060000;
const S_IFDIR = 0o040000;
const S_IFCHR = 0o020000;
const S_IFIFO = 0o010000;

const ANY_EXECUTE = 0o111;

export function classifyMode(mode: number): FileKind {
  switch (mode & S_IFMT) {
    case S_IFREG:
      return (mode & ANY_EXECUTE) !== 0 ? 'regular-executable' : 'regular';
    case S_IFDIR:
      return 'directory';
    case S_IFLNK:
      return 'symlink';
    case S_IFIFO:
      return 'fifo';
    case S_IFSOCK:
      return 'socket';
    case S_IFBLK:
    case S_IFCHR:
      return 'device';
    default:
      return 'other';
  }
}

/**
 * Single-letter type column used by `ls -l`
 */
export function kindLetter(mode: number): string {
  switch (mode & S_IFMT) {
    case S_IFDIR:
      return 'd';
    case S_IFLNK:
      return 'l';
    case S_IFIFO:
      return 'p';
    case S_IFSOCK:
      return 's';
    case S_IFBLK:
      return 'b';
    case S_IFCHR:
      return 'c';
    default:
      return '-';
  }
}
