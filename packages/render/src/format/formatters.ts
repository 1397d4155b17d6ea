import { kindLetter } from '../panes/file-kind.js';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const SIZE_SUFFIXES = ['K', 'M', 'G', 'T', 'P', 'E', 'Z', 'Y'];

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function month(date: Date): string {
  return MONTHS[date.getMonth()] ?? '???';
}

/**
 * Short decimal size: `512`, `1.5K`, `25K`, `3.0M`
 */
export function humanize(size: number): string {
  if (size < 1000) {
    return String(size);
  }

  let curr = size / 1000;
  for (const suffix of SIZE_SUFFIXES) {
    if (curr < 10) {
      return `${curr.toFixed(1)}${suffix}`;
    }
    if (curr < 1000) {
      return `${Math.floor(curr)}${suffix}`;
    }
    curr /= 1000;
  }

  return '';
}

/**
 * `Jan  5 09:07` in local time, day padded with a blank
 */
export function formatShortTime(date: Date): string {
  const day = String(date.getDate()).padStart(2, ' ');
  return `${month(date)} ${day} ${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

/**
 * `Fri Jan  5 09:07:03 2024` in local time
 */
export function formatCtime(date: Date): string {
  const weekday = WEEKDAYS[date.getDay()] ?? '???';
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${weekday} ${formatShortTime(date).slice(0, 6)} ${time} ${date.getFullYear()}`;
}

/**
 * `ls -l` permission string, e.g. `drwxr-xr-x`
 */
export function formatMode(mode: number): string {
  const bits = [
    [0o400, 'r'],
    [0o200, 'w'],
    [0o100, 'x'],
    [0o040, 'r'],
    [0o020, 'w'],
    [0o010, 'x'],
    [0o004, 'r'],
    [0o002, 'w'],
    [0o001, 'x'],
  ] as const;

  let out = kindLetter(mode);
  for (const [bit, letter] of bits) {
    out += (mode & bit) !== 0 ? letter : '-';
  }
  return out;
}
