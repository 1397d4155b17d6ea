import { Console } from 'console';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * Default log file, one per process
 */
export function defaultLogFile(): string {
  return path.join(os.tmpdir(), `strata.${process.pid}.log`);
}

/**
 * Console that appends to a file. The terminal belongs to the UI, so
 * nothing may be logged to stdout or stderr while it runs.
 */
export function createLogger(file: string): Console {
  const stream = fs.createWriteStream(file, { flags: 'a' });
  return new Console({ stdout: stream, stderr: stream });
}
