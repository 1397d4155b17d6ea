import type { TerminalBackend } from '../terminal/terminal.js';
import { PLAIN } from '../theme.js';
import type { Window } from '../window/window.js';

/**
 * Tab completion providers; the prompt prefix picks which one runs
 */
export interface Completers {
  command(text: string): string;
  shell(text: string): string;
}

export const COMMAND_PREFIX = ':';
export const SHELL_PREFIX = '$';

/**
 * Read one line of input on `win`. Enter returns the text, escape returns
 * an empty string. The window is redrawn and flushed after every key.
 */
export async function runPrompt(
  backend: TerminalBackend,
  win: Window,
  prefix: string,
  completers: Completers
): Promise<string> {
  const prefixWidth = Array.from(prefix).length;
  let acc: string[] = [];

  win.printLine(0, 0, PLAIN, prefix);
  backend.setCursor(win.x + prefixWidth, win.y);
  backend.flush();

  try {
    for (;;) {
      const event = await backend.poll();
      if (event.type !== 'key') {
        continue;
      }

      switch (event.key) {
        case 'Enter':
          win.printLine(0, 0, PLAIN, '');
          backend.setCursor(win.x, win.y);
          backend.flush();
          return acc.join('');
        case 'Escape':
          return '';
        case 'Backspace':
        case 'Backspace2':
          acc = acc.slice(0, -1);
          break;
        case 'Tab': {
          const text = acc.join('');
          acc = Array.from(prefix === COMMAND_PREFIX ? completers.command(text) : completers.shell(text));
          break;
        }
        default:
          if (event.char !== undefined && !event.alt) {
            acc.push(event.char);
          }
      }

      win.printLine(0, 0, PLAIN, prefix);
      win.print(prefixWidth, 0, PLAIN, acc.join(''));
      backend.setCursor(win.x + prefixWidth + acc.length, win.y);
      backend.flush();
    }
  } finally {
    backend.hideCursor();
  }
}
