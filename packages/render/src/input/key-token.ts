import type { KeyEvent } from '@strata/protocol';

/**
 * One input event reduced to what the key resolver acts on
 */
export type KeyToken =
  | { kind: 'token'; token: string }
  | { kind: 'escape' }
  | { kind: 'resize' }
  | { kind: 'unhandled' }
  | { kind: 'ignored' };

/**
 * Named keys and the tokens they spell in binding keys
 */
export const NAMED_KEY_TOKENS: Readonly<Record<string, string>> = {
  ' ': '<space>',
  Enter: '<cr>',
  Backspace: '<bs>',
  Backspace2: '<bs2>',
  Tab: '<tab>',
  ArrowUp: '<up>',
  ArrowDown: '<down>',
  ArrowLeft: '<left>',
  ArrowRight: '<right>',
  'Ctrl-L': '<c-l>',
};

export function toKeyToken(event: KeyEvent): KeyToken {
  switch (event.type) {
    case 'resize':
      return { kind: 'resize' };
    case 'mouse':
    case 'unknown':
      return { kind: 'ignored' };
    case 'key':
      break;
  }

  if (event.key === 'Escape') {
    return { kind: 'escape' };
  }

  const named = event.key !== undefined ? NAMED_KEY_TOKENS[event.key] : undefined;
  if (named !== undefined) {
    return { kind: 'token', token: named };
  }

  if (event.char !== undefined && !event.alt && !event.ctrl) {
    return { kind: 'token', token: event.char };
  }

  return { kind: 'unhandled' };
}
