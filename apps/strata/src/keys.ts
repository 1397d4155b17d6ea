import { Command, parseCommand } from './commands.js';
import { ConfigError } from './config.js';

/**
 * Default key bindings: key sequence -> command line
 */
export const DEFAULT_KEYS: Readonly<Record<string, string>> = {
  j: 'down',
  k: 'up',
  '<down>': 'down',
  '<up>': 'up',
  h: 'updir',
  '<left>': 'updir',
  '<bs2>': 'updir',
  l: 'open',
  '<right>': 'open',
  '<cr>': 'open',
  gg: 'top',
  G: 'bottom',
  gh: 'cd ~',
  'g/': 'cd /',
  '<space>': 'toggle',
  i: 'echo-info',
  ':': 'read',
  $: 'shell',
  '!': 'shell',
  '<c-l>': 'redraw',
  q: 'quit',
};

/**
 * Merge user bindings over the defaults. An empty command line removes
 * a binding.
 */
export function buildKeyMap(overrides: Readonly<Record<string, string>> = {}): Map<string, Command> {
  const keys = new Map<string, Command>();

  for (const [sequence, line] of Object.entries({ ...DEFAULT_KEYS, ...overrides })) {
    if (line.trim() === '') {
      continue;
    }
    const command = parseCommand(line);
    if (!command) {
      throw new ConfigError([`keys.${sequence}: unknown command "${line}"`]);
    }
    keys.set(sequence, command);
  }

  return keys;
}
