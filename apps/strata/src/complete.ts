import * as fs from 'fs';
import type { Completers } from '@strata/render';
import { COMMAND_NAMES } from './commands.js';

export function longestCommonPrefix(words: readonly string[]): string {
  const [first, ...rest] = words;
  if (first === undefined) return '';

  let prefix = first;
  for (const word of rest) {
    while (!word.startsWith(prefix)) {
      prefix = prefix.slice(0, -1);
    }
  }
  return prefix;
}

/**
 * Complete `word` against `choices`: a single match is finished with a
 * trailing blank, several are narrowed to their common prefix
 */
function completeWord(word: string, choices: readonly string[]): string {
  const matches = choices.filter((choice) => choice.startsWith(word));
  if (matches.length === 0) return word;
  if (matches.length === 1) return `${matches[0]} `;
  return longestCommonPrefix(matches);
}

/**
 * Command names, only for the first word
 */
export function completeCommand(text: string): string {
  if (/\s/.test(text)) {
    return text;
  }
  return completeWord(text, COMMAND_NAMES);
}

/**
 * Last word against the file names in `dir`. The text comes back unchanged
 * when `dir` cannot be listed.
 */
export function completeShell(text: string, dir: string): string {
  const split = text.lastIndexOf(' ') + 1;
  const head = text.slice(0, split);
  const word = text.slice(split);

  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch {
    // Unreadable or removed directory: nothing to complete against
    return text;
  }

  return head + completeWord(word, names.sort());
}

export function createCompleters(cwd: () => string): Completers {
  return {
    command: completeCommand,
    shell: (text) => completeShell(text, cwd()),
  };
}
