#!/usr/bin/env node
import 'dotenv/config';
import { Sentry } from './instrument.js';

import * as os from 'os';
import { AnsiTerminal, TerminalInitError, UI } from '@strata/render';
import { App } from './app.js';
import { REDRAW } from './commands.js';
import { createCompleters } from './complete.js';
import { ConfigError, loadConfig } from './config.js';
import { buildKeyMap } from './keys.js';
import { createLogger, defaultLogFile } from './logger.js';
import { Nav } from './nav/nav.js';

async function main() {
  const config = loadConfig();
  const log = createLogger(config.logFile ?? defaultLogFile());
  const keys = buildKeyMap(config.keys);

  log.log(`[Startup] strata in ${process.cwd()}`);

  const terminal = new AnsiTerminal(process.stdin, process.stdout);
  terminal.init();

  try {
    const ui = new UI({
      backend: terminal,
      options: {
        ratios: config.ratios,
        tabstop: config.tabstop,
        showinfo: config.showinfo,
        preview: config.preview,
        keys,
      },
      identity: {
        user: os.userInfo().username,
        host: os.hostname(),
        home: os.homedir(),
      },
      noop: REDRAW,
      log,
    });

    const nav = new Nav(process.cwd(), ui.paneHeight, config.hidden);
    const app = new App(ui, nav, createCompleters(() => nav.currentDir()?.path ?? process.cwd()), log);

    await app.run();
  } finally {
    terminal.close();
  }

  log.log('[Shutdown] bye');
}

main().catch(async (error) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
    process.exit(2);
  }
  if (error instanceof TerminalInitError) {
    console.error(`initializing terminal: ${error.message}`);
  } else {
    console.error('Fatal error:', error);
  }
  Sentry.captureException(error);
  await Sentry.flush(2000);
  process.exit(1);
});
