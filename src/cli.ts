#!/usr/bin/env node
/**
 * Terminal front end.
 *
 * Usage:
 *   npm start                                  # mirror mode, side 5, no pixels
 *   npm start -- --mode=outline                # grid outline with statistics
 *   npm start -- --side=21 --pixels=80 --seed=7 --centers
 *
 * Keys: arrows adjust size (up/down) and pixel count (left/right), Enter
 * toggles centres / info, `l` toggles lines, Esc or q quits.
 */

import { SCREEN_HEIGHT, SCREEN_WIDTH } from './core/types.js';
import { SessionOptionsError } from './errors.js';
import { QueuedInputSource } from './controller/input_queue.js';
import { runSession } from './session/session.js';
import { TerminalHost } from './terminal/terminal_host.js';
import { attachKeypressInput } from './terminal/keypress_input.js';
import { parseArgs } from './terminal/args.js';

const EXIT_USAGE = 2;

async function main(): Promise<number> {
  const options = parseArgs(process.argv.slice(2));
  if (options.seed === undefined) {
    options.seed = Date.now() >>> 0;
  }

  const input = new QueuedInputSource();
  const detach = attachKeypressInput(process.stdin, input);
  const host = new TerminalHost(process.stdout, SCREEN_WIDTH, SCREEN_HEIGHT);

  try {
    return await runSession({ host, input, options });
  } finally {
    input.close();
    detach();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof SessionOptionsError) {
      console.error(`[tri-grid] ${err.message}`);
      process.exitCode = EXIT_USAGE;
      return;
    }
    console.error('[tri-grid] fatal:', err);
    process.exitCode = 1;
  }
);
