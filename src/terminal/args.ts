/**
 * Command-line flags for the terminal front end, parsed by hand like the
 * other tooling scripts. Values are checked later by the options schema.
 */

import { SessionOptionsError } from '../errors.js';
import { SessionOptionsInput } from '../session/options.js';

export function parseArgs(argv: string[]): SessionOptionsInput {
  const args: SessionOptionsInput = {};

  for (const arg of argv) {
    if (arg === '--centers') {
      args.showCenters = true;
    } else if (arg === '--no-lines') {
      args.showLines = false;
    } else if (arg === '--no-info') {
      args.showInfo = false;
    } else if (arg.startsWith('--mode=')) {
      const v = arg.slice('--mode='.length);
      if (v === 'mirror' || v === 'outline') args.mode = v;
      else throw new SessionOptionsError('invalid arguments', [`--mode: expected mirror or outline, got "${v}"`]);
    } else if (arg.startsWith('--side=')) {
      args.sideLength = Number(arg.slice('--side='.length));
    } else if (arg.startsWith('--pixels=')) {
      args.numRandomPixels = Number(arg.slice('--pixels='.length));
    } else if (arg.startsWith('--seed=')) {
      args.seed = Number(arg.slice('--seed='.length));
    } else {
      throw new SessionOptionsError('invalid arguments', [`unknown argument "${arg}"`]);
    }
  }

  return args;
}
