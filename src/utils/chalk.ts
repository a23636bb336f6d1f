/**
 * Chalk instance that stays quiet when output is piped or colours are turned off
 */

import { Chalk } from 'chalk';

function shouldDisableColors(): boolean {
  if (!process.stdout.isTTY) {
    return true;
  }

  if (process.env.NO_COLOR) {
    return true;
  }

  if (process.env.FORCE_COLOR === '0' || process.env.FORCE_COLOR === 'false') {
    return true;
  }

  // Most CI environments set this
  if (process.env.CI && !process.env.FORCE_COLOR) {
    return true;
  }

  return false;
}

const configuredChalk = shouldDisableColors() ? new Chalk({ level: 0 }) : new Chalk();

export default configuredChalk;
