/**
 * Chalk configuration with auto-detection for MCP mode and non-TTY environments
 */

import { Chalk } from 'chalk';

// Colors are off for MCP stdio, pipes, NO_COLOR and CI runs
export function shouldDisableColors(env: NodeJS.ProcessEnv = process.env, isTTY = Boolean(process.stdout.isTTY)): boolean {
  if (!isTTY) {
    return true;
  }

  if (env.NO_COLOR) {
    return true;
  }

  if (env.FORCE_COLOR === '0' || env.FORCE_COLOR === 'false') {
    return true;
  }

  if (env.CI && !env.FORCE_COLOR) {
    return true;
  }

  return false;
}

const configuredChalk = shouldDisableColors() ? new Chalk({ level: 0 }) : new Chalk();

export default configuredChalk;
