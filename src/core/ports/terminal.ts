/**
 * Terminal Port
 *
 * Width and color capability of the terminal the report is printed to.
 * Both are queried on every render call since the window can be resized
 * between invocations.
 */

import { DEFAULT_TERMINAL_WIDTH } from '../../constants/index.js';

export interface TerminalPort {
  /** Current width in columns */
  getWidth(): number;

  /** Whether escape sequences should be emitted */
  supportsColor(): boolean;
}

function widthFromEnv(): number | undefined {
  const columns = Number.parseInt(process.env.COLUMNS ?? '', 10);
  return Number.isFinite(columns) && columns > 0 ? columns : undefined;
}

export const processTerminal: TerminalPort = {
  getWidth(): number {
    return process.stdout.columns || widthFromEnv() || DEFAULT_TERMINAL_WIDTH;
  },

  supportsColor(): boolean {
    if (process.env.NO_COLOR !== undefined || process.env.TERM === 'dumb') {
      return false;
    }
    return Boolean(process.stdout.isTTY);
  }
};

/**
 * Fixed terminal, used when output is redirected or in tests.
 */
export function fixedTerminal(width: number, color = false): TerminalPort {
  return {
    getWidth: () => width,
    supportsColor: () => color
  };
}
