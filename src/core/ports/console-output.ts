/**
 * Console Output Adapter (Default)
 *
 * Plain console-based implementation of OutputPort.
 * Safe for pipes and headless environments.
 */

import type { OutputPort } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  warn(message: string): void {
    console.error(message);
  }
};
