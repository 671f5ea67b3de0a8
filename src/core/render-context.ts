/**
 * Render Context
 *
 * Everything a render call needs from the outside world. Passed explicitly
 * into every renderer; nothing is cached between calls.
 */

import type { RenderConfig } from '../types/index.js';
import type { OutputPort } from './ports/output.js';
import type { TerminalPort } from './ports/terminal.js';
import type { Translator } from './ports/i18n.js';
import { DEFAULT_RENDER_CONFIG } from './config.js';

export interface RenderContext {
  config: RenderConfig;
  terminal?: TerminalPort;
  translator?: Translator;
  output?: OutputPort;
}

export function createRenderContext(overrides: Partial<RenderContext> = {}): RenderContext {
  return {
    ...overrides,
    config: overrides.config ?? DEFAULT_RENDER_CONFIG
  };
}
