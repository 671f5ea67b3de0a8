/**
 * Port Resolution Helpers
 *
 * Utilities for resolving ports from a RenderContext,
 * falling back to safe defaults when ports are not explicitly provided.
 */

import type { RenderContext } from '../render-context.js';
import type { OutputPort } from './output.js';
import type { TerminalPort } from './terminal.js';
import type { Translator } from './i18n.js';
import { consoleOutput } from './console-output.js';
import { processTerminal } from './terminal.js';
import { englishTranslator } from './i18n.js';

/**
 * Resolve the OutputPort from a RenderContext.
 * Falls back to consoleOutput if not provided.
 */
export function resolveOutput(ctx?: Pick<RenderContext, 'output'>): OutputPort {
  return ctx?.output ?? consoleOutput;
}

/**
 * Resolve the TerminalPort from a RenderContext.
 * Falls back to the process's own stdout.
 */
export function resolveTerminal(ctx?: Pick<RenderContext, 'terminal'>): TerminalPort {
  return ctx?.terminal ?? processTerminal;
}

/**
 * Resolve the Translator from a RenderContext.
 * Falls back to the built-in English templates.
 */
export function resolveTranslator(ctx?: Pick<RenderContext, 'translator'>): Translator {
  return ctx?.translator ?? englishTranslator;
}
