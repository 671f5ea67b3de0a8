import stripAnsi from 'strip-ansi';
import wrapAnsi from 'wrap-ansi';
import { DEFAULT_TERMINAL_WIDTH, PARAGRAPH_INDENT } from '../constants/index.js';

/**
 * Width of text as it appears on screen, escape sequences excluded.
 */
export function visibleWidth(text: string): number {
  return stripAnsi(text).length;
}

export function padding(count: number, minimum: number): string {
  return ' '.repeat(Math.max(minimum, count));
}

/**
 * Terminal width to lay text out against; zero, negative or non-finite
 * widths fall back to the default terminal width.
 */
export function usableWidth(terminalWidth: number): number {
  return Number.isFinite(terminalWidth) && terminalWidth > 0 ? terminalWidth : DEFAULT_TERMINAL_WIDTH;
}

/**
 * Wrap a description to the terminal and indent every line.
 */
export function formatParagraph(text: string, terminalWidth: number): string {
  const trimmed = text.trim();
  if (!trimmed) {
    return '';
  }

  const indent = ' '.repeat(PARAGRAPH_INDENT);
  const available = Math.max(1, usableWidth(terminalWidth) - PARAGRAPH_INDENT * 2);
  return wrapAnsi(trimmed, available, { trim: true })
    .split('\n')
    .map(line => `${indent}${line}`)
    .join('\n');
}

/**
 * Substitute `{key}` placeholders. Unknown keys are left as written.
 */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? String(values[key]) : match
  );
}
