import type { ColorIndex } from '../types/index.js';
import { BRIGHT_OFFSET, PALETTE } from '../constants/index.js';

// ---------------------------------------------------------------------------
// ANSI helpers
// ---------------------------------------------------------------------------

const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

/**
 * Capability used by every renderer to decorate text.
 * Renderers never check whether color is on; they ask the style instead.
 */
export interface TextStyle {
  decorate(text: string, color: ColorIndex): string;
  bold(text: string): string;
}

function isColorIndex(color: ColorIndex): boolean {
  return Number.isInteger(color) && color >= 0 && color < BRIGHT_OFFSET * 2;
}

function colorCode(color: ColorIndex): string {
  return color >= BRIGHT_OFFSET
    ? `\x1b[1;3${color - BRIGHT_OFFSET}m`
    : `\x1b[3${color}m`;
}

export const ansiStyle: TextStyle = {
  decorate(text: string, color: ColorIndex): string {
    if (!text || !isColorIndex(color)) {
      return text;
    }
    return `${colorCode(color)}${text}${RESET}`;
  },

  bold(text: string): string {
    return text ? `${BOLD}${text}${RESET}` : text;
  }
};

export const plainStyle: TextStyle = {
  decorate(text: string): string {
    return text;
  },

  bold(text: string): string {
    return text;
  }
};

export function selectTextStyle(color: boolean): TextStyle {
  return color ? ansiStyle : plainStyle;
}

/**
 * Deterministic color for a repository name, so the same repository keeps
 * the same color across a run.
 */
export function repoColor(repository: string): ColorIndex {
  let hash = 0;
  for (let i = 0; i < repository.length; i++) {
    hash += repository.charCodeAt(i);
  }
  return PALETTE.REPO_ORIGIN_BASE + (hash % PALETTE.REPO_ORIGIN_SPAN);
}

export function formatRepoPrefix(repository: string, style: TextStyle): string {
  return style.decorate(`${repository}/`, repoColor(repository));
}

export function formatAurPrefix(style: TextStyle): string {
  return style.decorate('aur/', PALETTE.AUR_ORIGIN);
}
