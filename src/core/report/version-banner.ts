/**
 * Version banner printed by `upreport version`: this tool's version and,
 * when the caller passes one, the version line of the package manager
 * backend it reports for.
 */

import { APP_NAME, PALETTE } from '../../constants/index.js';
import { selectTextStyle } from '../../utils/text-style.js';
import { resolveTerminal } from '../ports/resolve.js';
import type { RenderContext } from '../render-context.js';

export interface VersionBannerOptions {
  /** Bare `name vX` line and backend line, no decoration */
  quiet?: boolean;
  backendVersion?: string;
  color?: boolean;
}

export function formatVersionBanner(version: string, options: VersionBannerOptions, ctx: RenderContext): string[] {
  const title = `${APP_NAME} v${version}`;
  const backend = options.backendVersion?.trim();

  if (options.quiet) {
    return backend ? [title, backend] : [title];
  }

  const textStyle = selectTextStyle(options.color ?? resolveTerminal(ctx).supportsColor());
  const lines = ['', `${textStyle.decorate('::', PALETTE.BULLET)} ${textStyle.bold(title)}`];
  if (backend) {
    lines.push(`   ${backend}`);
  }
  lines.push('');
  return lines;
}
