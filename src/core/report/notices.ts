/**
 * One-line notices printed around an upgrade: skipped packages, packages
 * that could not be found, packages already up to date. All go to stderr.
 */

import type { InstallInfo } from '../../types/index.js';
import { PALETTE } from '../../constants/index.js';
import { selectTextStyle, type TextStyle } from '../../utils/text-style.js';
import { fillTemplate, formatParagraph } from '../../utils/text-layout.js';
import type { Translator } from '../ports/i18n.js';
import { resolveOutput, resolveTerminal, resolveTranslator } from '../ports/resolve.js';
import type { RenderContext } from '../render-context.js';
import { compileLineTemplate, createUpgradeLineStyle } from './upgrade-line.js';
import { renderUpgradeSet } from './upgrade-set.js';

export const IGNORED_UPDATE_TEMPLATE = compileLineTemplate('{pkgName} ({currentVersion} => {newVersion})');
export const IGNORED_CURRENT_TEMPLATE = compileLineTemplate('{pkgName} {currentVersion}');
export const IGNORED_NEW_TEMPLATE = compileLineTemplate('{pkgName} {newVersion}');
export const IGNORED_NAME_TEMPLATE = compileLineTemplate('{pkgName}');

export type PackageSourceName = 'repo' | 'aur';

function bullet(textStyle: TextStyle): string {
  return textStyle.decorate('::', PALETTE.WARNING);
}

function warningPrefix(textStyle: TextStyle, translator: Translator): string {
  return textStyle.decorate(`:: ${translator.translate('warning:')}`, PALETTE.WARNING);
}

function styleFor(ctx: RenderContext, color?: boolean): TextStyle {
  return selectTextStyle(color ?? resolveTerminal(ctx).supportsColor());
}

/**
 * `:: Ignoring package update foo (1.0 => 1.1)`, or `:: Ignoring package foo 1.0`
 * when only one version is known.
 */
export function formatIgnoredPackage(
  name: string,
  versions: { current?: string; next?: string },
  ctx: RenderContext,
  color?: boolean
): string {
  const translator = resolveTranslator(ctx);
  const colored = color ?? resolveTerminal(ctx).supportsColor();
  const textStyle = selectTextStyle(colored);
  const info: InstallInfo = {
    name,
    currentVersion: versions.current,
    newVersion: versions.next,
    requiredBy: [],
    providedBy: [],
    memberOf: [],
    replaces: []
  };

  const bothKnown = Boolean(versions.current && versions.next);
  const template = bothKnown
    ? IGNORED_UPDATE_TEMPLATE
    : versions.current
      ? IGNORED_CURRENT_TEMPLATE
      : versions.next
        ? IGNORED_NEW_TEMPLATE
        : IGNORED_NAME_TEMPLATE;

  const style = createUpgradeLineStyle(ctx, { color: colored, showRepo: false, template });
  const line = renderUpgradeSet([info], style, translator);
  const message = bothKnown
    ? fillTemplate(translator.translate('Ignoring package update {pkg}'), { pkg: line })
    : fillTemplate(translator.translate('Ignoring package {pkg}'), { pkg: line });

  return `${bullet(textStyle)} ${message}`;
}

/**
 * Warning header followed by one indented line per missing package.
 */
export function formatNotFoundPackages(
  names: readonly string[],
  options: { repo?: boolean; color?: boolean },
  ctx: RenderContext
): string[] {
  const translator = resolveTranslator(ctx);
  const textStyle = styleFor(ctx, options.color);
  const width = resolveTerminal(ctx).getWidth();

  const header = options.repo
    ? translator.pluralize(
      'Following package cannot be found in repositories:',
      'Following packages cannot be found in repositories:',
      names.length
    )
    : translator.pluralize(
      'Following package cannot be found in AUR:',
      'Following packages cannot be found in AUR:',
      names.length
    );

  return [
    `${warningPrefix(textStyle, translator)} ${textStyle.bold(header)}`,
    ...names.map(name => formatParagraph(name, width))
  ];
}

export function formatUpToDate(
  name: string,
  version: string,
  source: PackageSourceName,
  ctx: RenderContext,
  color?: boolean
): string {
  const translator = resolveTranslator(ctx);
  const textStyle = styleFor(ctx, color);
  const message = fillTemplate(
    translator.translate('{name} {version} {source} package is up to date - skipping'),
    { name, version: textStyle.bold(version), source }
  );
  return `${warningPrefix(textStyle, translator)} ${message}`;
}

export function printIgnoredPackage(
  name: string,
  versions: { current?: string; next?: string },
  ctx: RenderContext
): void {
  resolveOutput(ctx).warn(formatIgnoredPackage(name, versions, ctx));
}

export function printNotFoundPackages(names: readonly string[], repo: boolean, ctx: RenderContext): void {
  const out = resolveOutput(ctx);
  for (const line of formatNotFoundPackages(names, { repo }, ctx)) {
    out.warn(line);
  }
}

export function printUpToDate(name: string, version: string, source: PackageSourceName, ctx: RenderContext): void {
  resolveOutput(ctx).warn(formatUpToDate(name, version, source, ctx));
}
