/**
 * Shared Fallbacks
 *
 * Computed stand-ins for optional colors, shared by generators that need the
 * same derived shade. Each generator still chooses which of these it uses;
 * none of them writes back into the theme.
 */

import { relativeLuminance, type Color } from "../color/index.js";
import type { Theme } from "../theme/index.js";

/**
 * Dark unless the theme says light or its background is brighter than its foreground.
 */
export function isDarkTheme(theme: Theme): boolean {
  if (theme.variant) {
    return theme.variant === "dark";
  }
  return relativeLuminance(theme.colors.bg) < relativeLuminance(theme.colors.fg);
}

/**
 * Slightly raised background for panels, inputs and inactive tabs.
 */
export function surfaceColor(theme: Theme): Color {
  const { bg } = theme.colors;
  return isDarkTheme(theme) ? bg.lighten(0.08) : bg.darken(0.08);
}

/**
 * gray, else halfway-ish between fg and bg.
 */
export function mutedColor(theme: Theme): Color {
  return theme.colors.gray ?? theme.colors.fg.mix(theme.colors.bg, 0.45);
}

/**
 * black, else bg.
 */
export function blackColor(theme: Theme): Color {
  return theme.colors.black ?? theme.colors.bg;
}

/**
 * white, else fg lightened by 0.2.
 */
export function whiteColor(theme: Theme): Color {
  return theme.colors.white ?? theme.colors.fg.lighten(0.2);
}

/**
 * orange, else red blended halfway into yellow.
 */
export function orangeColor(theme: Theme): Color {
  return theme.colors.orange ?? theme.colors.red.mix(theme.colors.yellow, 0.5);
}

/**
 * purple, else magenta.
 */
export function purpleColor(theme: Theme): Color {
  return theme.colors.purple ?? theme.colors.magenta;
}

/**
 * pink, else magenta lightened by 0.2.
 */
export function pinkColor(theme: Theme): Color {
  return theme.colors.pink ?? theme.colors.magenta.lighten(0.2);
}

/**
 * The 16 ANSI terminal colors (0–7 normal, 8–15 bright).
 *
 * Slot 0 is black (else bg), slot 8 gray (else bg lightened by 0.1), slot 7 fg,
 * slot 15 white (else fg lightened by 0.2); bright hues are the normal ones
 * lightened by 0.2.
 */
export function ansiPalette(theme: Theme): Color[] {
  const { colors } = theme;
  const hues = [colors.red, colors.green, colors.yellow, colors.blue, colors.magenta, colors.cyan];

  return [
    blackColor(theme),
    ...hues,
    colors.fg,
    colors.gray ?? colors.bg.lighten(0.1),
    ...hues.map((hue) => hue.lighten(0.2)),
    whiteColor(theme),
  ];
}

/**
 * Single-line text for use inside a comment.
 */
export function commentText(text: string): string {
  return text.replace(/[\r\n]+/g, " ");
}

/**
 * Single-line text for use inside a CSS block comment; `*\/` would end it early.
 */
export function cssCommentText(text: string): string {
  return commentText(text).replace(/\*\//g, "* /");
}
