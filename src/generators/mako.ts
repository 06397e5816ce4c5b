/**
 * Mako notification daemon config.
 */

import type { Theme } from "../theme/index.js";
import { commentText, mutedColor } from "./palette.js";

export function generateMako(theme: Theme): string {
  const { colors, properties } = theme;
  const lines = [
    `# Mako theme: ${commentText(theme.name)}`,
    "",
    `background-color=${colors.bg}`,
    `text-color=${colors.fg}`,
    `border-color=${colors.accent}`,
    `progress-color=over ${colors.blue}`,
    `border-size=${properties.border_width ?? 2}`,
  ];
  // mako has its own defaults for these; only override when the theme says so
  if (properties.border_radius !== undefined) {
    lines.push(`border-radius=${properties.border_radius}`);
  }
  if (properties.spacing !== undefined) {
    lines.push(`padding=${properties.spacing}`, `margin=${properties.spacing}`);
  }

  lines.push(
    "",
    "[urgency=low]",
    `border-color=${mutedColor(theme)}`,
    "",
    "[urgency=normal]",
    `border-color=${colors.accent}`,
    "",
    "[urgency=high]",
    `border-color=${colors.red}`,
    `text-color=${colors.red}`,
    "default-timeout=0"
  );

  return lines.join("\n") + "\n";
}
