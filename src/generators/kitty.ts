/**
 * Kitty terminal colors (`kitty.conf` key/value lines).
 */

import type { Theme } from "../theme/index.js";
import { ansiPalette, commentText } from "./palette.js";

export function generateKitty(theme: Theme): string {
  const { colors, properties } = theme;
  const lines: string[] = [`# Kitty theme: ${commentText(theme.name)}`, ""];

  lines.push("# Background", `background ${colors.bg}`, `foreground ${colors.fg}`, "");

  lines.push("# Color palette");
  ansiPalette(theme).forEach((color, i) => lines.push(`color${i} ${color}`));
  lines.push("");

  lines.push("# Cursor", `cursor ${colors.accent}`, `cursor_text_color ${colors.bg}`, "");
  lines.push(
    "# Selection",
    `selection_background ${colors.accent}`,
    `selection_foreground ${colors.bg}`,
    ""
  );
  lines.push(
    "# Window borders",
    `active_border_color ${colors.accent}`,
    `inactive_border_color ${colors.bg}`
  );
  if (properties.border_width !== undefined) {
    lines.push(`window_border_width ${properties.border_width}px`);
  }
  if (properties.spacing !== undefined) {
    lines.push(`window_padding_width ${properties.spacing}`);
  }
  lines.push("");

  lines.push(
    "# Tab bar",
    `tab_bar_background ${colors.bg}`,
    `tab_bar_margin_color ${colors.bg}`,
    `active_tab_background ${colors.accent}`,
    `active_tab_foreground ${colors.bg}`,
    `inactive_tab_background ${colors.bg}`,
    `inactive_tab_foreground ${colors.fg}`,
    ""
  );

  lines.push("# Bell and URL", `bell_border_color ${colors.yellow}`, `url_color ${colors.cyan}`);

  return lines.join("\n") + "\n";
}
