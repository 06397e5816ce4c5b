/**
 * btop system monitor theme (`theme[key]="#rrggbb"` lines).
 */

import type { Theme } from "../theme/index.js";
import { commentText, mutedColor, orangeColor, surfaceColor } from "./palette.js";

export function generateBtop(theme: Theme): string {
  const { colors } = theme;
  const muted = mutedColor(theme);
  const surface = surfaceColor(theme);
  const orange = orangeColor(theme);

  const entries: Array<[string, string]> = [
    ["main_bg", colors.bg.toHex()],
    ["main_fg", colors.fg.toHex()],
    ["title", colors.fg.toHex()],
    ["hi_fg", colors.accent.toHex()],
    ["selected_bg", surface.toHex()],
    ["selected_fg", colors.accent.toHex()],
    ["inactive_fg", muted.toHex()],
    ["graph_text", colors.fg.toHex()],
    ["meter_bg", surface.toHex()],
    ["proc_misc", colors.cyan.toHex()],
    ["cpu_box", colors.blue.toHex()],
    ["mem_box", colors.green.toHex()],
    ["net_box", colors.magenta.toHex()],
    ["proc_box", colors.accent.toHex()],
    ["div_line", muted.toHex()],
    ["temp_start", colors.green.toHex()],
    ["temp_mid", colors.yellow.toHex()],
    ["temp_end", colors.red.toHex()],
    ["cpu_start", colors.cyan.toHex()],
    ["cpu_mid", colors.blue.toHex()],
    ["cpu_end", colors.magenta.toHex()],
    ["free_start", colors.green.toHex()],
    ["free_mid", colors.green.mix(colors.cyan, 0.5).toHex()],
    ["free_end", colors.cyan.toHex()],
    ["cached_start", colors.blue.toHex()],
    ["cached_mid", colors.blue.mix(colors.cyan, 0.5).toHex()],
    ["cached_end", colors.cyan.toHex()],
    ["available_start", colors.yellow.toHex()],
    ["available_mid", colors.yellow.mix(orange, 0.5).toHex()],
    ["available_end", orange.toHex()],
    ["used_start", colors.yellow.toHex()],
    ["used_mid", orange.toHex()],
    ["used_end", colors.red.toHex()],
    ["download_start", colors.green.toHex()],
    ["download_mid", colors.cyan.toHex()],
    ["download_end", colors.blue.toHex()],
    ["upload_start", colors.yellow.toHex()],
    ["upload_mid", orange.toHex()],
    ["upload_end", colors.red.toHex()],
    ["process_start", colors.green.toHex()],
    ["process_mid", colors.yellow.toHex()],
    ["process_end", colors.red.toHex()],
  ];

  return [
    `# btop theme: ${commentText(theme.name)}`,
    "",
    ...entries.map(([key, hex]) => `theme[${key}]="${hex}"`),
    "",
  ].join("\n");
}
