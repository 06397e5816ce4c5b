/**
 * Yazi file manager theme (TOML).
 */

import { stringify } from "smol-toml";
import type { Theme } from "../theme/index.js";
import { commentText, mutedColor, orangeColor, surfaceColor } from "./palette.js";

export function generateYazi(theme: Theme): string {
  const { colors } = theme;
  const fg = colors.fg.toHex();
  const bg = colors.bg.toHex();
  const accent = colors.accent.toHex();
  const muted = mutedColor(theme).toHex();
  const surface = surfaceColor(theme).toHex();

  const document = {
    manager: {
      cwd: { fg: colors.cyan.toHex() },
      hovered: { fg: bg, bg: accent },
      preview_hovered: { underline: true },
      find_keyword: { fg: colors.yellow.toHex(), italic: true },
      find_position: { fg: colors.magenta.toHex(), italic: true },
      marker_copied: { fg: colors.green.toHex(), bg: colors.green.toHex() },
      marker_cut: { fg: colors.red.toHex(), bg: colors.red.toHex() },
      marker_selected: { fg: colors.blue.toHex(), bg: colors.blue.toHex() },
      tab_active: { fg: bg, bg: accent },
      tab_inactive: { fg, bg: surface },
      border_style: { fg: muted },
    },
    status: {
      separator_style: { fg: surface, bg: surface },
      mode_normal: { fg: bg, bg: accent, bold: true },
      mode_select: { fg: bg, bg: colors.green.toHex(), bold: true },
      mode_unset: { fg: bg, bg: orangeColor(theme).toHex(), bold: true },
      progress_label: { fg, bold: true },
      progress_normal: { fg: colors.blue.toHex(), bg: surface },
      progress_error: { fg: colors.red.toHex(), bg: surface },
    },
    input: {
      border: { fg: accent },
      title: {},
      value: { fg },
      selected: { bg: surface },
    },
    filetype: {
      rules: [
        { mime: "image/*", fg: colors.yellow.toHex() },
        { mime: "{audio,video}/*", fg: colors.magenta.toHex() },
        { mime: "application/{zip,gzip,x-tar,x-bzip2,x-7z-compressed,x-rar}", fg: colors.red.toHex() },
        { mime: "application/{pdf,doc,rtf}", fg: colors.cyan.toHex() },
        { name: "*/", fg: colors.blue.toHex() },
        { name: "*", fg },
      ],
    },
  };

  return `# Yazi theme: ${commentText(theme.name)}\n\n${stringify(document)}\n`;
}
