/**
 * Starship prompt palette (TOML).
 */

import { stringify } from "smol-toml";
import type { Theme } from "../theme/index.js";
import { commentText, mutedColor, orangeColor, purpleColor } from "./palette.js";

export function generateStarship(theme: Theme): string {
  const { colors } = theme;
  const paletteName = theme.name;

  const document = {
    palette: paletteName,
    palettes: {
      [paletteName]: {
        bg: colors.bg.toHex(),
        fg: colors.fg.toHex(),
        accent: colors.accent.toHex(),
        red: colors.red.toHex(),
        green: colors.green.toHex(),
        yellow: colors.yellow.toHex(),
        blue: colors.blue.toHex(),
        magenta: colors.magenta.toHex(),
        cyan: colors.cyan.toHex(),
        orange: orangeColor(theme).toHex(),
        purple: purpleColor(theme).toHex(),
        muted: mutedColor(theme).toHex(),
      },
    },
    character: {
      success_symbol: "[❯](bold green)",
      error_symbol: "[❯](bold red)",
    },
    directory: { style: "bold accent" },
    git_branch: { style: "bold purple" },
    git_status: { style: "yellow" },
    cmd_duration: { style: "muted" },
    hostname: { style: "bold cyan" },
    username: { style_user: "bold blue", style_root: "bold red" },
  };

  return `# Starship palette: ${commentText(theme.name)}\n\n${stringify(document)}\n`;
}
