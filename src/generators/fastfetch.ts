/**
 * Fastfetch config (JSONC).
 *
 * Colors use ANSI true-color SGR codes (`38;2;r;g;b`), which every fastfetch
 * release accepts.
 */

import type { Color } from "../color/index.js";
import type { Theme } from "../theme/index.js";
import { commentText } from "./palette.js";

function ansi(color: Color): string {
  return `38;2;${color.toRgbString().replace(/, /g, ";")}`;
}

export function generateFastfetch(theme: Theme): string {
  const { colors } = theme;
  const config = {
    $schema: "https://github.com/fastfetch-cli/fastfetch/raw/dev/doc/json_schema.json",
    logo: {
      color: { "1": ansi(colors.accent), "2": ansi(colors.blue) },
    },
    display: {
      separator: " → ",
      color: {
        keys: ansi(colors.accent),
        title: ansi(colors.blue),
        output: ansi(colors.fg),
      },
    },
    modules: [
      "title",
      "separator",
      "os",
      "kernel",
      "uptime",
      "packages",
      "shell",
      "wm",
      "terminal",
      "cpu",
      "memory",
      "break",
      "colors",
    ],
  };

  return `// Fastfetch configuration: ${commentText(theme.name)}\n${JSON.stringify(config, null, 2)}\n`;
}
