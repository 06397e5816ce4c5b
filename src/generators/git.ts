/**
 * Git color config, meant to be pulled in with `[include] path = ...`.
 *
 * Hex values are quoted: an unquoted `#` starts a comment in git config.
 */

import type { Color } from "../color/index.js";
import type { Theme } from "../theme/index.js";
import { commentText, mutedColor } from "./palette.js";

function style(color: Color, ...attributes: string[]): string {
  return [`"${color.toHex()}"`, ...attributes].join(" ");
}

export function generateGit(theme: Theme): string {
  const { colors } = theme;
  const muted = mutedColor(theme);

  const sections: Array<[string, Array<[string, string]>]> = [
    ["color", [["ui", "auto"]]],
    [
      'color "diff"',
      [
        ["meta", style(colors.yellow, "bold")],
        ["frag", style(colors.magenta, "bold")],
        ["func", style(colors.blue)],
        ["commit", style(colors.yellow)],
        ["context", style(colors.fg)],
        ["old", style(colors.red)],
        ["new", style(colors.green)],
        ["whitespace", style(colors.red, "reverse")],
      ],
    ],
    [
      'color "status"',
      [
        ["header", style(muted)],
        ["branch", style(colors.accent, "bold")],
        ["added", style(colors.green)],
        ["changed", style(colors.yellow)],
        ["untracked", style(colors.red)],
        ["unmerged", style(colors.magenta, "bold")],
      ],
    ],
    [
      'color "branch"',
      [
        ["current", style(colors.accent, "bold")],
        ["local", style(colors.fg)],
        ["remote", style(colors.blue)],
        ["upstream", style(colors.cyan)],
      ],
    ],
    [
      'color "decorate"',
      [
        ["HEAD", style(colors.accent, "bold")],
        ["branch", style(colors.green)],
        ["remoteBranch", style(colors.blue)],
        ["tag", style(colors.yellow)],
      ],
    ],
  ];

  const lines = [`# Git colors: ${commentText(theme.name)}`];
  for (const [section, entries] of sections) {
    lines.push(`[${section}]`, ...entries.map(([key, value]) => `\t${key} = ${value}`));
  }
  return lines.join("\n") + "\n";
}
