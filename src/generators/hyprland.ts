/**
 * Hyprland window manager colors.
 *
 * The output is a managed block inside the user's `hyprland.conf`, so it only
 * touches `general`, `decoration`, `group` and `animations`.
 */

import type { Color } from "../color/index.js";
import type { Theme } from "../theme/index.js";
import { commentText, mutedColor } from "./palette.js";

function rgb(color: Color): string {
  return `rgb(${color.toHex().slice(1)})`;
}

function rgba(color: Color, alpha: string): string {
  return `rgba(${color.toHex().slice(1)}${alpha})`;
}

export function generateHyprland(theme: Theme): string {
  const { colors, properties } = theme;
  const muted = mutedColor(theme);

  const variables = (
    [
      ["bg", colors.bg],
      ["fg", colors.fg],
      ["accent", colors.accent],
      ["red", colors.red],
      ["green", colors.green],
      ["yellow", colors.yellow],
      ["blue", colors.blue],
      ["magenta", colors.magenta],
      ["cyan", colors.cyan],
    ] as const
  ).map(([role, color]) => `$huectl_${role} = ${rgb(color)}`);

  const general = [
    `    col.active_border = ${rgb(colors.accent)} ${rgb(colors.blue)} 45deg`,
    `    col.inactive_border = ${rgba(muted, "aa")}`,
    `    border_size = ${properties.border_width ?? 2}`,
  ];
  if (properties.spacing !== undefined) {
    general.push(`    gaps_in = ${properties.spacing}`, `    gaps_out = ${properties.spacing * 2}`);
  }

  const decoration: string[] = [];
  if (properties.border_radius !== undefined) {
    decoration.push(`    rounding = ${properties.border_radius}`);
  }
  const blur = properties.shadow_blur ?? 4;
  decoration.push(
    "    shadow {",
    `        enabled = ${blur > 0}`,
    `        range = ${blur}`,
    `        color = ${rgba(colors.bg.darken(0.5), "ee")}`,
    "    }"
  );

  const lines = [
    `# Hyprland theme: ${commentText(theme.name)}`,
    "",
    ...variables,
    "",
    "general {",
    ...general,
    "}",
    "",
    "decoration {",
    ...decoration,
    "}",
    "",
    "group {",
    `    col.border_active = ${rgb(colors.accent)}`,
    `    col.border_inactive = ${rgba(muted, "aa")}`,
    "}",
  ];

  if (properties.animation_duration !== undefined) {
    // Hyprland speeds are in deciseconds
    const speed = Math.max(1, Math.round(properties.animation_duration * 10));
    lines.push("", "animations {", "    enabled = true", `    animation = global, 1, ${speed}, default`, "}");
  }

  return lines.join("\n") + "\n";
}
