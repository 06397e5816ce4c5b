/**
 * Nix attribute set of the theme, plus Nix string helpers shared with the
 * Home Manager wrapper.
 */

import { definedColors, type Theme, type ThemeProperties } from "../theme/index.js";
import { commentText } from "./palette.js";

/** Double-quoted Nix string literal. */
export function nixString(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\$\{/g, "\\${")
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
  return `"${escaped}"`;
}

/**
 * Body of a Nix indented string (`'' ... ''`), each line prefixed with `indent`.
 */
export function nixIndentedBody(text: string, indent: string): string {
  return text
    .replace(/''/g, "'''")
    .replace(/\$\{/g, "''${")
    .split("\n")
    .map((line) => (line === "" ? "" : indent + line))
    .join("\n");
}

const PROPERTY_KEYS: ReadonlyArray<keyof ThemeProperties> = [
  "border_radius",
  "border_width",
  "shadow_blur",
  "animation_duration",
  "spacing",
];

export function generateNix(theme: Theme): string {
  const lines = [
    `# Nix color scheme: ${commentText(theme.name)}`,
    "{",
    `  name = ${nixString(theme.name)};`,
    `  description = ${nixString(theme.description)};`,
  ];
  if (theme.variant) {
    lines.push(`  variant = ${nixString(theme.variant)};`);
  }

  lines.push("  colors = {");
  for (const [role, color] of definedColors(theme)) {
    lines.push(`    ${role} = ${nixString(color.toHex())};`);
  }
  lines.push("  };");

  const properties = PROPERTY_KEYS.flatMap((key) => {
    const value = theme.properties[key];
    return value === undefined ? [] : [`    ${key} = ${value};`];
  });
  if (properties.length > 0) {
    lines.push("  properties = {", ...properties, "  };");
  }

  lines.push("}");
  return lines.join("\n") + "\n";
}
