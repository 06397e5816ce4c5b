/**
 * GTK 4 settings (`settings.ini`) and stylesheet (`gtk.css`).
 */

import type { Theme } from "../theme/index.js";
import { commentText, cssCommentText, isDarkTheme } from "./palette.js";

export function generateGtkSettings(theme: Theme): string {
  const dark = isDarkTheme(theme);
  const preview = Array.from(commentText(theme.description)).slice(0, 60).join("");
  const name = commentText(theme.name);

  return [
    `# GTK theme configuration: ${name}`,
    "# Place this file at: ~/.config/gtk-4.0/settings.ini",
    "",
    "[Settings]",
    `gtk-application-prefer-dark-theme=${dark}`,
    `gtk-theme-name=${dark ? "Adwaita-dark" : "Adwaita"}`,
    "gtk-icon-theme-name=Adwaita",
    "gtk-cursor-theme-name=Adwaita",
    "gtk-cursor-theme-size=24",
    "",
    preview ? `# Theme: ${name} - ${preview}` : `# Theme: ${name}`,
    "",
  ].join("\n");
}

export function generateGtkCss(theme: Theme): string {
  const { colors, properties } = theme;
  const radius = properties.border_radius ?? 6;
  const width = properties.border_width ?? 1;
  const blur = properties.shadow_blur ?? 4;
  const halfRadius = Math.floor(radius / 2);

  const defines: Array<[string, string]> = [
    ["theme_bg_color", colors.bg.toHex()],
    ["theme_fg_color", colors.fg.toHex()],
    ["theme_selected_bg_color", colors.accent.toHex()],
    ["theme_selected_fg_color", colors.bg.toHex()],
    ["theme_hover_bg_color", colors.bg.lighten(0.1).toHex()],
    ["theme_active_bg_color", colors.bg.darken(0.1).toHex()],
    ["accent_color", colors.accent.toHex()],
    ["accent_hover_color", colors.accent.lighten(0.1).toHex()],
    ["error_color", colors.red.toHex()],
    ["warning_color", colors.yellow.toHex()],
    ["success_color", colors.green.toHex()],
  ];

  const shadow = (alpha: number) =>
    blur > 0 ? `  box-shadow: 0 2px ${blur}px alpha(@theme_fg_color, ${alpha});\n` : "";
  const transition =
    properties.animation_duration !== undefined
      ? `  transition: all ${Math.round(properties.animation_duration * 1000)}ms ease-in-out;\n`
      : "";

  const header =
    `/* GTK CSS theme: ${cssCommentText(theme.name)} */\n` +
    "/* Place this file at: ~/.config/gtk-4.0/gtk.css */\n\n" +
    defines.map(([key, value]) => `@define-color ${key} ${value};`).join("\n") +
    "\n\n";

  return (
    header +
    `window {
  background-color: @theme_bg_color;
  color: @theme_fg_color;
}

button {
  border-radius: ${radius}px;
  border-width: ${width}px;
  border-color: alpha(@theme_fg_color, 0.2);
  background-color: @theme_bg_color;
  color: @theme_fg_color;
${transition}}

button:hover {
  background-color: @theme_hover_bg_color;
  border-color: @accent_color;
}

button:active {
  background-color: @theme_active_bg_color;
}

button:checked {
  background-color: @accent_color;
  color: @theme_selected_fg_color;
}

entry {
  border-radius: ${radius}px;
  border-width: ${width}px;
  border-color: alpha(@theme_fg_color, 0.3);
  background-color: @theme_bg_color;
  color: @theme_fg_color;
  padding: 6px 12px;
}

entry:focus {
  border-color: @accent_color;
  box-shadow: 0 0 0 ${Math.floor(blur / 2)}px alpha(@accent_color, 0.2);
}

notebook > header > tabs > tab {
  border-radius: ${radius}px ${radius}px 0 0;
  background-color: alpha(@theme_fg_color, 0.1);
  color: @theme_fg_color;
  padding: 6px 12px;
}

notebook > header > tabs > tab:checked {
  background-color: @accent_color;
  color: @theme_selected_fg_color;
}

progressbar > trough {
  border-radius: ${radius}px;
  background-color: alpha(@theme_fg_color, 0.1);
  min-height: 4px;
}

progressbar > trough > progress {
  border-radius: ${radius}px;
  background-color: @accent_color;
}

scrollbar > trough {
  background-color: alpha(@theme_fg_color, 0.05);
  min-width: 12px;
  min-height: 12px;
}

scrollbar > trough > slider {
  border-radius: ${halfRadius}px;
  background-color: alpha(@theme_fg_color, 0.3);
  min-width: 8px;
  min-height: 8px;
}

scrollbar > trough > slider:hover {
  background-color: alpha(@theme_fg_color, 0.5);
}

menu {
  background-color: @theme_bg_color;
  color: @theme_fg_color;
  border-radius: ${radius}px;
${shadow(0.2)}}

menuitem {
  padding: 6px 12px;
  border-radius: ${halfRadius}px;
}

menuitem:hover {
  background-color: @accent_color;
  color: @theme_selected_fg_color;
}

tooltip {
  background-color: @theme_bg_color;
  color: @theme_fg_color;
  border-radius: ${radius}px;
  border: 1px solid alpha(@theme_fg_color, 0.2);
${shadow(0.3)}  padding: 6px 12px;
}

.error {
  background-color: alpha(@error_color, 0.1);
  color: @error_color;
  border: 1px solid @error_color;
}

.warning {
  background-color: alpha(@warning_color, 0.1);
  color: @warning_color;
  border: 1px solid @warning_color;
}

.success {
  background-color: alpha(@success_color, 0.1);
  color: @success_color;
  border: 1px solid @success_color;
}
`
  );
}
