/**
 * Hyprpaper wallpaper config.
 *
 * Points at `~/.config/hypr/wallpapers/<base name>.png`, so light and dark
 * variants of one theme share a wallpaper.
 */

import { baseName, type Theme } from "../theme/index.js";
import { commentText } from "./palette.js";

export function wallpaperPath(theme: Theme): string {
  return `~/.config/hypr/wallpapers/${baseName(theme.name)}.png`;
}

export function generateHyprpaper(theme: Theme): string {
  const wallpaper = wallpaperPath(theme);
  return [
    `# Hyprpaper configuration: ${commentText(theme.name)}`,
    `# Background color: ${theme.colors.bg}`,
    "",
    `preload = ${wallpaper}`,
    `wallpaper = ,${wallpaper}`,
    "splash = false",
    "ipc = on",
    "",
  ].join("\n");
}
