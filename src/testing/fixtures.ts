/**
 * Test Fixtures
 *
 * Shared themes for unit tests.
 */

import { loadTheme } from "../validator/index.js";
import type { Theme } from "../theme/index.js";

/**
 * Only the required keys; no optional colors, no properties.
 */
export const MINIMAL_THEME_TOML = `name = "test-theme"
description = "Test theme"

[colors]
bg = "#282828"
fg = "#ebdbb2"
accent = "#fe8019"
red = "#cc241d"
green = "#98971a"
yellow = "#d79921"
blue = "#458588"
magenta = "#b16286"
cyan = "#689d6a"
`;

/**
 * Every optional color and property set.
 */
export const FULL_THEME_TOML = `name = "full-test-theme"
description = "Full test theme with all colors"
variant = "dark"

[colors]
bg = "#282828"
fg = "#ebdbb2"
accent = "#fe8019"
red = "#cc241d"
green = "#98971a"
yellow = "#d79921"
blue = "#458588"
magenta = "#b16286"
cyan = "#689d6a"
orange = "#d65d0e"
purple = "#b16286"
pink = "#d3869b"
white = "#fbf1c7"
black = "#1d2021"
gray = "#928374"

[properties]
border_radius = 8
border_width = 2
shadow_blur = 10
animation_duration = 0.2
spacing = 4
`;

export function createMinimalTheme(): Theme {
  return loadTheme(MINIMAL_THEME_TOML);
}

export function createFullTheme(): Theme {
  return loadTheme(FULL_THEME_TOML);
}

/**
 * Minimal theme TOML with some lines replaced, e.g. to drop or break a color.
 */
export function minimalThemeWith(replacements: Record<string, string | null>): string {
  return MINIMAL_THEME_TOML.split("\n")
    .flatMap((line) => {
      const key = line.split("=")[0]?.trim();
      if (key !== undefined && key in replacements) {
        const replacement = replacements[key];
        return replacement === null ? [] : [replacement];
      }
      return [line];
    })
    .join("\n");
}
