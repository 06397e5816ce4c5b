/**
 * Theme Variants
 *
 * Derive a dark theme from a light one and vice versa.
 */

import type { Color } from "../color/index.js";
import { OPTIONAL_COLOR_ROLES, type OptionalColorRole, type ThemeVariant } from "./schema.js";
import { baseName, createTheme, type Theme } from "./types.js";

interface VariantFactors {
  bg: number;
  fg: number;
  palette: number;
}

const DARK_FACTORS: VariantFactors = { bg: 0.85, fg: 0.15, palette: 0.2 };
const LIGHT_FACTORS: VariantFactors = { bg: 0.75, fg: 0.25, palette: 0.3 };

/**
 * Build the `<base>-<variant>` theme.
 *
 * When the source already is of the requested kind (judged by its background)
 * only the name and variant change. Otherwise bg and fg are pushed to the other
 * end of the scale and palette colors are lightened (for dark) or darkened
 * (for light) so they stay readable on the new background.
 */
export function deriveVariant(theme: Theme, variant: ThemeVariant): Theme {
  const name = `${baseName(theme.name)}-${variant}`;
  const sourceIsDark = !theme.colors.bg.isLight();
  const toDark = variant === "dark";

  if (sourceIsDark === toDark) {
    return createTheme({
      name,
      description: theme.description,
      variant,
      colors: { ...theme.colors },
      properties: theme.properties,
    });
  }

  const factors = toDark ? DARK_FACTORS : LIGHT_FACTORS;
  const adjust = (color: Color): Color =>
    toDark ? color.lighten(factors.palette) : color.darken(factors.palette);

  const optional: Partial<Record<OptionalColorRole, Color>> = {};
  for (const role of OPTIONAL_COLOR_ROLES) {
    const color = theme.colors[role];
    if (color) {
      optional[role] = adjust(color);
    }
  }

  const { colors } = theme;
  return createTheme({
    name,
    description: theme.description ? `${theme.description} (${variant})` : `(${variant})`,
    variant,
    colors: {
      bg: toDark ? colors.bg.darken(factors.bg) : colors.bg.lighten(factors.bg),
      fg: toDark ? colors.fg.lighten(factors.fg) : colors.fg.darken(factors.fg),
      accent: adjust(colors.accent),
      red: adjust(colors.red),
      green: adjust(colors.green),
      yellow: adjust(colors.yellow),
      blue: adjust(colors.blue),
      magenta: adjust(colors.magenta),
      cyan: adjust(colors.cyan),
      ...optional,
    },
    properties: theme.properties,
  });
}

/**
 * Derive the opposite of the theme's current variant (dark when unknown).
 */
export function invertVariant(theme: Theme): Theme {
  return deriveVariant(theme, theme.variant === "dark" ? "light" : "dark");
}
