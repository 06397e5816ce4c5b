/**
 * Theme Model
 *
 * The validated, immutable in-memory theme handed to every generator.
 */

import type { Color } from "../color/index.js";
import {
  REQUIRED_COLOR_ROLES,
  OPTIONAL_COLOR_ROLES,
  type ColorRole,
  type OptionalColorRole,
  type RequiredColorRole,
  type ThemeVariant,
} from "./schema.js";

/**
 * Required colors are always present; optional ones only when the source defines them.
 */
export type ThemeColors = Readonly<
  Record<RequiredColorRole, Color> & Partial<Record<OptionalColorRole, Color>>
>;

/**
 * Numeric knobs. An absent key is distinct from zero.
 */
export interface ThemeProperties {
  readonly border_radius?: number;
  readonly border_width?: number;
  readonly shadow_blur?: number;
  /** Seconds */
  readonly animation_duration?: number;
  readonly spacing?: number;
}

export interface Theme {
  readonly name: string;
  readonly description: string;
  /** Declared variant, or the one implied by the name suffix */
  readonly variant?: ThemeVariant;
  /** Whether `variant` came from the source rather than the name */
  readonly explicitVariant: boolean;
  readonly colors: ThemeColors;
  readonly properties: ThemeProperties;
}

/**
 * Input for {@link createTheme}.
 */
export interface ThemeInit {
  name: string;
  description?: string;
  variant?: ThemeVariant;
  colors: Record<RequiredColorRole, Color> & Partial<Record<OptionalColorRole, Color>>;
  properties?: ThemeProperties;
}

const VARIANT_SUFFIXES: ReadonlyArray<readonly [string, ThemeVariant]> = [
  ["-darkest", "dark"],
  ["-lightest", "light"],
  ["-dark", "dark"],
  ["-light", "light"],
];

/**
 * Build a frozen Theme. Callers must pass already-validated values.
 */
export function createTheme(init: ThemeInit): Theme {
  const optional: Partial<Record<OptionalColorRole, Color>> = {};
  for (const role of OPTIONAL_COLOR_ROLES) {
    const color = init.colors[role];
    if (color) {
      optional[role] = color;
    }
  }
  const colors: ThemeColors = Object.freeze({
    bg: init.colors.bg,
    fg: init.colors.fg,
    accent: init.colors.accent,
    red: init.colors.red,
    green: init.colors.green,
    yellow: init.colors.yellow,
    blue: init.colors.blue,
    magenta: init.colors.magenta,
    cyan: init.colors.cyan,
    ...optional,
  });

  const properties: ThemeProperties = Object.freeze({ ...(init.properties ?? {}) });
  const variant = init.variant ?? detectVariantFromName(init.name);

  return Object.freeze({
    name: init.name,
    description: init.description ?? "",
    ...(variant ? { variant } : {}),
    explicitVariant: init.variant !== undefined,
    colors,
    properties,
  });
}

/**
 * Look up a color by role; optional roles may be undefined.
 */
export function getColor(theme: Theme, role: RequiredColorRole): Color;
export function getColor(theme: Theme, role: ColorRole): Color | undefined;
export function getColor(theme: Theme, role: ColorRole): Color | undefined {
  return theme.colors[role];
}

/**
 * All defined colors: required roles in canonical order, then present optional roles.
 */
export function definedColors(theme: Theme): Array<[ColorRole, Color]> {
  const result: Array<[ColorRole, Color]> = REQUIRED_COLOR_ROLES.map(
    (role): [ColorRole, Color] => [role, theme.colors[role]]
  );
  for (const role of OPTIONAL_COLOR_ROLES) {
    const color = theme.colors[role];
    if (color) {
      result.push([role, color]);
    }
  }
  return result;
}

/**
 * Variant implied by a `-dark`, `-darkest`, `-light` or `-lightest` suffix.
 */
export function detectVariantFromName(name: string): ThemeVariant | undefined {
  const lower = name.toLowerCase();
  for (const [suffix, variant] of VARIANT_SUFFIXES) {
    if (lower.endsWith(suffix)) {
      return variant;
    }
  }
  return undefined;
}

/**
 * Name without its variant suffix, e.g. "gruvbox-dark" -> "gruvbox".
 */
export function baseName(name: string): string {
  const lower = name.toLowerCase();
  for (const [suffix] of VARIANT_SUFFIXES) {
    if (lower.endsWith(suffix)) {
      return name.slice(0, name.length - suffix.length);
    }
  }
  return name;
}

/**
 * `<base>-<variant>` when the theme has a variant, otherwise the name.
 */
export function fullName(theme: Theme): string {
  return theme.variant ? `${baseName(theme.name)}-${theme.variant}` : theme.name;
}
