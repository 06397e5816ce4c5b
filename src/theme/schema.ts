/**
 * Theme Source Schema
 *
 * Zod schemas describing the shape of a theme TOML document.
 *
 * Every key is optional here: presence of required fields and the hex format
 * of colors are checked by the validator so that each problem can be reported
 * against its own field name.
 */

import { z } from "zod";

/**
 * Color roles every theme must define, in canonical order.
 */
export const REQUIRED_COLOR_ROLES = [
  "bg",
  "fg",
  "accent",
  "red",
  "green",
  "yellow",
  "blue",
  "magenta",
  "cyan",
] as const;

/**
 * Color roles a theme may define.
 */
export const OPTIONAL_COLOR_ROLES = [
  "orange",
  "purple",
  "pink",
  "white",
  "black",
  "gray",
] as const;

export const COLOR_ROLES = [...REQUIRED_COLOR_ROLES, ...OPTIONAL_COLOR_ROLES] as const;

export type RequiredColorRole = (typeof REQUIRED_COLOR_ROLES)[number];
export type OptionalColorRole = (typeof OPTIONAL_COLOR_ROLES)[number];
export type ColorRole = (typeof COLOR_ROLES)[number];

export const THEME_VARIANTS = ["dark", "light"] as const;

export type ThemeVariant = (typeof THEME_VARIANTS)[number];

/**
 * `[colors]` table. Values are left untyped so the validator can report a
 * non-string color against its role together with every other problem.
 */
export const ColorsSourceSchema = z.object({
  bg: z.unknown(),
  fg: z.unknown(),
  accent: z.unknown(),
  red: z.unknown(),
  green: z.unknown(),
  yellow: z.unknown(),
  blue: z.unknown(),
  magenta: z.unknown(),
  cyan: z.unknown(),
  orange: z.unknown(),
  purple: z.unknown(),
  pink: z.unknown(),
  white: z.unknown(),
  black: z.unknown(),
  gray: z.unknown(),
});

export type ColorsSource = z.infer<typeof ColorsSourceSchema>;

/**
 * `[properties]` table. Absent keys mean "let the generator decide".
 */
export const PropertiesSourceSchema = z.object({
  /** Corner radius in pixels */
  border_radius: z.number().int().nonnegative().optional(),
  /** Border width in pixels */
  border_width: z.number().int().nonnegative().optional(),
  /** Shadow blur radius in pixels */
  shadow_blur: z.number().int().nonnegative().optional(),
  /** Animation duration in seconds */
  animation_duration: z.number().nonnegative().optional(),
  /** Padding/gap in pixels */
  spacing: z.number().int().nonnegative().optional(),
});

export type PropertiesSource = z.infer<typeof PropertiesSourceSchema>;

/**
 * Whole theme document.
 */
export const ThemeSourceSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  variant: z.enum(THEME_VARIANTS).optional(),
  colors: ColorsSourceSchema.optional(),
  properties: PropertiesSourceSchema.optional(),
});

/**
 * Candidate theme, as read from source text and before validation.
 */
export type ThemeSource = z.infer<typeof ThemeSourceSchema>;
