/**
 * Theme Module
 *
 * Theme source schema, the immutable Theme model, and variant helpers.
 */

export {
  REQUIRED_COLOR_ROLES,
  OPTIONAL_COLOR_ROLES,
  COLOR_ROLES,
  THEME_VARIANTS,
  ThemeSourceSchema,
  ColorsSourceSchema,
  PropertiesSourceSchema,
  type RequiredColorRole,
  type OptionalColorRole,
  type ColorRole,
  type ThemeVariant,
  type ThemeSource,
  type ColorsSource,
  type PropertiesSource,
} from "./schema.js";

export {
  createTheme,
  getColor,
  definedColors,
  detectVariantFromName,
  baseName,
  fullName,
  type Theme,
  type ThemeColors,
  type ThemeProperties,
  type ThemeInit,
} from "./types.js";

export { readThemeSource, serializeTheme } from "./source.js";

export { deriveVariant, invertVariant } from "./variant.js";
