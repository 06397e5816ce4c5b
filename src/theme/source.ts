/**
 * Theme Source Reader
 *
 * Reads theme TOML into a candidate ThemeSource using smol-toml for syntax
 * and Zod for the document shape. Required-field and color checks are left
 * to the validator.
 */

import { parse as parseToml, stringify as stringifyToml } from "smol-toml";
import { ThemeSourceSchema, REQUIRED_COLOR_ROLES, OPTIONAL_COLOR_ROLES, type ThemeSource } from "./schema.js";
import type { Theme } from "./types.js";
import { InvalidFieldError, ThemeSyntaxError, ValidationError } from "../errors.js";

/**
 * Parse theme TOML into a candidate theme.
 *
 * @throws ThemeSyntaxError when the text is not TOML
 * @throws ValidationError when a value has the wrong type
 */
export function readThemeSource(content: string): ThemeSource {
  let document: unknown;
  try {
    document = parseToml(content);
  } catch (err) {
    throw new ThemeSyntaxError(err instanceof Error ? err.message : String(err));
  }

  const result = ThemeSourceSchema.safeParse(document);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map(
        (issue) => new InvalidFieldError(issue.path.join(".") || "(root)", issue.message)
      )
    );
  }

  return result.data;
}

/**
 * Write a theme back out as TOML in the same layout `readThemeSource` accepts.
 */
export function serializeTheme(theme: Theme): string {
  const colors: Record<string, string> = {};
  for (const role of REQUIRED_COLOR_ROLES) {
    colors[role] = theme.colors[role].toHex();
  }
  for (const role of OPTIONAL_COLOR_ROLES) {
    const color = theme.colors[role];
    if (color) {
      colors[role] = color.toHex();
    }
  }

  const document: Record<string, unknown> = {
    name: theme.name,
    description: theme.description,
  };
  if (theme.variant && theme.explicitVariant) {
    document.variant = theme.variant;
  }
  document.colors = colors;

  const properties = Object.entries(theme.properties).filter(
    (entry): entry is [string, number] => typeof entry[1] === "number"
  );
  if (properties.length > 0) {
    document.properties = Object.fromEntries(properties);
  }

  return stringifyToml(document) + "\n";
}
