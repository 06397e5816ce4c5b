/**
 * Theme Validation Entry Points
 *
 * Source text -> candidate -> structural pass -> Theme, plus the advisory
 * accessibility findings.
 */

import { readFile } from "fs/promises";
import { readThemeSource, type Theme } from "../theme/index.js";
import { validateStructure } from "./structural.js";
import { checkAccessibility, type AccessibilityFinding, type AccessibilityOptions } from "./accessibility.js";
import { HuectlError } from "../errors.js";

/**
 * Successful validation: the theme and any advisory findings.
 */
export interface ValidationOutcome {
  theme: Theme;
  findings: AccessibilityFinding[];
}

export interface ParseThemeSuccess {
  success: true;
  theme: Theme;
}

export interface ParseThemeFailure {
  success: false;
  error: HuectlError;
}

export type ParseThemeResult = ParseThemeSuccess | ParseThemeFailure;

/**
 * Parse and structurally validate theme TOML.
 *
 * @throws ThemeSyntaxError | ValidationError
 */
export function loadTheme(content: string): Theme {
  return validateStructure(readThemeSource(content));
}

/**
 * Run both validation passes over theme TOML.
 *
 * @throws ThemeSyntaxError | ValidationError when the theme is unusable
 */
export function validateTheme(content: string, options?: AccessibilityOptions): ValidationOutcome {
  const theme = loadTheme(content);
  return { theme, findings: checkAccessibility(theme, options) };
}

/**
 * Result-returning variant of {@link loadTheme}.
 */
export function parseThemeString(content: string): ParseThemeResult {
  try {
    return { success: true, theme: loadTheme(content) };
  } catch (err) {
    if (err instanceof HuectlError) {
      return { success: false, error: err };
    }
    throw err;
  }
}

/**
 * Read and validate a theme file.
 *
 * @throws Error when the file cannot be read, otherwise as {@link loadTheme}
 */
export async function loadThemeFile(filePath: string): Promise<Theme> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new Error(
      `Failed to read theme file ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return loadTheme(content);
}
