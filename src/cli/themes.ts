/**
 * Theme Files
 *
 * Locating theme files by name or path inside the themes directory.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { HuectlError, hasErrorCode } from "../errors.js";
import { pathExists } from "../deploy/index.js";

/**
 * Sorted `*.toml` file names in `themesDir`, or undefined if the directory does not exist.
 */
export async function listThemeFiles(themesDir: string): Promise<string[] | undefined> {
  let names: string[];
  try {
    names = await fs.readdir(themesDir);
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      return undefined;
    }
    throw err;
  }
  return names.filter((name) => name.endsWith(".toml")).sort();
}

/**
 * A theme argument is a path when it names a `.toml` file or contains a
 * separator; otherwise it is a theme name in `themesDir`.
 *
 * @throws HuectlError when no such theme exists
 */
export async function resolveThemePath(theme: string, themesDir: string): Promise<string> {
  const isPath = theme.endsWith(".toml") || theme.includes("/") || theme.includes(path.sep);
  const candidate = isPath ? path.resolve(theme) : path.join(themesDir, `${theme}.toml`);

  if (await pathExists(candidate)) {
    return candidate;
  }
  throw new HuectlError(
    "THEME_NOT_FOUND",
    isPath ? `Theme file not found: ${candidate}` : `Theme '${theme}' not found in ${themesDir}`
  );
}

export const STARTER_THEME_FILE = "starter-dark.toml";

export const STARTER_THEME = `name = "starter-dark"
description = "Starter theme created by huectl init"
variant = "dark"

[colors]
bg = "#1e2127"
fg = "#d8dee9"
accent = "#e5a46c"
red = "#e06c75"
green = "#98c379"
yellow = "#e5c07b"
blue = "#61afef"
magenta = "#c678dd"
cyan = "#56b6c2"
gray = "#5c6370"

[properties]
border_radius = 6
border_width = 2
shadow_blur = 8
animation_duration = 0.2
spacing = 6
`;
