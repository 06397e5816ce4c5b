/**
 * Generator Registry
 *
 * Closed table of every output target. Names are matched case-insensitively;
 * anything else is an UnknownGeneratorError.
 */

import type { Theme } from "../theme/index.js";
import { GeneratorError, UnknownGeneratorError } from "../errors.js";
import { generateBtop } from "./btop.js";
import { generateFastfetch } from "./fastfetch.js";
import { generateGit } from "./git.js";
import { generateGtkCss, generateGtkSettings } from "./gtk.js";
import { generateHyprland } from "./hyprland.js";
import { generateHyprpaper } from "./hyprpaper.js";
import { generateKitty } from "./kitty.js";
import { generateMako } from "./mako.js";
import { generateNeovim } from "./neovim.js";
import { generateNix } from "./nix.js";
import { generateStarship } from "./starship.js";
import { generateWaybar } from "./waybar.js";
import { generateWlogout } from "./wlogout.js";
import { generateWofi } from "./wofi.js";
import { generateYazi } from "./yazi.js";

export const GENERATOR_NAMES = [
  "kitty",
  "waybar",
  "neovim",
  "starship",
  "mako",
  "hyprland",
  "hyprpaper",
  "wofi",
  "wlogout",
  "fastfetch",
  "nix",
  "yazi",
  "gtk",
  "gtk-css",
  "btop",
  "git",
] as const;

export type GeneratorName = (typeof GENERATOR_NAMES)[number];

/**
 * How a deployed file is written: the whole file, or a marked block inside a
 * file the user also edits.
 */
export type DeployStrategy = "replace" | "block";

export interface GeneratorInfo {
  readonly name: GeneratorName;
  readonly description: string;
  /** File extension used by `export`, without the dot */
  readonly extension: string;
  /**
   * Path under the config base directory, with `{name}` standing for the
   * file-safe theme name; undefined for targets that are never deployed
   */
  readonly destination?: string;
  readonly strategy: DeployStrategy;
  readonly render: (theme: Theme) => string;
}

/**
 * Theme name reduced to characters that are safe in a file name.
 */
export function fileSafeName(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]+/g, "-");
}

const GENERATORS: Readonly<Record<GeneratorName, Omit<GeneratorInfo, "name">>> = {
  kitty: {
    description: "Terminal emulator configuration",
    extension: "conf",
    destination: "kitty/kitty.conf",
    strategy: "replace",
    render: generateKitty,
  },
  waybar: {
    description: "Status bar CSS",
    extension: "css",
    destination: "waybar/style.css",
    strategy: "replace",
    render: generateWaybar,
  },
  neovim: {
    description: "Lua color scheme",
    extension: "lua",
    destination: "nvim/colors/{name}.lua",
    strategy: "replace",
    render: generateNeovim,
  },
  starship: {
    description: "Shell prompt configuration",
    extension: "toml",
    destination: "starship.toml",
    strategy: "replace",
    render: generateStarship,
  },
  mako: {
    description: "Notification daemon colors",
    extension: "conf",
    destination: "mako/config",
    strategy: "replace",
    render: generateMako,
  },
  hyprland: {
    description: "Window manager colors",
    extension: "conf",
    destination: "hypr/hyprland.conf",
    strategy: "block",
    render: generateHyprland,
  },
  hyprpaper: {
    description: "Wallpaper manager configuration",
    extension: "conf",
    destination: "hypr/hyprpaper.conf",
    strategy: "replace",
    render: generateHyprpaper,
  },
  wofi: {
    description: "Application launcher colors",
    extension: "css",
    destination: "wofi/style.css",
    strategy: "replace",
    render: generateWofi,
  },
  wlogout: {
    description: "Logout menu colors",
    extension: "css",
    destination: "wlogout/style.css",
    strategy: "replace",
    render: generateWlogout,
  },
  fastfetch: {
    description: "System info display colors",
    extension: "jsonc",
    destination: "fastfetch/config.jsonc",
    strategy: "replace",
    render: generateFastfetch,
  },
  nix: {
    description: "Nix color attribute set",
    extension: "nix",
    strategy: "replace",
    render: generateNix,
  },
  yazi: {
    description: "File manager TOML configuration",
    extension: "toml",
    destination: "yazi/yazi.toml",
    strategy: "replace",
    render: generateYazi,
  },
  gtk: {
    description: "GTK4 settings.ini",
    extension: "ini",
    destination: "gtk-4.0/settings.ini",
    strategy: "replace",
    render: generateGtkSettings,
  },
  "gtk-css": {
    description: "GTK4 stylesheet",
    extension: "css",
    destination: "gtk-4.0/gtk.css",
    strategy: "replace",
    render: generateGtkCss,
  },
  btop: {
    description: "System monitor theme",
    extension: "theme",
    destination: "btop/themes/{name}.theme",
    strategy: "replace",
    render: generateBtop,
  },
  git: {
    description: "Git color configuration",
    extension: "conf",
    destination: "git/themes/{name}.conf",
    strategy: "replace",
    render: generateGit,
  },
};

/**
 * Destination of a target for a theme, relative to the config base directory.
 */
export function destinationPath(template: string, theme: Theme): string {
  return template.replace(/\{name\}/g, fileSafeName(theme.name));
}

/**
 * Normalize a user-supplied name, or undefined if it is not registered.
 */
export function findGeneratorName(name: string): GeneratorName | undefined {
  const wanted = name.trim().toLowerCase();
  return GENERATOR_NAMES.find((candidate) => candidate === wanted);
}

/**
 * @throws UnknownGeneratorError
 */
export function getGenerator(name: string): GeneratorInfo {
  const found = findGeneratorName(name);
  if (!found) {
    throw new UnknownGeneratorError(name, GENERATOR_NAMES);
  }
  return { name: found, ...GENERATORS[found] };
}

export function listGenerators(): GeneratorInfo[] {
  return GENERATOR_NAMES.map((name) => ({ name, ...GENERATORS[name] }));
}

/**
 * Names of the targets that can be written to disk.
 */
export function deployableGenerators(): GeneratorName[] {
  return GENERATOR_NAMES.filter((name) => GENERATORS[name].destination !== undefined);
}

/**
 * Render one target.
 *
 * @throws UnknownGeneratorError for an unknown name
 * @throws GeneratorError when rendering fails
 */
export function generate(theme: Theme, name: string): string {
  const generator = getGenerator(name);
  try {
    return generator.render(theme);
  } catch (err) {
    throw new GeneratorError(generator.name, err);
  }
}

export interface GeneratedOutput {
  readonly target: GeneratorName;
  readonly content: string;
}

export interface GenerateAllResult {
  readonly outputs: GeneratedOutput[];
  readonly failures: GeneratorError[];
}

/**
 * Render several targets; one failing target does not stop the others.
 * Unknown names are reported as failures too.
 */
export function generateAll(
  theme: Theme,
  names: readonly string[] = GENERATOR_NAMES
): GenerateAllResult {
  const outputs: GeneratedOutput[] = [];
  const failures: GeneratorError[] = [];

  for (const name of names) {
    try {
      const generator = getGenerator(name);
      outputs.push({ target: generator.name, content: generate(theme, generator.name) });
    } catch (err) {
      failures.push(err instanceof GeneratorError ? err : new GeneratorError(name, err));
    }
  }

  return { outputs, failures };
}
