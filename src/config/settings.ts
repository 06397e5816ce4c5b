/**
 * User Settings
 *
 * Schema and loader for `$XDG_CONFIG_HOME/huectl/config.yaml`: where themes
 * live, how they are deployed and per-app destination overrides.
 */

import { z } from "zod";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import * as yaml from "js-yaml";
import { hasErrorCode } from "../errors.js";

export const DEPLOYMENT_METHODS = ["standard", "nix"] as const;

export type DeploymentMethod = (typeof DEPLOYMENT_METHODS)[number];

export const SettingsSchema = z.object({
  /** standard writes app configs directly; nix writes Home Manager modules */
  deployment_method: z.enum(DEPLOYMENT_METHODS).default("standard"),
  themes_dir: z.string().optional(),
  /** Target name → destination file, overriding the default location */
  app_paths: z.record(z.string(), z.string()).default({}),
  nix: z
    .object({
      output_path: z.string().optional(),
    })
    .default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Where the process looks for the home and config directories.
 */
export interface SettingsEnvironment {
  home: string;
  xdgConfigHome?: string;
}

export function currentEnvironment(): SettingsEnvironment {
  const xdgConfigHome = process.env.XDG_CONFIG_HOME;
  return {
    home: os.homedir(),
    ...(xdgConfigHome ? { xdgConfigHome } : {}),
  };
}

/**
 * Base directory app configs live under (`$XDG_CONFIG_HOME`, else `~/.config`).
 */
export function configHome(env: SettingsEnvironment = currentEnvironment()): string {
  return env.xdgConfigHome ?? path.join(env.home, ".config");
}

export function defaultSettingsPath(env: SettingsEnvironment = currentEnvironment()): string {
  return path.join(configHome(env), "huectl", "config.yaml");
}

export function defaultThemesDir(env: SettingsEnvironment = currentEnvironment()): string {
  return path.join(configHome(env), "huectl", "themes");
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(p: string, home: string = os.homedir()): string {
  if (p === "~") {
    return home;
  }
  if (p.startsWith("~/")) {
    return path.join(home, p.slice(2));
  }
  return p;
}

export function getDefaultSettings(): Settings {
  return SettingsSchema.parse({});
}

/**
 * Load settings; a missing file means defaults.
 *
 * @throws Error if the file can't be read or fails validation
 */
export async function loadSettings(settingsPath: string = defaultSettingsPath()): Promise<Settings> {
  let content: string;
  try {
    content = await fs.readFile(settingsPath, "utf-8");
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      return getDefaultSettings();
    }
    throw err;
  }

  const parsed = yaml.load(content) ?? {};
  const result = SettingsSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid settings in ${settingsPath}:\n${issues}`);
  }

  return result.data;
}

/**
 * Write settings as YAML, creating the parent directory. Unset keys are left out.
 */
export async function saveSettings(
  settings: Settings,
  settingsPath: string = defaultSettingsPath()
): Promise<void> {
  const document: Record<string, unknown> = {
    deployment_method: settings.deployment_method,
  };
  if (settings.themes_dir !== undefined) {
    document.themes_dir = settings.themes_dir;
  }
  if (Object.keys(settings.app_paths).length > 0) {
    document.app_paths = settings.app_paths;
  }
  if (settings.nix.output_path !== undefined) {
    document.nix = { output_path: settings.nix.output_path };
  }

  await fs.mkdir(path.dirname(settingsPath), { recursive: true });
  await fs.writeFile(settingsPath, yaml.dump(document), "utf-8");
}

/**
 * Settings with every path absolute and every default filled in.
 */
export interface ResolvedSettings {
  deploymentMethod: DeploymentMethod;
  themesDir: string;
  /** Base directory for standard deployment */
  configDir: string;
  appPaths: Record<string, string>;
  nixOutputPath: string;
}

/**
 * Command-line overrides.
 */
export interface CLISettingsOptions {
  themesDir?: string;
  configDir?: string;
}

/**
 * Merge settings with CLI options. CLI options take precedence.
 */
export function mergeWithCLIOptions(
  settings: Settings,
  cliOptions: CLISettingsOptions,
  env: SettingsEnvironment = currentEnvironment()
): ResolvedSettings {
  const expand = (p: string) => path.resolve(expandHome(p, env.home));
  const configDir = expand(cliOptions.configDir ?? configHome(env));

  const appPaths: Record<string, string> = {};
  for (const [app, appPath] of Object.entries(settings.app_paths)) {
    appPaths[app.toLowerCase()] = expand(appPath);
  }

  return {
    deploymentMethod: settings.deployment_method,
    themesDir: expand(cliOptions.themesDir ?? settings.themes_dir ?? defaultThemesDir(env)),
    configDir,
    appPaths,
    nixOutputPath: expand(settings.nix.output_path ?? path.join(configDir, "home-manager", "huectl")),
  };
}
