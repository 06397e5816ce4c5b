/**
 * CLI Commands
 *
 * One function per subcommand. Each prints its own report and resolves to
 * false when the command should exit non-zero; thrown errors are fatal.
 */

import * as fs from "fs/promises";
import * as path from "path";
import pc from "picocolors";
import {
  DEPLOYMENT_METHODS,
  defaultSettingsPath,
  loadSettings,
  mergeWithCLIOptions,
  saveSettings,
  type ResolvedSettings,
  type Settings,
} from "../config/index.js";
import {
  deploy,
  findStaleBackups,
  listBackups,
  managedDirectories,
  pathExists,
  removeBackups,
  resolveTargets,
  restoreBackup,
  selectTargets,
} from "../deploy/index.js";
import {
  fileSafeName,
  generate,
  generateAll,
  getGenerator,
  type GenerateAllResult,
} from "../generators/index.js";
import { deriveVariant, serializeTheme, type Theme, type ThemeVariant } from "../theme/index.js";
import {
  checkAccessibility,
  loadTheme,
  parseThemeString,
  validateTheme,
} from "../validator/index.js";
import { HuectlError, isHuectlError } from "../errors.js";
import { confirm } from "./confirm.js";
import {
  formatBackup,
  formatDeploySummary,
  formatFailure,
  formatFinding,
  formatPreviewHeader,
  formatRecord,
  formatRecordDiff,
  formatThemeDetails,
  formatThemeListEntry,
} from "./report.js";
import { listThemeFiles, resolveThemePath, STARTER_THEME, STARTER_THEME_FILE } from "./themes.js";

/**
 * Options accepted by every command.
 */
export type GlobalOptions = {
  themesDir?: string;
  settings?: string;
  verbose?: boolean;
};

interface LoadedSettings {
  path: string;
  settings: Settings;
  resolved: ResolvedSettings;
}

async function loadContext(global: GlobalOptions, configDir?: string): Promise<LoadedSettings> {
  const settingsPath = global.settings ?? defaultSettingsPath();
  const settings = await loadSettings(settingsPath);
  const resolved = mergeWithCLIOptions(settings, {
    ...(global.themesDir ? { themesDir: global.themesDir } : {}),
    ...(configDir ? { configDir } : {}),
  });
  if (global.verbose) {
    console.log(pc.dim(`Settings: ${settingsPath}`));
    console.log(pc.dim(`Themes:   ${resolved.themesDir}`));
  }
  return { path: settingsPath, settings, resolved };
}

async function readTheme(themeArg: string, themesDir: string): Promise<{ theme: Theme; file: string }> {
  const file = await resolveThemePath(themeArg, themesDir);
  const content = await fs.readFile(file, "utf-8");
  return { theme: loadTheme(content), file };
}

async function writeFileCreatingDirs(file: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content, "utf-8");
}

// ─────────────────────────────────────────────────────────────────────────
// Apply
// ─────────────────────────────────────────────────────────────────────────

export interface ApplyOptions {
  apps?: string[];
  variant?: ThemeVariant;
  configDir?: string;
  dryRun?: boolean;
}

export async function applyCommand(
  themeArg: string,
  options: ApplyOptions,
  global: GlobalOptions
): Promise<boolean> {
  const { resolved } = await loadContext(global, options.configDir);
  const loaded = await readTheme(themeArg, resolved.themesDir);
  const theme = options.variant ? deriveVariant(loaded.theme, options.variant) : loaded.theme;
  const dryRun = options.dryRun ?? false;

  for (const finding of checkAccessibility(theme, { includeNotices: false })) {
    console.log(formatFinding(finding));
  }
  if (global.verbose) {
    console.log(pc.dim(`Method:   ${resolved.deploymentMethod}`));
  }

  const { plans, failures: renderFailures } = resolveTargets(theme, resolved, {
    ...(options.apps ? { targets: options.apps } : {}),
  });
  const { records, failures: deployFailures } = await deploy(plans, { dryRun });

  for (const record of records) {
    console.log(formatRecord(record, dryRun));
    if (dryRun && record.action !== "unchanged") {
      console.log(formatRecordDiff(record));
    }
  }
  const failures = [...renderFailures, ...deployFailures];
  for (const failure of failures) {
    console.error(formatFailure(failure));
  }

  console.log(formatDeploySummary(theme.name, records, failures.length, dryRun));
  return failures.length === 0;
}

// ─────────────────────────────────────────────────────────────────────────
// Inspecting Themes
// ─────────────────────────────────────────────────────────────────────────

export async function listCommand(global: GlobalOptions): Promise<boolean> {
  const { resolved } = await loadContext(global);
  const files = await listThemeFiles(resolved.themesDir);

  if (files === undefined) {
    console.log(`No themes directory at ${resolved.themesDir}. Run 'huectl init' to create one.`);
    return true;
  }
  if (files.length === 0) {
    console.log(`No themes found in ${resolved.themesDir}`);
    return true;
  }

  console.log(pc.bold(`Themes in ${resolved.themesDir}:`));
  for (const file of files) {
    const content = await fs.readFile(path.join(resolved.themesDir, file), "utf-8");
    const result = parseThemeString(content);
    console.log(formatThemeListEntry(file, result.success ? result.theme : result.error));
  }
  return true;
}

function printThemeDetails(theme: Theme, file: string): void {
  console.log(formatThemeDetails(theme, file));
  const findings = checkAccessibility(theme);
  if (findings.length > 0) {
    console.log("");
    for (const finding of findings) {
      console.log(formatFinding(finding));
    }
  }
}

export async function showCommand(themeArg: string, global: GlobalOptions): Promise<boolean> {
  const { resolved } = await loadContext(global);
  const { theme, file } = await readTheme(themeArg, resolved.themesDir);
  printThemeDetails(theme, file);
  return true;
}

export interface PreviewOptions {
  format?: string;
}

/**
 * `show` followed by the rendered output of one format, or of every format.
 */
export async function previewCommand(
  themeArg: string,
  options: PreviewOptions,
  global: GlobalOptions
): Promise<boolean> {
  const { resolved } = await loadContext(global);
  const { theme, file } = await readTheme(themeArg, resolved.themesDir);
  printThemeDetails(theme, file);

  let result: GenerateAllResult;
  if (options.format) {
    const target = getGenerator(options.format).name;
    result = { outputs: [{ target, content: generate(theme, target) }], failures: [] };
  } else {
    result = generateAll(theme);
  }
  const { outputs, failures } = result;

  for (const output of outputs) {
    console.log("");
    console.log(formatPreviewHeader(output.target));
    console.log(output.content.trimEnd());
  }
  for (const failure of failures) {
    console.error(formatFailure(failure));
  }
  return failures.length === 0;
}

export async function validateCommand(file: string): Promise<boolean> {
  const content = await fs.readFile(file, "utf-8");
  try {
    const { theme, findings } = validateTheme(content);
    console.log(pc.green(`✓ ${file}: theme '${theme.name}' is valid`));
    if (findings.length === 0) {
      console.log("No accessibility issues found");
    }
    for (const finding of findings) {
      console.log(formatFinding(finding));
    }
    return true;
  } catch (err) {
    if (isHuectlError(err)) {
      console.log(formatFailure(err));
      return false;
    }
    throw err;
  }
}

// ─────────────────────────────────────────────────────────────────────────
// Export
// ─────────────────────────────────────────────────────────────────────────

export interface ExportOptions {
  output?: string;
}

export async function exportCommand(
  themeArg: string,
  format: string,
  options: ExportOptions,
  global: GlobalOptions
): Promise<boolean> {
  const { resolved } = await loadContext(global);
  const { theme } = await readTheme(themeArg, resolved.themesDir);

  if (format.trim().toLowerCase() === "all") {
    const outputDir = path.resolve(options.output ?? ".");
    const { outputs, failures } = generateAll(theme);
    await fs.mkdir(outputDir, { recursive: true });

    for (const output of outputs) {
      const file = path.join(outputDir, `${output.target}.${getGenerator(output.target).extension}`);
      await fs.writeFile(file, output.content, "utf-8");
      console.log(`${pc.green("✓")} ${output.target.padEnd(10)} ${file}`);
    }
    for (const failure of failures) {
      console.error(formatFailure(failure));
    }
    return failures.length === 0;
  }

  const content = generate(theme, format);
  if (options.output) {
    const file = path.resolve(options.output);
    await writeFileCreatingDirs(file, content);
    console.log(`${pc.green("✓")} Wrote ${getGenerator(format).name} config to ${file}`);
  } else {
    process.stdout.write(content);
  }
  return true;
}

// ─────────────────────────────────────────────────────────────────────────
// Creating Themes
// ─────────────────────────────────────────────────────────────────────────

export async function initCommand(global: GlobalOptions): Promise<boolean> {
  const { path: settingsPath, settings, resolved } = await loadContext(global);

  if (!(await pathExists(settingsPath))) {
    await saveSettings(settings, settingsPath);
    console.log(`${pc.green("✓")} Wrote default settings to ${settingsPath}`);
  }

  await fs.mkdir(resolved.themesDir, { recursive: true });
  const existing = (await listThemeFiles(resolved.themesDir)) ?? [];
  if (existing.length > 0) {
    console.log(`Themes directory ${resolved.themesDir} already has ${existing.length} theme(s)`);
    return true;
  }

  const starter = path.join(resolved.themesDir, STARTER_THEME_FILE);
  await fs.writeFile(starter, STARTER_THEME, "utf-8");
  console.log(`${pc.green("✓")} Created starter theme at ${starter}`);
  return true;
}

export interface VariantOptions {
  force?: boolean;
}

export async function variantCreateCommand(
  themeArg: string,
  variant: ThemeVariant,
  options: VariantOptions,
  global: GlobalOptions
): Promise<boolean> {
  const { resolved } = await loadContext(global);
  const { theme } = await readTheme(themeArg, resolved.themesDir);
  const derived = deriveVariant(theme, variant);
  const file = path.join(resolved.themesDir, `${fileSafeName(derived.name)}.toml`);

  if (!options.force && (await pathExists(file))) {
    throw new HuectlError("THEME_EXISTS", `${file} already exists; pass --force to overwrite it`);
  }

  await writeFileCreatingDirs(file, serializeTheme(derived));
  console.log(`${pc.green("✓")} Created ${variant} variant '${derived.name}' at ${file}`);
  return true;
}

// ─────────────────────────────────────────────────────────────────────────
// Backups
// ─────────────────────────────────────────────────────────────────────────

export interface ConfirmableOptions {
  yes?: boolean;
}

async function confirmed(question: string, options: ConfirmableOptions): Promise<boolean> {
  if (options.yes) {
    return true;
  }
  const ok = await confirm(question);
  if (!ok) {
    console.log("Cancelled");
  }
  return ok;
}

export interface BackupsListOptions {
  configDir?: string;
}

export async function backupsListCommand(
  options: BackupsListOptions,
  global: GlobalOptions
): Promise<boolean> {
  const { resolved } = await loadContext(global, options.configDir);
  const entries = await listBackups(managedDirectories(resolved));

  if (entries.length === 0) {
    console.log("No backups found");
    return true;
  }
  for (const entry of entries) {
    console.log(formatBackup(entry));
  }
  return true;
}

export async function backupsRestoreCommand(
  backupFile: string,
  options: ConfirmableOptions
): Promise<boolean> {
  if (!(await confirmed(`Restore ${backupFile}?`, options))) {
    return true;
  }
  const result = await restoreBackup(backupFile);
  console.log(`${pc.green("✓")} Restored ${result.restored}`);
  if (result.backupPath) {
    console.log(pc.dim(`  previous content saved to ${result.backupPath}`));
  }
  return true;
}

export interface CleanOptions extends ConfirmableOptions, BackupsListOptions {
  days: number;
}

export async function backupsCleanCommand(options: CleanOptions, global: GlobalOptions): Promise<boolean> {
  const { resolved } = await loadContext(global, options.configDir);
  const stale = findStaleBackups(await listBackups(managedDirectories(resolved)), options.days);

  if (stale.length === 0) {
    console.log(`No backups older than ${options.days} days`);
    return true;
  }
  for (const entry of stale) {
    console.log(formatBackup(entry));
  }
  if (!(await confirmed(`Delete ${stale.length} backup(s)?`, options))) {
    return true;
  }
  await removeBackups(stale);
  console.log(`${pc.green("✓")} Removed ${stale.length} backup(s)`);
  return true;
}

// ─────────────────────────────────────────────────────────────────────────
// Settings
// ─────────────────────────────────────────────────────────────────────────

export async function configShowCommand(global: GlobalOptions): Promise<boolean> {
  const { path: settingsPath, resolved } = await loadContext(global);
  const appPaths = Object.entries(resolved.appPaths);

  console.log(`Settings file:      ${settingsPath}`);
  console.log(`deployment_method:  ${resolved.deploymentMethod}`);
  console.log(`themes_dir:         ${resolved.themesDir}`);
  console.log(`config_dir:         ${resolved.configDir}`);
  console.log(`nix.output_path:    ${resolved.nixOutputPath}`);
  console.log(`app_paths:          ${appPaths.length === 0 ? "(none)" : ""}`);
  for (const [app, appPath] of appPaths) {
    console.log(`  ${app}: ${appPath}`);
  }
  return true;
}

async function updateSettings(
  global: GlobalOptions,
  update: (settings: Settings) => Settings
): Promise<string> {
  const settingsPath = global.settings ?? defaultSettingsPath();
  const settings = update(await loadSettings(settingsPath));
  await saveSettings(settings, settingsPath);
  return settingsPath;
}

export async function configSetDeploymentCommand(method: string, global: GlobalOptions): Promise<boolean> {
  const found = DEPLOYMENT_METHODS.find((candidate) => candidate === method.trim().toLowerCase());
  if (!found) {
    throw new HuectlError(
      "INVALID_SETTING",
      `Unknown deployment method '${method}'. Must be one of: ${DEPLOYMENT_METHODS.join(", ")}`
    );
  }
  const file = await updateSettings(global, (settings) => ({ ...settings, deployment_method: found }));
  console.log(`${pc.green("✓")} deployment_method = ${found} (${file})`);
  return true;
}

export async function configSetPathCommand(app: string, appPath: string, global: GlobalOptions): Promise<boolean> {
  const [target] = selectTargets([app]);
  if (!target) {
    throw new HuectlError("INVALID_SETTING", `No target named '${app}'`);
  }
  const file = await updateSettings(global, (settings) => ({
    ...settings,
    app_paths: { ...settings.app_paths, [target]: appPath },
  }));
  console.log(`${pc.green("✓")} app_paths.${target} = ${appPath} (${file})`);
  return true;
}

export async function configSetNixPathCommand(nixPath: string, global: GlobalOptions): Promise<boolean> {
  const file = await updateSettings(global, (settings) => ({
    ...settings,
    nix: { ...settings.nix, output_path: nixPath },
  }));
  console.log(`${pc.green("✓")} nix.output_path = ${nixPath} (${file})`);
  return true;
}
