#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line wiring for huectl. Commands live in commands.ts; this file only
 * parses arguments and turns failures into exit codes.
 */

import { Command, InvalidArgumentError } from "commander";
import { realpathSync } from "fs";
import { fileURLToPath } from "url";
import { THEME_VARIANTS, type ThemeVariant } from "../theme/index.js";
import {
  applyCommand,
  backupsCleanCommand,
  backupsListCommand,
  backupsRestoreCommand,
  configSetDeploymentCommand,
  configSetNixPathCommand,
  configSetPathCommand,
  configShowCommand,
  exportCommand,
  initCommand,
  listCommand,
  previewCommand,
  showCommand,
  validateCommand,
  variantCreateCommand,
  type GlobalOptions,
  type PreviewOptions,
} from "./commands.js";
import { formatError } from "./report.js";

interface ApplyCLIOptions {
  apps?: string[];
  variant?: ThemeVariant;
  configDir?: string;
  dryRun?: boolean;
}

/**
 * Parse a comma-separated list of target names.
 */
function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseVariant(value: string): ThemeVariant {
  const variant = THEME_VARIANTS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!variant) {
    throw new InvalidArgumentError(`Must be one of: ${THEME_VARIANTS.join(", ")}`);
  }
  return variant;
}

function parseDays(value: string): number {
  const days = Number(value);
  if (!Number.isInteger(days) || days < 0) {
    throw new InvalidArgumentError("Must be a non-negative whole number of days");
  }
  return days;
}

/**
 * Wrap a command so an error or a false result exits with status 1.
 */
function handle<Args extends unknown[]>(
  fn: (...args: Args) => Promise<boolean>
): (...args: Args) => Promise<void> {
  return async (...args: Args) => {
    let ok: boolean;
    try {
      ok = await fn(...args);
    } catch (err) {
      console.error(formatError(err));
      ok = false;
    }
    if (!ok) {
      process.exit(1);
    }
  };
}

/**
 * Build the commander program.
 */
export function createProgram(): Command {
  const program = new Command();
  const globals = () => program.opts<GlobalOptions>();

  program
    .name("huectl")
    .description("Generate and deploy desktop application themes from one TOML file")
    .version("0.1.0")
    .option("--themes-dir <dir>", "Directory containing theme files")
    .option("--settings <file>", "Settings file (default: $XDG_CONFIG_HOME/huectl/config.yaml)")
    .option("-v, --verbose", "Verbose output");

  program
    .command("apply")
    .description("Render a theme and deploy it to application config files")
    .argument("<theme>", "Theme name or path to a theme file")
    .option("--apps <list>", "Comma-separated targets (default: all)", parseList)
    .option("--variant <variant>", "Derive a dark or light variant first", parseVariant)
    .option("--config-dir <dir>", "Base directory for application configs")
    .option("--dry-run", "Show what would change without writing")
    .action(
      handle(async (theme: string, options: ApplyCLIOptions) =>
        applyCommand(theme, options, globals())
      )
    );

  program
    .command("list")
    .description("List themes in the themes directory")
    .action(handle(async () => listCommand(globals())));

  program
    .command("show")
    .description("Show a theme's colors and properties")
    .argument("<theme>", "Theme name or path to a theme file")
    .action(handle(async (theme: string) => showCommand(theme, globals())));

  program
    .command("preview")
    .description("Show a theme and the configs it renders to")
    .argument("<theme>", "Theme name or path to a theme file")
    .option("--format <name>", "Render only this format")
    .action(
      handle(async (theme: string, options: PreviewOptions) => previewCommand(theme, options, globals()))
    );

  program
    .command("validate")
    .description("Check a theme file for errors and accessibility issues")
    .argument("<file>", "Theme file")
    .action(handle(async (file: string) => validateCommand(file)));

  program
    .command("export")
    .description("Render one format (or all) to stdout or files")
    .argument("<theme>", "Theme name or path to a theme file")
    .argument("<format>", "Target format, or 'all'")
    .option("-o, --output <path>", "Output file, or output directory for 'all'")
    .action(
      handle(async (theme: string, format: string, options: { output?: string }) =>
        exportCommand(theme, format, options, globals())
      )
    );

  program
    .command("init")
    .description("Create the settings file and a starter theme")
    .action(handle(async () => initCommand(globals())));

  const variant = program.command("variant").description("Work with theme variants");
  variant
    .command("create")
    .description("Save a dark or light variant of a theme")
    .argument("<theme>", "Theme name or path to a theme file")
    .argument("<variant>", "dark or light", parseVariant)
    .option("--force", "Overwrite an existing theme file")
    .action(
      handle(async (theme: string, which: ThemeVariant, options: { force?: boolean }) =>
        variantCreateCommand(theme, which, options, globals())
      )
    );

  const backups = program.command("backups").description("Manage backups of deployed files");
  backups
    .command("list")
    .description("List backups next to deployed files")
    .option("--config-dir <dir>", "Base directory for application configs")
    .action(
      handle(async (options: { configDir?: string }) => backupsListCommand(options, globals()))
    );
  backups
    .command("restore")
    .description("Restore a backup over the file it was taken from")
    .argument("<file>", "Backup file")
    .option("-y, --yes", "Do not ask for confirmation")
    .action(
      handle(async (file: string, options: { yes?: boolean }) => backupsRestoreCommand(file, options))
    );
  backups
    .command("clean")
    .description("Delete old backups")
    .option("--days <n>", "Age in days after which a backup is deleted", parseDays, 30)
    .option("--config-dir <dir>", "Base directory for application configs")
    .option("-y, --yes", "Do not ask for confirmation")
    .action(
      handle(async (options: { days: number; yes?: boolean; configDir?: string }) =>
        backupsCleanCommand(options, globals())
      )
    );

  const config = program.command("config").description("Show or change settings");
  config
    .command("show")
    .description("Show effective settings")
    .action(handle(async () => configShowCommand(globals())));
  config
    .command("set-deployment")
    .description("Set the deployment method (standard or nix)")
    .argument("<method>", "standard or nix")
    .action(handle(async (method: string) => configSetDeploymentCommand(method, globals())));
  config
    .command("set-path")
    .description("Override where one target is deployed")
    .argument("<app>", "Target name")
    .argument("<path>", "Destination file")
    .action(
      handle(async (app: string, appPath: string) => configSetPathCommand(app, appPath, globals()))
    );
  config
    .command("set-nix-path")
    .description("Set the directory Home Manager modules are written to")
    .argument("<path>", "Output directory")
    .action(handle(async (nixPath: string) => configSetNixPathCommand(nixPath, globals())));

  return program;
}

/**
 * Main CLI execution.
 */
export async function runCLI(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

// Run CLI if this is the main module
// Handle symlinks by resolving the real path
function isMainModule(): boolean {
  try {
    const currentFile = fileURLToPath(import.meta.url);
    const entryFile = realpathSync(process.argv[1] ?? "");
    return currentFile === entryFile;
  } catch {
    return false;
  }
}

const isTestEnvironment = typeof process !== "undefined" && !!process.env.VITEST;

if (!isTestEnvironment && isMainModule()) {
  runCLI().catch((err: unknown) => {
    console.error(formatError(err));
    process.exit(1);
  });
}
