/**
 * Report Formatting
 *
 * Everything the CLI prints, as strings. Commands decide where it goes.
 */

import pc from "picocolors";
import type { Color } from "../color/index.js";
import { COLOR_ROLES, type Theme, type ThemeProperties } from "../theme/index.js";
import type { AccessibilityFinding } from "../validator/index.js";
import type { DeploymentRecord, BackupEntry } from "../deploy/index.js";
import { describeCause, type HuectlError } from "../errors.js";
import { getDiffSummary, renderDiff } from "./diff.js";

/**
 * Truecolor block, or nothing when the terminal has no color.
 */
export function swatch(color: Color): string {
  if (!pc.isColorSupported) {
    return "";
  }
  return `\x1b[48;2;${color.r};${color.g};${color.b}m    \x1b[0m `;
}

export function formatFinding(finding: AccessibilityFinding): string {
  return finding.level === "warning"
    ? pc.yellow(`⚠ ${finding.message}`)
    : pc.dim(`ℹ ${finding.message}`);
}

export function formatError(error: unknown): string {
  return pc.red(`✗ ${describeCause(error)}`);
}

export function formatFailure(failure: HuectlError): string {
  return pc.red(`✗ ${failure.toUserMessage()}`);
}

/**
 * One line per target; in a dry run the line says what would happen.
 */
export function formatRecord(record: DeploymentRecord, dryRun: boolean): string {
  const verb = dryRun && record.action !== "unchanged" ? `would be ${record.action}` : record.action;
  const mark = record.action === "unchanged" ? pc.dim("·") : pc.green("✓");
  let line = `${mark} ${record.target.padEnd(10)} ${verb}: ${record.path}`;
  if (record.backupPath) {
    line += pc.dim(` (backup: ${record.backupPath})`);
  }
  return line;
}

/**
 * Diff block for a record, shown in dry runs.
 */
export function formatRecordDiff(record: DeploymentRecord): string {
  const header = pc.bold(`--- ${record.path} (${getDiffSummary(record.previous, record.content)})`);
  return `${header}\n${renderDiff(record.previous, record.content)}`;
}

export function formatDeploySummary(
  themeName: string,
  records: readonly DeploymentRecord[],
  failureCount: number,
  dryRun: boolean
): string {
  const count = (action: DeploymentRecord["action"]) =>
    records.filter((record) => record.action === action).length;
  const parts = [
    `${count("created")} created`,
    `${count("updated")} updated`,
    `${count("unchanged")} unchanged`,
  ];
  if (failureCount > 0) {
    parts.push(pc.red(`${failureCount} failed`));
  }
  const prefix = dryRun ? `Dry run for theme '${themeName}'` : `Applied theme '${themeName}'`;
  return `${prefix}: ${parts.join(", ")}`;
}

const PROPERTY_LABELS: ReadonlyArray<readonly [keyof ThemeProperties, string]> = [
  ["border_radius", "px"],
  ["border_width", "px"],
  ["shadow_blur", "px"],
  ["animation_duration", "s"],
  ["spacing", "px"],
];

export function formatThemeDetails(theme: Theme, source?: string): string {
  const lines = [pc.bold(theme.name)];
  if (theme.description) {
    lines.push(theme.description);
  }
  if (source) {
    lines.push(pc.dim(source));
  }
  let variant: string = theme.variant ?? "unspecified";
  if (theme.variant && !theme.explicitVariant) {
    variant += " (from name)";
  }
  lines.push("", `Variant: ${variant}`);

  lines.push("", "Colors:");
  for (const role of COLOR_ROLES) {
    const color = theme.colors[role];
    if (color) {
      lines.push(`  ${swatch(color)}${role.padEnd(8)} ${color.toHex()}`);
    }
  }

  lines.push("", "Properties:");
  const present = PROPERTY_LABELS.filter(([key]) => theme.properties[key] !== undefined);
  if (present.length === 0) {
    lines.push("  (none)");
  }
  for (const [key, unit] of present) {
    lines.push(`  ${key.padEnd(18)} ${theme.properties[key]}${unit}`);
  }

  return lines.join("\n");
}

export function formatPreviewHeader(target: string): string {
  return pc.bold(`── ${target}`);
}

export function formatThemeListEntry(fileName: string, result: { name: string; description: string } | HuectlError): string {
  if ("toUserMessage" in result) {
    return `${pc.red("✗")} ${fileName.padEnd(24)} ${pc.red(result.toUserMessage().split("\n")[0] ?? "")}`;
  }
  const description = result.description ? pc.dim(` ${result.description}`) : "";
  return `${pc.green("•")} ${result.name.padEnd(24)}${description}`;
}

export function formatBackup(entry: BackupEntry): string {
  return `${entry.createdAt.toISOString()}  ${entry.path}`;
}
