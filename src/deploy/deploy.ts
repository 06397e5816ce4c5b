/**
 * Deployment
 *
 * Writes rendered configs to their destinations, one target at a time. A
 * failing target is recorded and the rest still run.
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { DeployStrategy, GeneratorName } from "../generators/index.js";
import { DeploymentError, hasErrorCode } from "../errors.js";
import { mergeBlock } from "./block.js";
import { nextBackupPath, writeBackup } from "./backup.js";

export interface DeploymentPlan {
  target: GeneratorName;
  /** Absolute destination path */
  path: string;
  content: string;
  strategy: DeployStrategy;
}

export type DeploymentAction = "created" | "updated" | "unchanged";

export interface DeploymentRecord {
  target: GeneratorName;
  path: string;
  action: DeploymentAction;
  /** Where the previous content was (or, in a dry run, would be) copied */
  backupPath?: string;
  /** Content before deployment; absent when the file did not exist */
  previous?: string;
  /** Full file content after deployment */
  content: string;
}

export interface DeployOptions {
  dryRun?: boolean;
  /** Clock for backup names */
  now?: () => Date;
}

export interface DeployResult {
  records: DeploymentRecord[];
  failures: DeploymentError[];
}

async function readIfExists(file: string): Promise<string | undefined> {
  try {
    return await fs.readFile(file, "utf-8");
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      return undefined;
    }
    throw err;
  }
}

/**
 * Nearest existing ancestor of `dir` must be a writable directory for mkdir
 * and the write to succeed.
 */
async function checkWritableParent(dir: string): Promise<void> {
  let current = dir;
  for (;;) {
    try {
      const stat = await fs.stat(current);
      if (!stat.isDirectory()) {
        throw new Error(`${current} is not a directory`);
      }
      await fs.access(current, fs.constants.W_OK);
      return;
    } catch (err) {
      if (!hasErrorCode(err, "ENOENT")) {
        throw err;
      }
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return;
    }
    current = parent;
  }
}

async function deployOne(
  plan: DeploymentPlan,
  dryRun: boolean,
  now: () => Date
): Promise<DeploymentRecord> {
  const previous = await readIfExists(plan.path);
  const content = plan.strategy === "block" ? mergeBlock(previous, plan.content) : plan.content;
  const base = {
    target: plan.target,
    path: plan.path,
    content,
    ...(previous !== undefined ? { previous } : {}),
  };

  if (previous === content) {
    return { ...base, action: "unchanged" };
  }

  const backupPath = previous !== undefined ? await nextBackupPath(plan.path, now()) : undefined;
  const record: DeploymentRecord = {
    ...base,
    action: previous === undefined ? "created" : "updated",
    ...(backupPath ? { backupPath } : {}),
  };

  if (dryRun) {
    await checkWritableParent(path.dirname(plan.path));
    return record;
  }

  await fs.mkdir(path.dirname(plan.path), { recursive: true });
  if (backupPath) {
    await writeBackup(plan.path, backupPath);
  }
  await fs.writeFile(plan.path, content, "utf-8");
  return record;
}

/**
 * Deploy every plan in order.
 */
export async function deploy(
  plans: readonly DeploymentPlan[],
  options: DeployOptions = {}
): Promise<DeployResult> {
  const dryRun = options.dryRun ?? false;
  const now = options.now ?? (() => new Date());
  const records: DeploymentRecord[] = [];
  const failures: DeploymentError[] = [];

  for (const plan of plans) {
    try {
      records.push(await deployOne(plan, dryRun, now));
    } catch (err) {
      failures.push(new DeploymentError(plan.target, plan.path, err));
    }
  }

  return { records, failures };
}
