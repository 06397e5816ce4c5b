/**
 * Deploy Module
 *
 * Target resolution, file writing with backups, and backup management.
 */

export {
  deploy,
  type DeploymentPlan,
  type DeploymentRecord,
  type DeploymentAction,
  type DeployOptions,
  type DeployResult,
} from "./deploy.js";

export {
  resolveTargets,
  selectTargets,
  destinationFor,
  managedDirectories,
  type ResolveTargetsOptions,
  type ResolvedTargets,
} from "./targets.js";

export { mergeBlock, BLOCK_START, BLOCK_END } from "./block.js";

export {
  listBackups,
  findStaleBackups,
  removeBackups,
  restoreBackup,
  nextBackupPath,
  writeBackup,
  parseBackupPath,
  pathExists,
  type BackupEntry,
  type RestoreResult,
} from "./backup.js";
