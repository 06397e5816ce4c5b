/**
 * Config Module
 *
 * User settings schema, loading and path resolution.
 */

export {
  SettingsSchema,
  DEPLOYMENT_METHODS,
  type DeploymentMethod,
  type Settings,
  type SettingsEnvironment,
  type ResolvedSettings,
  type CLISettingsOptions,
  currentEnvironment,
  configHome,
  defaultSettingsPath,
  defaultThemesDir,
  expandHome,
  getDefaultSettings,
  loadSettings,
  saveSettings,
  mergeWithCLIOptions,
} from "./settings.js";
