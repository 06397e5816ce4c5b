/**
 * Generators Module
 *
 * One pure renderer per target plus the registry that names them.
 */

export {
  GENERATOR_NAMES,
  getGenerator,
  findGeneratorName,
  listGenerators,
  deployableGenerators,
  generate,
  generateAll,
  fileSafeName,
  destinationPath,
  type GeneratorName,
  type GeneratorInfo,
  type DeployStrategy,
  type GeneratedOutput,
  type GenerateAllResult,
} from "./registry.js";

export { renderHomeManagerModule } from "./home-manager.js";
export { isDarkTheme, ansiPalette } from "./palette.js";
export { nixString } from "./nix.js";
export { wallpaperPath } from "./hyprpaper.js";
