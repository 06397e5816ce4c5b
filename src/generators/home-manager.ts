/**
 * Home Manager Modules
 *
 * Wraps a target's rendered config in a module that writes it through
 * `xdg.configFile`, for the nix deployment method.
 */

import type { Theme } from "../theme/index.js";
import { HuectlError } from "../errors.js";
import { commentText } from "./palette.js";
import { nixIndentedBody, nixString } from "./nix.js";
import { destinationPath, generate, getGenerator } from "./registry.js";

/**
 * @throws UnknownGeneratorError
 * @throws HuectlError when the target has no config file location
 * @throws GeneratorError
 */
export function renderHomeManagerModule(theme: Theme, target: string): string {
  const generator = getGenerator(target);
  if (!generator.destination) {
    throw new HuectlError(
      "NO_DESTINATION",
      `Format '${generator.name}' has no config file location and cannot be wrapped in a Home Manager module`
    );
  }
  const path = destinationPath(generator.destination, theme);
  const content = generate(theme, generator.name);

  return [
    `# Home Manager module for ${generator.name}: ${commentText(theme.name)}`,
    "{ ... }:",
    "{",
    `  xdg.configFile.${nixString(path)}.text = ''`,
    nixIndentedBody(content.replace(/\n$/, ""), "    "),
    "  '';",
    "}",
    "",
  ].join("\n");
}
