/**
 * Destination Resolution
 *
 * Turns a theme and a list of target names into deployment plans according
 * to the configured method.
 */

import * as path from "path";
import type { Theme } from "../theme/index.js";
import type { ResolvedSettings } from "../config/index.js";
import {
  deployableGenerators,
  destinationPath,
  generate,
  getGenerator,
  renderHomeManagerModule,
  type GeneratorName,
} from "../generators/index.js";
import { GeneratorError, HuectlError } from "../errors.js";
import type { DeploymentPlan } from "./deploy.js";

export interface ResolveTargetsOptions {
  /** Target names; every deployable target when omitted */
  targets?: readonly string[];
}

export interface ResolvedTargets {
  plans: DeploymentPlan[];
  /** Targets whose rendering failed */
  failures: GeneratorError[];
}

/**
 * Validate requested names up front so a typo fails before anything is written.
 *
 * @throws UnknownGeneratorError
 * @throws HuectlError for a target that cannot be deployed
 */
export function selectTargets(requested?: readonly string[]): GeneratorName[] {
  if (!requested || requested.length === 0) {
    return deployableGenerators();
  }
  const selected: GeneratorName[] = [];
  for (const name of requested) {
    const generator = getGenerator(name);
    if (!generator.destination) {
      throw new HuectlError(
        "NOT_DEPLOYABLE",
        `Format '${generator.name}' cannot be deployed; use 'huectl export <theme> ${generator.name}'`
      );
    }
    if (!selected.includes(generator.name)) {
      selected.push(generator.name);
    }
  }
  return selected;
}

/**
 * Destination of one target under the configured method.
 */
export function destinationFor(
  theme: Theme,
  target: GeneratorName,
  settings: ResolvedSettings
): string {
  if (settings.deploymentMethod === "nix") {
    return path.join(settings.nixOutputPath, `${target}.nix`);
  }
  const override = settings.appPaths[target];
  if (override) {
    return override;
  }
  const template = getGenerator(target).destination;
  if (template === undefined) {
    throw new HuectlError("NOT_DEPLOYABLE", `Format '${target}' has no config file location`);
  }
  return path.join(settings.configDir, destinationPath(template, theme));
}

/**
 * Every directory deployment may write into, for finding backups without a theme.
 */
export function managedDirectories(settings: ResolvedSettings): string[] {
  if (settings.deploymentMethod === "nix") {
    return [settings.nixOutputPath];
  }
  const directories = new Set<string>();
  for (const target of deployableGenerators()) {
    const override = settings.appPaths[target];
    const template = getGenerator(target).destination;
    if (override) {
      directories.add(path.dirname(override));
    } else if (template !== undefined) {
      directories.add(path.dirname(path.join(settings.configDir, template)));
    }
  }
  return [...directories];
}

/**
 * Render and place every requested target.
 *
 * @throws UnknownGeneratorError
 * @throws HuectlError for a target that cannot be deployed
 */
export function resolveTargets(
  theme: Theme,
  settings: ResolvedSettings,
  options: ResolveTargetsOptions = {}
): ResolvedTargets {
  const plans: DeploymentPlan[] = [];
  const failures: GeneratorError[] = [];

  for (const target of selectTargets(options.targets)) {
    const filePath = destinationFor(theme, target, settings);
    try {
      if (settings.deploymentMethod === "nix") {
        plans.push({
          target,
          path: filePath,
          content: renderHomeManagerModule(theme, target),
          strategy: "replace",
        });
      } else {
        plans.push({
          target,
          path: filePath,
          content: generate(theme, target),
          strategy: getGenerator(target).strategy,
        });
      }
    } catch (err) {
      failures.push(err instanceof GeneratorError ? err : new GeneratorError(target, err));
    }
  }

  return { plans, failures };
}
