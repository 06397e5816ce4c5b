/**
 * Structural Validation
 *
 * Turns a candidate ThemeSource into a Theme, collecting every missing or
 * malformed field before failing so the user sees all problems at once.
 */

import { Color, isHexColor } from "../color/index.js";
import {
  REQUIRED_COLOR_ROLES,
  OPTIONAL_COLOR_ROLES,
  createTheme,
  type ColorRole,
  type ColorsSource,
  type OptionalColorRole,
  type RequiredColorRole,
  type Theme,
  type ThemeSource,
} from "../theme/index.js";
import {
  InvalidColorFormatError,
  InvalidFieldError,
  MissingRequiredFieldError,
  ValidationError,
  type StructuralProblem,
} from "../errors.js";

function isColorValue(value: unknown): value is string {
  return typeof value === "string" && isHexColor(value);
}

/**
 * List every structural problem in a candidate theme.
 */
export function findStructuralProblems(source: ThemeSource): StructuralProblem[] {
  const problems: StructuralProblem[] = [];

  if (source.name === undefined) {
    problems.push(new MissingRequiredFieldError("name"));
  } else if (source.name.trim() === "") {
    problems.push(new InvalidFieldError("name", "must not be empty"));
  }

  const colors: ColorsSource = source.colors ?? {};
  for (const role of REQUIRED_COLOR_ROLES) {
    const value = colors[role];
    if (value === undefined) {
      problems.push(new MissingRequiredFieldError(`colors.${role}`));
    } else if (!isColorValue(value)) {
      problems.push(new InvalidColorFormatError(`colors.${role}`, String(value)));
    }
  }
  for (const role of OPTIONAL_COLOR_ROLES) {
    const value = colors[role];
    if (value !== undefined && !isColorValue(value)) {
      problems.push(new InvalidColorFormatError(`colors.${role}`, String(value)));
    }
  }

  return problems;
}

/**
 * Validate a candidate theme and build the immutable Theme.
 *
 * @throws ValidationError listing every problem found
 */
export function validateStructure(source: ThemeSource): Theme {
  const problems = findStructuralProblems(source);
  if (problems.length > 0) {
    throw new ValidationError(problems);
  }

  const colorsSource: ColorsSource = source.colors ?? {};
  const colorAt = (role: ColorRole): Color | undefined => {
    const value = colorsSource[role];
    return isColorValue(value) ? Color.parse(value, `colors.${role}`) : undefined;
  };
  const required = (role: RequiredColorRole): Color => {
    const color = colorAt(role);
    if (color === undefined) {
      throw new ValidationError([new MissingRequiredFieldError(`colors.${role}`)]);
    }
    return color;
  };

  const optional: Partial<Record<OptionalColorRole, Color>> = {};
  for (const role of OPTIONAL_COLOR_ROLES) {
    const color = colorAt(role);
    if (color !== undefined) {
      optional[role] = color;
    }
  }

  return createTheme({
    name: source.name ?? "",
    description: source.description,
    variant: source.variant,
    colors: {
      bg: required("bg"),
      fg: required("fg"),
      accent: required("accent"),
      red: required("red"),
      green: required("green"),
      yellow: required("yellow"),
      blue: required("blue"),
      magenta: required("magenta"),
      cyan: required("cyan"),
      ...optional,
    },
    properties: source.properties,
  });
}
