/**
 * Validator Module
 */

export { findStructuralProblems, validateStructure } from "./structural.js";

export {
  checkAccessibility,
  findSimilarColors,
  SIMILARITY_THRESHOLD,
  type AccessibilityFinding,
  type AccessibilityOptions,
  type ContrastWarning,
  type ContrastNotice,
  type SimilarColorsWarning,
} from "./accessibility.js";

export {
  loadTheme,
  loadThemeFile,
  validateTheme,
  parseThemeString,
  type ValidationOutcome,
  type ParseThemeResult,
  type ParseThemeSuccess,
  type ParseThemeFailure,
} from "./validate.js";
