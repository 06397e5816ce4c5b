/**
 * Accessibility Checks
 *
 * Advisory checks over a validated theme. Findings never block rendering
 * or deployment; they are reported next to a successful validation.
 */

import {
  colorDistance,
  contrastRatio,
  WCAG_AA_CONTRAST,
  WCAG_AAA_CONTRAST,
  type Color,
} from "../color/index.js";
import { definedColors, type ColorRole, type Theme } from "../theme/index.js";

/** Euclidean RGB distance below which two roles are reported as too similar. */
export const SIMILARITY_THRESHOLD = 30;

/**
 * bg/fg contrast below WCAG AA.
 */
export interface ContrastWarning {
  kind: "contrast";
  level: "warning";
  background: Color;
  foreground: Color;
  ratio: number;
  message: string;
}

/**
 * bg/fg contrast that passes AA but not AAA.
 */
export interface ContrastNotice {
  kind: "contrast-aaa";
  level: "info";
  background: Color;
  foreground: Color;
  ratio: number;
  message: string;
}

/**
 * Two distinct roles whose colors are nearly indistinguishable.
 */
export interface SimilarColorsWarning {
  kind: "similar-colors";
  level: "warning";
  roles: [ColorRole, ColorRole];
  distance: number;
  message: string;
}

export type AccessibilityFinding = ContrastWarning | ContrastNotice | SimilarColorsWarning;

/**
 * Options for {@link checkAccessibility}.
 */
export interface AccessibilityOptions {
  /** Minimum bg/fg contrast (default: 4.5) */
  minContrast?: number;
  /** Distance below which colors are too similar (default: 30) */
  similarityThreshold?: number;
  /** Report AA-but-not-AAA contrast as an info notice (default: true) */
  includeNotices?: boolean;
}

/**
 * Run the contrast and similarity checks.
 */
export function checkAccessibility(
  theme: Theme,
  options: AccessibilityOptions = {}
): AccessibilityFinding[] {
  const {
    minContrast = WCAG_AA_CONTRAST,
    similarityThreshold = SIMILARITY_THRESHOLD,
    includeNotices = true,
  } = options;

  const findings: AccessibilityFinding[] = [];
  const { bg, fg } = theme.colors;
  const ratio = contrastRatio(bg, fg);

  if (ratio < minContrast) {
    findings.push({
      kind: "contrast",
      level: "warning",
      background: bg,
      foreground: fg,
      ratio,
      message: `Background ${bg.toHex()} / foreground ${fg.toHex()} contrast ratio ${ratio.toFixed(2)}:1 is below WCAG AA (${minContrast}:1)`,
    });
  } else if (includeNotices && ratio < WCAG_AAA_CONTRAST) {
    findings.push({
      kind: "contrast-aaa",
      level: "info",
      background: bg,
      foreground: fg,
      ratio,
      message: `Background/foreground contrast ratio ${ratio.toFixed(2)}:1 meets WCAG AA but not AAA (${WCAG_AAA_CONTRAST}:1)`,
    });
  }

  findings.push(...findSimilarColors(theme, similarityThreshold));
  return findings;
}

/**
 * Every pair of distinct roles closer than `threshold`, closest first.
 */
export function findSimilarColors(
  theme: Theme,
  threshold: number = SIMILARITY_THRESHOLD
): SimilarColorsWarning[] {
  const colors = definedColors(theme);
  const similar: SimilarColorsWarning[] = [];

  for (let i = 0; i < colors.length; i++) {
    for (let j = i + 1; j < colors.length; j++) {
      const [roleA, colorA] = colors[i];
      const [roleB, colorB] = colors[j];
      const distance = colorDistance(colorA, colorB);
      if (distance < threshold) {
        similar.push({
          kind: "similar-colors",
          level: "warning",
          roles: [roleA, roleB],
          distance,
          message: `Colors '${roleA}' and '${roleB}' are very similar (distance: ${distance.toFixed(1)})`,
        });
      }
    }
  }

  // Array.prototype.sort is stable, so equal distances keep role order.
  return similar.sort((a, b) => a.distance - b.distance);
}
