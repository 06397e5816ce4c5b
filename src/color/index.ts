/**
 * Color Module
 */

export {
  Color,
  parseColor,
  isHexColor,
  colorDistance,
  relativeLuminance,
  contrastRatio,
  WCAG_AA_CONTRAST,
  WCAG_AAA_CONTRAST,
} from "./color.js";
