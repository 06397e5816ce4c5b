/**
 * Color Model
 *
 * Immutable RGB colors with hex parsing and the arithmetic the generators and
 * the accessibility checks need. Derived colors are always new instances.
 */

import { InvalidColorFormatError } from "../errors.js";

const HEX_COLOR = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;

/** WCAG AA minimum contrast for normal text. */
export const WCAG_AA_CONTRAST = 4.5;

/** WCAG AAA minimum contrast for normal text. */
export const WCAG_AAA_CONTRAST = 7;

/**
 * An 8-bit-per-channel RGB color without alpha.
 */
export class Color {
  private constructor(
    readonly r: number,
    readonly g: number,
    readonly b: number
  ) {
    Object.freeze(this);
  }

  /**
   * Build a color from channel values. Channels are rounded and clamped to [0, 255].
   */
  static fromRgb(r: number, g: number, b: number): Color {
    return new Color(clampChannel(r), clampChannel(g), clampChannel(b));
  }

  /**
   * Parse `#RRGGBB` or `RRGGBB` (any case).
   *
   * @param field - Name reported in the error when the text is not a color
   * @throws InvalidColorFormatError
   */
  static parse(text: string, field = "color"): Color {
    const match = HEX_COLOR.exec(text);
    if (!match) {
      throw new InvalidColorFormatError(field, text);
    }
    return new Color(
      Number.parseInt(match[1], 16),
      Number.parseInt(match[2], 16),
      Number.parseInt(match[3], 16)
    );
  }

  /**
   * Canonical lower-case `#rrggbb` form.
   */
  toHex(): string {
    return `#${toHexByte(this.r)}${toHexByte(this.g)}${toHexByte(this.b)}`;
  }

  /**
   * Channels as `"r, g, b"`, for `rgba(...)` style syntaxes.
   */
  toRgbString(): string {
    return `${this.r}, ${this.g}, ${this.b}`;
  }

  toString(): string {
    return this.toHex();
  }

  equals(other: Color): boolean {
    return this.r === other.r && this.g === other.g && this.b === other.b;
  }

  /**
   * Move every channel toward 255 by `amount` (0–1).
   */
  lighten(amount: number): Color {
    const t = clampAmount(amount);
    return this.map((c) => c + (255 - c) * t);
  }

  /**
   * Move every channel toward 0 by `amount` (0–1).
   */
  darken(amount: number): Color {
    const t = clampAmount(amount);
    return this.map((c) => c * (1 - t));
  }

  /**
   * Muted variant: pull each channel toward the color's luma gray by `amount`,
   * then drop brightness by half of `amount`.
   */
  dim(amount: number): Color {
    const t = clampAmount(amount);
    const gray = 0.299 * this.r + 0.587 * this.g + 0.114 * this.b;
    return this.map((c) => (c + (gray - c) * t) * (1 - t / 2));
  }

  /**
   * Linear blend toward `other`; `weight` 0 keeps this color, 1 gives `other`.
   */
  mix(other: Color, weight: number): Color {
    const t = clampAmount(weight);
    return Color.fromRgb(
      this.r + (other.r - this.r) * t,
      this.g + (other.g - this.g) * t,
      this.b + (other.b - this.b) * t
    );
  }

  /**
   * True when relative luminance is above 0.5.
   */
  isLight(): boolean {
    return relativeLuminance(this) > 0.5;
  }

  private map(fn: (channel: number) => number): Color {
    return Color.fromRgb(fn(this.r), fn(this.g), fn(this.b));
  }
}

/**
 * Parse a hex color.
 *
 * @throws InvalidColorFormatError
 */
export function parseColor(text: string, field?: string): Color {
  return Color.parse(text, field);
}

/**
 * Whether `text` is a valid `#RRGGBB` / `RRGGBB` color.
 */
export function isHexColor(text: string): boolean {
  return HEX_COLOR.test(text);
}

/**
 * Euclidean distance between two colors in RGB space (0 to ~441.67).
 */
export function colorDistance(a: Color, b: Color): number {
  const dr = a.r - b.r;
  const dg = a.g - b.g;
  const db = a.b - b.b;
  return Math.sqrt(dr * dr + dg * dg + db * db);
}

/**
 * WCAG 2.0 relative luminance, 0 (black) to 1 (white).
 */
export function relativeLuminance(color: Color): number {
  return (
    0.2126 * linearize(color.r) +
    0.7152 * linearize(color.g) +
    0.0722 * linearize(color.b)
  );
}

/**
 * WCAG 2.0 contrast ratio, 1 (identical) to 21 (black on white).
 */
export function contrastRatio(a: Color, b: Color): number {
  const la = relativeLuminance(a);
  const lb = relativeLuminance(b);
  const lighter = Math.max(la, lb);
  const darker = Math.min(la, lb);
  return (lighter + 0.05) / (darker + 0.05);
}

function linearize(channel: number): number {
  const c = channel / 255;
  return c <= 0.03928 ? c / 12.92 : Math.pow((c + 0.055) / 1.055, 2.4);
}

function clampChannel(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(255, Math.max(0, Math.round(value)));
}

function clampAmount(amount: number): number {
  if (Number.isNaN(amount)) {
    return 0;
  }
  return Math.min(1, Math.max(0, amount));
}

function toHexByte(value: number): string {
  return value.toString(16).padStart(2, "0");
}
