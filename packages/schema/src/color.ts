/**
 * Hex color helpers shared by breed data and the painter.
 *
 * Colors travel as `#rrggbb` strings everywhere (breed JSON, canvas calls);
 * these helpers only exist for the few places that need channel math.
 */

/** An RGB triple, each channel an integer in [0, 255]. */
export interface Rgb {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

function clampChannel(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value)));
}

/**
 * Parse `#rrggbb` (or `rrggbb`) into channels.
 * Malformed input parses as black.
 */
export function parseHexColor(hex: string): Rgb {
  const match = /^#?([0-9a-fA-F]{6})$/.exec(hex);
  if (!match || match[1] === undefined) return { r: 0, g: 0, b: 0 };
  const value = parseInt(match[1], 16);
  return {
    r: (value >> 16) & 0xff,
    g: (value >> 8) & 0xff,
    b: value & 0xff,
  };
}

/** Format channels as a lowercase `#rrggbb` string. Channels are clamped. */
export function toHexColor(rgb: Rgb): string {
  const value =
    (clampChannel(rgb.r) << 16) | (clampChannel(rgb.g) << 8) | clampChannel(rgb.b);
  return `#${value.toString(16).padStart(6, "0")}`;
}

/**
 * Multiply every channel by `factor`.
 * Used to push "back layer" limbs into the distance.
 */
export function shadeColor(hex: string, factor: number): string {
  const { r, g, b } = parseHexColor(hex);
  return toHexColor({ r: r * factor, g: g * factor, b: b * factor });
}

/** Add a per-channel offset, clamped. Used for gradient highlights. */
export function lightenColor(
  hex: string,
  dr: number,
  dg: number,
  db: number,
): string {
  const { r, g, b } = parseHexColor(hex);
  return toHexColor({ r: r + dr, g: g + dg, b: b + db });
}
