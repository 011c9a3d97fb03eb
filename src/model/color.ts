/** Normalized [r, g, b] in 0-255. */
export type RGB = [number, number, number];

const HEX_COLOR = /^#([0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;

export function isHexColor(value: string): boolean {
  return HEX_COLOR.test(value);
}

/**
 * Parse #RGB or #RRGGBB. Anything else falls back to white.
 */
export function parseHexColor(value: string): RGB {
  const s = value.trim();
  if (!isHexColor(s)) {
    return [255, 255, 255];
  }

  if (s.length === 4) {
    return [
      parseInt(s[1] + s[1], 16),
      parseInt(s[2] + s[2], 16),
      parseInt(s[3] + s[3], 16)
    ];
  }

  return [parseInt(s.slice(1, 3), 16), parseInt(s.slice(3, 5), 16), parseInt(s.slice(5, 7), 16)];
}

export function withAlpha(hex: string, alpha: number): string {
  const [r, g, b] = parseHexColor(hex);
  const a = Math.round(Math.min(1, Math.max(0, alpha)) * 1000) / 1000;
  return `rgba(${r}, ${g}, ${b}, ${a})`;
}
