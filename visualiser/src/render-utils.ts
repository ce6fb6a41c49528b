import type { LayoutView, NodeCategory, SettingValue } from "./types.js";

// ── Colors ─────────────────────────────────────────────────────────────────

// CSS variables with fallbacks. Standalone SVG output writes the fallbacks
// through solidColor, since non-browser renderers reject var().
export const COLORS = {
  coreFill: "var(--hex-core-fill, #c7dbf5)",
  coreText: "var(--hex-core-text, #1e40af)",
  onFill: "var(--hex-on-fill, #c6f0d2)",
  onText: "var(--hex-on-text, #15803d)",
  offFill: "var(--hex-off-fill, #e8eaed)",
  offText: "var(--hex-off-text, #6b7280)",
  linkOn: "var(--hex-link-on, #93bbf0)",
  linkOff: "var(--hex-link-off, #c8cdd3)",
  muted: "var(--hex-muted, #656d76)",
  error: "var(--hex-error, #cf222e)",
} as const;

/** The fallback of a `var(--name, fallback)` colour; other values pass through. */
export function solidColor(color: string): string {
  const m = /^var\(--[\w-]+,\s*([^)]+)\)$/.exec(color);
  return m ? m[1].trim() : color;
}

export const LINK_WIDTH = 1.5;
export const LINK_OPACITY = 0.4;
export const LINK_DASHARRAY = "4,3";

export function nodeColor(category: NodeCategory): { fill: string; textFill: string } {
  switch (category) {
    case "core":
      return { fill: COLORS.coreFill, textFill: COLORS.coreText };
    case "on":
      return { fill: COLORS.onFill, textFill: COLORS.onText };
    case "off":
      return { fill: COLORS.offFill, textFill: COLORS.offText };
  }
}

export function linkColor(enabled: boolean): string {
  return enabled ? COLORS.linkOn : COLORS.linkOff;
}

// ── Geometry ───────────────────────────────────────────────────────────────

/** Pointy-top hexagon of circumradius r around (cx, cy), as SVG points. */
export function hexPoints(cx: number, cy: number, r: number): string {
  const pts: string[] = [];
  for (let i = 0; i < 6; i++) {
    const angle = (Math.PI / 3) * i - Math.PI / 6;
    pts.push(`${(cx + r * Math.cos(angle)).toFixed(1)},${(cy + r * Math.sin(angle)).toFixed(1)}`);
  }
  return pts.join(" ");
}

/** Width and height of the box a hex node element occupies. */
export function hexBox(hexSize: number): { width: number; height: number } {
  return { width: Math.sqrt(3) * hexSize, height: 2 * hexSize };
}

// ── Labels ─────────────────────────────────────────────────────────────────

export function moduleLabel(name: string): string {
  return name.replace(/_/g, " ");
}

export function formatSettingValue(value: SettingValue): string {
  return String(value);
}

export function placeholderText(view: LayoutView): string | null {
  switch (view.kind) {
    case "empty":
      return "No config loaded";
    case "waiting":
      return `Loading grid (canvas: ${view.viewport.width}x${view.viewport.height})...`;
    case "unavailable":
      return `Grid unavailable (canvas: ${view.viewport.width}x${view.viewport.height})`;
    default:
      return null;
  }
}
