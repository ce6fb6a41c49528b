import type { AxialCoord, PixelPoint } from "./types.js";

// ── Constants ──────────────────────────────────────────────────────────────

export const HEX_GAP_FRACTION = 0.18; // extra room between adjacent hexes
export const HEX_SIZE_MAX = 56;
export const HEX_SIZE_MIN = 18;
export const HEX_SIZE_STEP = 2;
export const LAYOUT_PADDING = 80;

export const POPUP_WIDTH = 280;
export const POPUP_HEIGHT = 300;
export const POPUP_OFFSET_X = 24; // gap between hex edge and popup
export const POPUP_OFFSET_Y = 50; // popup top sits this far above the anchor
export const POPUP_MARGIN = 10;

const SQRT3 = Math.sqrt(3);

// Canonical axial direction set. Ring walks start at DIRECTIONS[4] * radius.
export const HEX_DIRECTIONS: readonly AxialCoord[] = [
  { q: 1, r: 0 },
  { q: 1, r: -1 },
  { q: 0, r: -1 },
  { q: -1, r: 0 },
  { q: -1, r: 1 },
  { q: 0, r: 1 },
];

// ── Position Generation ────────────────────────────────────────────────────

/**
 * All coordinates at exactly `radius` steps from the origin, in walk order.
 * Ring 0 is the origin alone; ring k has 6k coordinates.
 */
export function hexRing(radius: number): AxialCoord[] {
  if (radius === 0) return [{ q: 0, r: 0 }];
  const start = HEX_DIRECTIONS[4];
  let q = start.q * radius;
  let r = start.r * radius;
  const result: AxialCoord[] = [];
  for (const dir of HEX_DIRECTIONS) {
    for (let step = 0; step < radius; step++) {
      result.push({ q, r });
      q += dir.q;
      r += dir.r;
    }
  }
  return result;
}

/**
 * Deterministic spiral fill: origin first, then ring 1, ring 2, ...
 * Each ring is sorted by descending q, then ascending |r|, which fans the
 * nodes out to the right of the origin first. A partially used ring is
 * truncated.
 */
export function generatePositions(count: number): AxialCoord[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`position count must be a positive integer (got ${count})`);
  }

  const positions: AxialCoord[] = [{ q: 0, r: 0 }];
  for (let ring = 1; positions.length < count; ring++) {
    const coords = hexRing(ring).sort((a, b) => {
      if (b.q !== a.q) return b.q - a.q;
      return Math.abs(a.r) - Math.abs(b.r);
    });
    for (const coord of coords) {
      if (positions.length >= count) break;
      positions.push(coord);
    }
  }
  return positions;
}

// ── Projection ─────────────────────────────────────────────────────────────

export function projectAxial(
  coord: AxialCoord,
  hexSize: number,
  gapFraction: number = HEX_GAP_FRACTION,
): PixelPoint {
  const spacing = hexSize * (1 + gapFraction);
  return {
    x: spacing * SQRT3 * (coord.q + coord.r / 2),
    y: spacing * 1.5 * coord.r,
  };
}

// ── Size Fitting ───────────────────────────────────────────────────────────

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/** Bounding box of hex centers, grown by each hex's half-extents. */
export function hexBounds(centers: PixelPoint[], hexSize: number): Bounds {
  const halfWidth = (SQRT3 * hexSize) / 2;
  let minX = Infinity,
    minY = Infinity,
    maxX = -Infinity,
    maxY = -Infinity;
  for (const c of centers) {
    minX = Math.min(minX, c.x - halfWidth);
    maxX = Math.max(maxX, c.x + halfWidth);
    minY = Math.min(minY, c.y - hexSize);
    maxY = Math.max(maxY, c.y + hexSize);
  }
  return { minX, minY, maxX, maxY };
}

export function layoutFits(
  coords: AxialCoord[],
  hexSize: number,
  width: number,
  height: number,
  padding: number = LAYOUT_PADDING,
): boolean {
  const bounds = hexBounds(
    coords.map((c) => projectAxial(c, hexSize)),
    hexSize,
  );
  return (
    bounds.maxX - bounds.minX + padding * 2 <= width &&
    bounds.maxY - bounds.minY + padding * 2 <= height
  );
}

/**
 * Largest hex size in [HEX_SIZE_MIN, HEX_SIZE_MAX] whose layout fits the
 * viewport. Falls back to HEX_SIZE_MIN when nothing fits; the layout then
 * overflows.
 */
export function fitHexSize(
  coords: AxialCoord[],
  width: number,
  height: number,
  padding: number = LAYOUT_PADDING,
): number {
  for (let size = HEX_SIZE_MAX; size >= HEX_SIZE_MIN; size -= HEX_SIZE_STEP) {
    if (layoutFits(coords, size, width, height, padding)) return size;
  }
  return HEX_SIZE_MIN;
}

// ── Popup Placement ────────────────────────────────────────────────────────

/**
 * Top-left corner for a popup anchored beside a hex. Prefers the right side,
 * flips left when it would cross the right edge, then clamps vertically.
 */
export function placePopup(
  anchor: PixelPoint,
  hexSize: number,
  viewportWidth: number,
  viewportHeight: number,
  popupWidth: number = POPUP_WIDTH,
  popupHeight: number = POPUP_HEIGHT,
): PixelPoint {
  let left = anchor.x + hexSize + POPUP_OFFSET_X;
  let top = anchor.y - POPUP_OFFSET_Y;

  if (left + popupWidth > viewportWidth) {
    left = anchor.x - hexSize - popupWidth;
  }
  if (top < POPUP_MARGIN) top = POPUP_MARGIN;
  if (top + popupHeight > viewportHeight) {
    top = Math.max(POPUP_MARGIN, viewportHeight - popupHeight - POPUP_MARGIN);
  }

  return { x: left, y: top };
}
