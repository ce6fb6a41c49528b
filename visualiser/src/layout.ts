import type {
  LayoutLink,
  LayoutNode,
  LayoutState,
  Module,
  NodeCategory,
  Viewport,
} from "./types.js";
import {
  generatePositions,
  fitHexSize,
  projectAxial,
  hexBounds,
  HEX_SIZE_MAX,
  LAYOUT_PADDING,
} from "./layout-utils.js";

export function nodeCategory(module: Module): NodeCategory {
  if (module.isCore) return "core";
  return module.enabled ? "on" : "off";
}

// ── Main Export ─────────────────────────────────────────────────────────────

/**
 * Lay out modules on a hex spiral sized to the viewport. Module 0 sits at the
 * origin; the whole arrangement is centred in the viewport.
 *
 * Throws if the geometry degenerates (non-finite viewport or coordinates).
 */
export function layoutModules(
  modules: Module[],
  viewport: Viewport,
  padding: number = LAYOUT_PADDING,
): LayoutState {
  if (modules.length === 0) {
    return { nodes: [], links: [], hexSize: HEX_SIZE_MAX, viewport };
  }

  // Phase 1: Positions
  const coords = generatePositions(modules.length);

  // Phase 2: Size
  const hexSize = fitHexSize(coords, viewport.width, viewport.height, padding);

  // Phase 3: Project and centre
  const projected = coords.map((c) => projectAxial(c, hexSize));
  const bounds = hexBounds(projected, hexSize);
  const offsetX = viewport.width / 2 - (bounds.minX + bounds.maxX) / 2;
  const offsetY = viewport.height / 2 - (bounds.minY + bounds.maxY) / 2;

  const nodes: LayoutNode[] = modules.map((module, i) => {
    const center = { x: projected[i].x + offsetX, y: projected[i].y + offsetY };
    if (!Number.isFinite(center.x) || !Number.isFinite(center.y)) {
      throw new Error(
        `non-finite position for module "${module.name}" (${center.x}, ${center.y})`,
      );
    }
    return { module, coord: coords[i], center, category: nodeCategory(module) };
  });

  // Phase 4: Links from the origin node
  const origin = nodes[0].center;
  const links: LayoutLink[] = nodes.slice(1).map((n) => ({
    from: origin,
    to: n.center,
    target: n.module.name,
    enabled: n.module.enabled,
  }));

  return { nodes, links, hexSize, viewport };
}

export function findNode(state: LayoutState, name: string): LayoutNode | undefined {
  return state.nodes.find((n) => n.module.name === name);
}
