import type { LayoutState, NodeCategory } from "../visualiser/src/types.js";
import {
  LINK_WIDTH,
  LINK_OPACITY,
  LINK_DASHARRAY,
  nodeColor,
  linkColor,
  solidColor,
  hexPoints,
  moduleLabel,
} from "../visualiser/src/render-utils.js";

function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function round(n: number): number {
  return Math.round(n * 100) / 100;
}

export function renderSvg(state: LayoutState): string {
  const { width, height } = state.viewport;
  const lines: string[] = [];
  lines.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
  );

  lines.push('  <g class="links">');
  for (const link of state.links) {
    lines.push(
      `    <line x1="${round(link.from.x)}" y1="${round(link.from.y)}" x2="${round(link.to.x)}" y2="${round(link.to.y)}"` +
        ` stroke="${solidColor(linkColor(link.enabled))}" stroke-width="${LINK_WIDTH}" stroke-opacity="${LINK_OPACITY}"` +
        ` stroke-dasharray="${LINK_DASHARRAY}"/>`,
    );
  }
  lines.push("  </g>");

  lines.push('  <g class="nodes">');
  for (const node of state.nodes) {
    const { x, y } = node.center;
    const colors = nodeColor(node.category);
    lines.push(`    <g class="hex-node" data-name="${escapeXml(node.module.name)}">`);
    lines.push(
      `      <polygon points="${hexPoints(x, y, state.hexSize)}" fill="${solidColor(colors.fill)}"/>`,
    );
    lines.push(
      `      <text x="${round(x)}" y="${round(y)}" fill="${solidColor(colors.textFill)}" font-size="11" font-weight="600" text-anchor="middle">${escapeXml(moduleLabel(node.module.name))}</text>`,
    );
    lines.push(
      `      <text x="${round(x)}" y="${round(y + 14)}" fill="${solidColor(colors.textFill)}" font-size="10" text-anchor="middle">${node.category}</text>`,
    );
    lines.push("    </g>");
  }
  lines.push("  </g>");

  lines.push("</svg>");
  return lines.join("\n");
}

// ── JSON ───────────────────────────────────────────────────────────────────

export interface JsonLayoutNode {
  name: string;
  category: NodeCategory;
  enabled: boolean;
  q: number;
  r: number;
  x: number;
  y: number;
}

export interface JsonLayout {
  hexSize: number;
  viewport: { width: number; height: number };
  nodes: JsonLayoutNode[];
  links: Array<{ target: string; enabled: boolean }>;
}

export function renderJson(state: LayoutState): JsonLayout {
  return {
    hexSize: state.hexSize,
    viewport: { ...state.viewport },
    nodes: state.nodes.map((n) => ({
      name: n.module.name,
      category: n.category,
      enabled: n.module.enabled,
      q: n.coord.q,
      r: n.coord.r,
      x: round(n.center.x),
      y: round(n.center.y),
    })),
    links: state.links.map((l) => ({ target: l.target, enabled: l.enabled })),
  };
}
