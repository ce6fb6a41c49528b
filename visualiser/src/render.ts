import type {
  LayoutLink,
  LayoutNode,
  LayoutRenderer,
  LayoutState,
  LayoutView,
  PixelPoint,
} from "./types.js";
import {
  COLORS,
  LINK_WIDTH,
  LINK_OPACITY,
  LINK_DASHARRAY,
  nodeColor,
  linkColor,
  hexPoints,
  hexBox,
  moduleLabel,
  formatSettingValue,
  placeholderText,
} from "./render-utils.js";
import { sortedSettingKeys } from "./modules.js";

export interface RenderHandlers {
  onNodeClick: (name: string) => void;
  onToggle: (name: string) => void;
  onSave: (name: string, fields: Record<string, string>) => void;
  onCancel: () => void;
}

// ── SVG Helpers ────────────────────────────────────────────────────────────

export function svgEl(tag: string, attrs: Record<string, string | number> = {}): SVGElement {
  const el = document.createElementNS("http://www.w3.org/2000/svg", tag);
  for (const [k, v] of Object.entries(attrs)) {
    el.setAttribute(k, String(v));
  }
  return el;
}

export function htmlEl(tag: string, attrs: Record<string, string> = {}): HTMLElement {
  const el = document.createElement(tag);
  for (const [k, v] of Object.entries(attrs)) {
    el.setAttribute(k, v);
  }
  return el;
}

// ── Element Creation ───────────────────────────────────────────────────────

export function createLinkEl(link: LayoutLink): SVGElement {
  return svgEl("line", {
    x1: link.from.x,
    y1: link.from.y,
    x2: link.to.x,
    y2: link.to.y,
    stroke: linkColor(link.enabled),
    "stroke-width": LINK_WIDTH,
    "stroke-opacity": LINK_OPACITY,
    "stroke-dasharray": LINK_DASHARRAY,
    "data-target": link.target,
  });
}

export function createNodeEl(
  node: LayoutNode,
  hexSize: number,
  onClick: (name: string) => void,
): HTMLElement {
  const { width, height } = hexBox(hexSize);
  const colors = nodeColor(node.category);

  const el = htmlEl("div", { class: "hex-node", "data-name": node.module.name });
  el.style.left = `${node.center.x - width / 2}px`;
  el.style.top = `${node.center.y - height / 2}px`;
  el.style.width = `${width}px`;
  el.style.height = `${height}px`;

  const svg = svgEl("svg", { width, height, viewBox: `0 0 ${width} ${height}` });
  svg.appendChild(
    svgEl("polygon", {
      points: hexPoints(width / 2, height / 2, hexSize),
      fill: colors.fill,
      stroke: "none",
    }),
  );
  el.appendChild(svg);

  const label = htmlEl("div", { class: "hex-label" });
  label.style.color = colors.textFill;
  label.textContent = moduleLabel(node.module.name);
  el.appendChild(label);

  const status = htmlEl("div", { class: "hex-status" });
  status.style.color = colors.textFill;
  status.textContent = node.category;
  el.appendChild(status);

  el.addEventListener("click", (e) => {
    e.stopPropagation();
    onClick(node.module.name);
  });

  return el;
}

export function createPopupEl(
  node: LayoutNode,
  position: PixelPoint,
  handlers: RenderHandlers,
): HTMLElement {
  const mod = node.module;
  const popup = htmlEl("div", { class: "hex-popup show", "data-name": mod.name });
  popup.style.left = `${position.x}px`;
  popup.style.top = `${position.y}px`;

  const title = htmlEl("h3");
  title.textContent = mod.name;
  popup.appendChild(title);

  if (!mod.isCore) {
    const row = htmlEl("div", { class: "toggle-row" });
    const label = htmlEl("span", { class: "toggle-label" });
    label.textContent = "Enabled";
    row.appendChild(label);
    const toggle = htmlEl("div", { class: mod.enabled ? "toggle-switch on" : "toggle-switch" });
    toggle.appendChild(htmlEl("div", { class: "knob" }));
    toggle.addEventListener("click", () => handlers.onToggle(mod.name));
    row.appendChild(toggle);
    popup.appendChild(row);
  }

  const keys = sortedSettingKeys(mod);
  const inputs: HTMLInputElement[] = [];
  for (const key of keys) {
    const field = htmlEl("div", { class: "field" });
    const label = htmlEl("label");
    label.textContent = key;
    field.appendChild(label);
    const input = document.createElement("input");
    input.dataset.key = key;
    input.value = formatSettingValue(mod.settings[key]);
    field.appendChild(input);
    inputs.push(input);
    popup.appendChild(field);
  }

  const actions = htmlEl("div", { class: "popup-actions" });
  if (keys.length > 0) {
    const save = htmlEl("button", { class: "btn primary save-btn", type: "button" });
    save.textContent = "Save";
    save.addEventListener("click", () => {
      const fields: Record<string, string> = {};
      for (const input of inputs) {
        const key = input.dataset.key;
        if (key !== undefined) fields[key] = input.value;
      }
      handlers.onSave(mod.name, fields);
    });
    actions.appendChild(save);
  }
  const cancel = htmlEl("button", { class: "btn cancel-btn", type: "button" });
  cancel.textContent = "Cancel";
  cancel.addEventListener("click", () => handlers.onCancel());
  actions.appendChild(cancel);
  popup.appendChild(actions);

  return popup;
}

function createMessageEl(text: string, className: string, color: string): HTMLElement {
  const el = htmlEl("div", { class: className });
  el.style.color = color;
  el.textContent = text;
  return el;
}

// ── Main Render ────────────────────────────────────────────────────────────

function appendLayout(container: HTMLElement, state: LayoutState, handlers: RenderHandlers): void {
  const wrap = htmlEl("div", { class: "hex-wrap" });

  const svg = svgEl("svg", { class: "hex-svg" });
  for (const link of state.links) {
    svg.appendChild(createLinkEl(link));
  }
  wrap.appendChild(svg);

  const nodesEl = htmlEl("div", { class: "hex-nodes" });
  for (const node of state.nodes) {
    nodesEl.appendChild(createNodeEl(node, state.hexSize, handlers.onNodeClick));
  }
  wrap.appendChild(nodesEl);

  container.appendChild(wrap);
}

/** Full redraw of `container` from a view description. */
export function renderView(
  container: HTMLElement,
  view: LayoutView,
  handlers: RenderHandlers,
): void {
  container.innerHTML = "";

  switch (view.kind) {
    case "layout": {
      appendLayout(container, view.state, handlers);
      const popup = view.popup;
      if (popup.kind === "open") {
        const node = view.state.nodes.find((n) => n.module.name === popup.moduleName);
        if (node) container.appendChild(createPopupEl(node, popup.position, handlers));
      }
      return;
    }
    case "error":
      if (view.previous) appendLayout(container, view.previous, handlers);
      container.appendChild(createMessageEl(view.message, "hex-error", COLORS.error));
      return;
    default: {
      const text = placeholderText(view) ?? "";
      container.appendChild(createMessageEl(text, "hex-placeholder", COLORS.muted));
    }
  }
}

export function createDomRenderer(
  container: HTMLElement,
  handlers: RenderHandlers,
): LayoutRenderer {
  return {
    render: (view) => renderView(container, view, handlers),
  };
}
