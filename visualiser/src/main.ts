import type { Module, ModuleService } from "./types.js";
import { LayoutController } from "./controller.js";
import { createDomRenderer, type RenderHandlers } from "./render.js";
import { AdminClient, MemoryModuleService } from "./api.js";
import { parseModuleList, sortModules } from "./modules.js";

declare global {
  interface Window {
    MODULE_DATA?: unknown;
    HEXDECK_API?: string;
  }
}

function reportError(err: unknown): void {
  console.error("hexdeck:", err);
}

function run(container: HTMLElement, initial: Module[], service: ModuleService, live: boolean): void {
  const handlers: RenderHandlers = {
    onNodeClick: (name) => controller.clickNode(name),
    onToggle: (name) => {
      controller.toggle(name).catch(reportError);
    },
    onSave: (name, fields) => {
      controller.save(name, fields).catch(reportError);
    },
    onCancel: () => controller.clickOutside(),
  };

  const controller = new LayoutController({
    surface: {
      measure: () => ({ width: container.clientWidth, height: container.clientHeight }),
    },
    renderer: createDomRenderer(container, handlers),
    service,
  });

  window.addEventListener("resize", () => controller.resize());

  document.addEventListener("visibilitychange", () => {
    if (document.visibilityState === "visible") {
      controller.activate();
    } else {
      controller.deactivate();
    }
  });

  // Close popup on background click
  document.addEventListener("click", (e) => {
    const target = e.target;
    if (target instanceof Element && (target.closest(".hex-node") || target.closest(".hex-popup"))) {
      return;
    }
    controller.clickOutside();
  });

  controller.recompute(initial);
  if (live) {
    controller.refresh().catch(reportError);
  }
}

// ── Init ───────────────────────────────────────────────────────────────────

document.addEventListener("DOMContentLoaded", () => {
  const container = document.getElementById("config-canvas");
  if (!container) {
    console.error("No #config-canvas found");
    return;
  }

  let initial: Module[] = [];
  try {
    if (window.MODULE_DATA !== undefined) {
      initial = sortModules(parseModuleList(window.MODULE_DATA));
    }
  } catch (e) {
    container.textContent = `Invalid module data: ${e instanceof Error ? e.message : String(e)}`;
    return;
  }

  const apiBase = window.HEXDECK_API;
  if (apiBase) {
    run(container, initial, new AdminClient(apiBase), true);
  } else {
    run(container, initial, new MemoryModuleService(initial), false);
  }
});
