import type {
  LayoutRenderer,
  LayoutState,
  LayoutView,
  Module,
  ModuleService,
  PopupState,
  Viewport,
} from "./types.js";
import { layoutModules, findNode } from "./layout.js";
import { placePopup, LAYOUT_PADDING, POPUP_WIDTH, POPUP_HEIGHT } from "./layout-utils.js";
import { coerceFields } from "./modules.js";

export const VIEWPORT_MIN_SIZE = 50;
export const VIEWPORT_MAX_RETRIES = 20;

const CLOSED: PopupState = { kind: "closed" };

/** Reports the current size of the drawing surface. */
export interface Surface {
  measure(): Viewport;
}

/** Runs a callback at the host's next render opportunity. */
export type Scheduler = (callback: () => void) => void;

export interface LayoutControllerOptions {
  surface: Surface;
  renderer: LayoutRenderer;
  service: ModuleService;
  schedule?: Scheduler;
  padding?: number;
  popupSize?: Viewport;
}

export function isViewportReady(viewport: Viewport): boolean {
  return viewport.width > VIEWPORT_MIN_SIZE && viewport.height > VIEWPORT_MIN_SIZE;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Owns the module list, the current layout and the popup state machine
 * (closed ↔ open on one module). Every recompute rebuilds the layout from
 * scratch and closes the popup; retries for a surface that has no size yet
 * carry a generation number so a superseded retry never draws.
 */
export class LayoutController {
  private readonly surface: Surface;
  private readonly renderer: LayoutRenderer;
  private readonly service: ModuleService;
  private readonly schedule: Scheduler;
  private readonly padding: number;
  private readonly popupSize: Viewport;

  private modules: Module[] = [];
  private state: LayoutState | null = null;
  private popup: PopupState = CLOSED;
  private lastView: LayoutView | null = null;
  private active = true;
  private generation = 0;
  private refreshToken = 0;

  constructor(options: LayoutControllerOptions) {
    this.surface = options.surface;
    this.renderer = options.renderer;
    this.service = options.service;
    this.schedule =
      options.schedule ??
      ((callback) => {
        requestAnimationFrame(() => callback());
      });
    this.padding = options.padding ?? LAYOUT_PADDING;
    this.popupSize = options.popupSize ?? { width: POPUP_WIDTH, height: POPUP_HEIGHT };
  }

  // ── Accessors ──

  getModules(): Module[] {
    return this.modules;
  }

  getState(): LayoutState | null {
    return this.state;
  }

  getPopup(): PopupState {
    return this.popup;
  }

  getView(): LayoutView | null {
    return this.lastView;
  }

  isActive(): boolean {
    return this.active;
  }

  // ── Lifecycle ──

  recompute(modules: Module[]): void {
    this.modules = modules;
    this.popup = CLOSED;
    this.generation++;
    if (!this.active) return;
    this.attempt(this.generation, 0);
  }

  resize(): void {
    if (this.active) this.recompute(this.modules);
  }

  activate(): void {
    this.active = true;
    this.recompute(this.modules);
  }

  deactivate(): void {
    this.active = false;
    this.popup = CLOSED;
    this.generation++; // drop any pending retry
  }

  /** Fetch modules and recompute. Only the most recent refresh applies. */
  async refresh(): Promise<void> {
    const token = ++this.refreshToken;
    let modules: Module[];
    try {
      modules = await this.service.fetchModules();
    } catch (err) {
      if (token === this.refreshToken) this.fail("Failed to load modules", err);
      return;
    }
    if (token !== this.refreshToken) return;
    this.recompute(modules);
  }

  // ── Interaction ──

  clickNode(name: string): void {
    if (!this.state) return;
    const node = findNode(this.state, name);
    if (!node) return;

    if (this.popup.kind === "open" && this.popup.moduleName === name) {
      this.popup = CLOSED;
    } else {
      const { viewport, hexSize } = this.state;
      const position = placePopup(
        node.center,
        hexSize,
        viewport.width,
        viewport.height,
        this.popupSize.width,
        this.popupSize.height,
      );
      this.popup = { kind: "open", moduleName: name, anchor: node.center, position };
    }
    this.draw({ kind: "layout", state: this.state, popup: this.popup });
  }

  clickOutside(): void {
    if (this.popup.kind === "closed") return;
    this.popup = CLOSED;
    if (this.state) this.draw({ kind: "layout", state: this.state, popup: this.popup });
  }

  /**
   * Ask the service to flip a module, then refetch. Nothing is changed
   * locally before the refetch reports the new truth.
   */
  async toggle(name: string): Promise<void> {
    let ok: boolean;
    try {
      ok = await this.service.toggleModule(name);
    } catch (err) {
      this.fail(`Failed to toggle "${name}"`, err);
      return;
    }
    if (!ok) console.warn(`Toggle of "${name}" was rejected`);
    await this.refresh();
  }

  async save(name: string, fields: Record<string, string>): Promise<void> {
    let ok: boolean;
    try {
      ok = await this.service.updateModule(name, coerceFields(fields));
    } catch (err) {
      this.fail(`Failed to save "${name}"`, err);
      return;
    }
    if (!ok) console.warn(`Update of "${name}" was rejected`);
    await this.refresh();
  }

  // ── Internals ──

  private attempt(generation: number, retries: number): void {
    if (generation !== this.generation) return;

    if (this.modules.length === 0) {
      this.state = null;
      this.draw({ kind: "empty" });
      return;
    }

    const viewport = this.surface.measure();
    if (!isViewportReady(viewport)) {
      if (retries < VIEWPORT_MAX_RETRIES) {
        this.draw({ kind: "waiting", viewport, attempt: retries + 1 });
        this.schedule(() => this.attempt(generation, retries + 1));
      } else {
        this.draw({ kind: "unavailable", viewport });
      }
      return;
    }

    let next: LayoutState;
    try {
      next = layoutModules(this.modules, viewport, this.padding);
    } catch (err) {
      this.fail("Hex grid error", err);
      return;
    }
    this.state = next;
    this.draw({ kind: "layout", state: next, popup: this.popup });
  }

  // The previous layout stays as it was; only the message is added.
  private fail(context: string, err: unknown): void {
    console.error(`${context}:`, err);
    this.popup = CLOSED;
    this.draw({ kind: "error", message: `${context}: ${errorMessage(err)}`, previous: this.state });
  }

  private draw(view: LayoutView): void {
    this.lastView = view;
    this.renderer.render(view);
  }
}
