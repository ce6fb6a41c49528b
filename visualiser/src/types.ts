export type SettingValue = string | number | boolean;

// Input format (matches the /api/config payload after validation)
export interface Module {
  name: string;
  enabled: boolean;
  isCore: boolean;
  settings: Record<string, SettingValue>;
}

export interface AxialCoord {
  q: number;
  r: number;
}

export interface PixelPoint {
  x: number;
  y: number;
}

export interface Viewport {
  width: number;
  height: number;
}

export type NodeCategory = "core" | "on" | "off";

// Layout output
export interface LayoutNode {
  module: Module;
  coord: AxialCoord;
  center: PixelPoint; // container-relative, centring offset applied
  category: NodeCategory;
}

export interface LayoutLink {
  from: PixelPoint;
  to: PixelPoint;
  target: string; // module name
  enabled: boolean;
}

export interface LayoutState {
  nodes: LayoutNode[];
  links: LayoutLink[];
  hexSize: number;
  viewport: Viewport;
}

export type PopupState =
  | { kind: "closed" }
  | { kind: "open"; moduleName: string; anchor: PixelPoint; position: PixelPoint };

// What the renderer is asked to draw. Always a complete description.
export type LayoutView =
  | { kind: "layout"; state: LayoutState; popup: PopupState }
  | { kind: "empty" }
  | { kind: "waiting"; viewport: Viewport; attempt: number }
  | { kind: "unavailable"; viewport: Viewport }
  | { kind: "error"; message: string; previous: LayoutState | null };

export interface LayoutRenderer {
  render(view: LayoutView): void;
}

export interface ModuleService {
  fetchModules(): Promise<Module[]>;
  toggleModule(name: string): Promise<boolean>;
  updateModule(name: string, fields: Record<string, SettingValue>): Promise<boolean>;
}
