import type { Module, ModuleService, SettingValue } from "./types.js";
import { parseModuleList, sortModules } from "./modules.js";

export interface AdminClientOptions {
  apiKey?: string;
  fetch?: typeof fetch;
}

/**
 * Module service backed by the admin HTTP API:
 *   GET  /api/config          → module list
 *   POST /api/toggle/<name>   → flip enabled
 *   POST /api/update/<name>   → merge settings (JSON body)
 */
export class AdminClient implements ModuleService {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly fetchImpl: typeof fetch;

  constructor(baseUrl: string, options: AdminClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    return this.apiKey ? { ...extra, "X-API-Key": this.apiKey } : extra;
  }

  async fetchModules(): Promise<Module[]> {
    const res = await this.fetchImpl(`${this.baseUrl}/api/config`, {
      headers: this.headers(),
    });
    if (!res.ok) {
      throw new Error(`GET /api/config failed: ${res.status}`);
    }
    const body: unknown = await res.json();
    return sortModules(parseModuleList(body));
  }

  async toggleModule(name: string): Promise<boolean> {
    const res = await this.fetchImpl(
      `${this.baseUrl}/api/toggle/${encodeURIComponent(name)}`,
      { method: "POST", headers: this.headers() },
    );
    return res.ok;
  }

  async updateModule(name: string, fields: Record<string, SettingValue>): Promise<boolean> {
    const res = await this.fetchImpl(
      `${this.baseUrl}/api/update/${encodeURIComponent(name)}`,
      {
        method: "POST",
        headers: this.headers({ "Content-Type": "application/json" }),
        body: JSON.stringify(fields),
      },
    );
    return res.ok;
  }
}

/** In-process module store, used by offline pages and tests. */
export class MemoryModuleService implements ModuleService {
  private modules: Module[];

  constructor(modules: Module[]) {
    this.modules = modules.map(cloneModule);
  }

  async fetchModules(): Promise<Module[]> {
    return sortModules(this.modules.map(cloneModule));
  }

  async toggleModule(name: string): Promise<boolean> {
    const mod = this.modules.find((m) => m.name === name);
    if (!mod || mod.isCore) return false;
    mod.enabled = !mod.enabled;
    return true;
  }

  async updateModule(name: string, fields: Record<string, SettingValue>): Promise<boolean> {
    const mod = this.modules.find((m) => m.name === name);
    if (!mod) return false;
    mod.settings = { ...mod.settings, ...fields };
    return true;
  }
}

function cloneModule(m: Module): Module {
  return { ...m, settings: { ...m.settings } };
}
