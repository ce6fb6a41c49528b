import type { Module, SettingValue } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSettingValue(value: unknown): value is SettingValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

/**
 * Validate an untyped /api/config payload into modules.
 * Accepts the admin server's `is_server` flag as well as `isCore`.
 * Settings that are not scalars (arrays, nested tables) are not editable
 * here and are dropped. A `null` payload (a config with no modules) is an
 * empty list.
 */
export function parseModuleList(raw: unknown): Module[] {
  if (raw === null) return [];
  if (!Array.isArray(raw)) {
    throw new Error("Invalid module list: expected a JSON array");
  }

  const seen = new Set<string>();
  const modules: Module[] = [];
  raw.forEach((entry: unknown, i) => {
    if (!isRecord(entry)) {
      throw new Error(`Invalid module at index ${i}: expected an object`);
    }
    const { name } = entry;
    if (typeof name !== "string" || name === "") {
      throw new Error(`Invalid module at index ${i}: "name" must be a non-empty string`);
    }
    if (seen.has(name)) {
      throw new Error(`Duplicate module name "${name}"`);
    }
    seen.add(name);

    const settings: Record<string, SettingValue> = {};
    if (isRecord(entry.settings)) {
      for (const [key, value] of Object.entries(entry.settings)) {
        if (isSettingValue(value)) settings[key] = value;
      }
    }

    modules.push({
      name,
      enabled: entry.enabled === true,
      isCore: entry.is_server === true || entry.isCore === true,
      settings,
    });
  });
  return modules;
}

/** Core modules first, then the rest by name (byte order). */
export function sortModules(modules: Module[]): Module[] {
  return [...modules].sort((a, b) => {
    if (a.isCore !== b.isCore) return a.isCore ? -1 : 1;
    if (a.name < b.name) return -1;
    if (a.name > b.name) return 1;
    return 0;
  });
}

// ── Field Coercion ─────────────────────────────────────────────────────────

export function coerceFieldValue(text: string): SettingValue {
  if (text === "true") return true;
  if (text === "false") return false;
  if (/^\d+$/.test(text)) {
    const n = parseInt(text, 10);
    // Beyond 2^53 the number would not round-trip; keep the text.
    return Number.isSafeInteger(n) ? n : text;
  }
  if (/^\d+\.\d+$/.test(text)) return parseFloat(text);
  return text;
}

export function coerceFields(fields: Record<string, string>): Record<string, SettingValue> {
  const out: Record<string, SettingValue> = {};
  for (const [key, text] of Object.entries(fields)) {
    out[key] = coerceFieldValue(text);
  }
  return out;
}

/** Setting keys in the order the edit popup lists them. */
export function sortedSettingKeys(module: Module): string[] {
  return Object.keys(module.settings).sort();
}
