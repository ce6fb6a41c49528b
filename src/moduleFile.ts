import * as fs from "fs";
import type { Module } from "../visualiser/src/types.js";
import { parseModuleList, sortModules } from "../visualiser/src/modules.js";

/**
 * Load a module list saved from the admin API's /api/config response.
 * The result is ordered core-first, then by name.
 */
export function loadModuleFile(filePath: string): Module[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf-8");
  return parseModuleJson(content, filePath);
}

export function parseModuleJson(content: string, source = "<input>"): Module[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (e) {
    throw new Error(`Invalid JSON in ${source}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return sortModules(parseModuleList(raw));
}
