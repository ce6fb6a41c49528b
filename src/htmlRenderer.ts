import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import type { Module } from "../visualiser/src/types.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export interface HtmlOptions {
  /** Admin API base URL; when set the page edits modules live. */
  apiBase?: string;
  /** Directory holding index.html and dist/bundle.js. */
  visualiserDir?: string;
}

/**
 * Locate the visualiser directory from either src/ (running from sources)
 * or dist/src/ (compiled).
 */
function findVisualiserDir(): string {
  for (const up of ["..", path.join("..", "..")]) {
    const candidate = path.resolve(__dirname, up, "visualiser");
    if (fs.existsSync(path.join(candidate, "index.html"))) return candidate;
  }
  return path.resolve(__dirname, "..", "visualiser");
}

/** JSON safe to place inside a <script> element. */
export function inlineJson(value: unknown): string {
  return JSON.stringify(value).replace(/<\//g, "<\\/");
}

/**
 * Render a self-contained HTML file with the module data inlined.
 * Reads the visualiser's index.html and dist/bundle.js, injects the data,
 * and inlines the bundle script.
 */
export function renderHtml(modules: Module[], options: HtmlOptions = {}): string {
  const visualiserDir = options.visualiserDir ?? findVisualiserDir();
  const indexPath = path.join(visualiserDir, "index.html");
  const bundlePath = path.join(visualiserDir, "dist", "bundle.js");

  if (!fs.existsSync(bundlePath)) {
    throw new Error(
      `Visualiser bundle not found at ${bundlePath}.\n` +
        `Run "npm run build:visualiser" first.`,
    );
  }

  let html = fs.readFileSync(indexPath, "utf-8");
  const bundleJs = fs.readFileSync(bundlePath, "utf-8");

  // String.replace interprets $' / $& in replacement strings, so use the
  // function form. The bundle is inlined unescaped: it may contain </ inside
  // regexes, but never </script.
  const assignments = [`window.MODULE_DATA = ${inlineJson(modules)};`];
  if (options.apiBase) {
    assignments.push(`window.HEXDECK_API = ${inlineJson(options.apiBase)};`);
  }
  const dataScript = `<script>${assignments.join(" ")}</script>`;
  html = html.replace("<!-- INLINE_DATA -->", () => dataScript);

  html = html.replace(
    '<script src="dist/bundle.js"></script>',
    () => `<script>${bundleJs}</script>`,
  );

  return html;
}
