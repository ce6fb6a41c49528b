#!/usr/bin/env node
import { Command, Option } from "commander";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { execSync } from "child_process";
import type { Module } from "../visualiser/src/types.js";
import { layoutModules } from "../visualiser/src/layout.js";
import { AdminClient } from "../visualiser/src/api.js";
import { isViewportReady, VIEWPORT_MIN_SIZE } from "../visualiser/src/controller.js";
import { loadModuleFile } from "./moduleFile.js";
import { renderSvg, renderJson } from "./svgRenderer.js";
import { renderHtml } from "./htmlRenderer.js";

interface CliOptions {
  api?: string;
  apiKey?: string;
  width: string;
  height: string;
  padding: string;
  output?: string;
  verbose: boolean;
  json: boolean;
  html: boolean;
  open: boolean;
}

function parsePixels(name: string, value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new Error(`--${name} must be a non-negative number (got "${value}")`);
  }
  return n;
}

async function loadModules(input: string | undefined, opts: CliOptions): Promise<Module[]> {
  if (opts.api) {
    if (opts.verbose) process.stderr.write(`Fetching modules from ${opts.api}\n`);
    const client = new AdminClient(opts.api, { apiKey: opts.apiKey });
    return client.fetchModules();
  }
  if (!input) {
    throw new Error("no module file given (pass a JSON file or --api <url>)");
  }
  const filePath = path.resolve(input);
  if (opts.verbose) process.stderr.write(`Reading modules from ${filePath}\n`);
  return loadModuleFile(filePath);
}

async function run(input: string | undefined, opts: CliOptions): Promise<void> {
  const viewport = {
    width: parsePixels("width", opts.width),
    height: parsePixels("height", opts.height),
  };
  const padding = parsePixels("padding", opts.padding);

  const startTime = Date.now();
  const modules = await loadModules(input, opts);

  if (opts.verbose) {
    process.stderr.write(`Loaded ${modules.length} modules\n`);
  }
  if (modules.length === 0) {
    process.stderr.write("Warning: no modules in configuration\n");
  }

  let output: string;
  if (opts.html) {
    output = renderHtml(modules, { apiBase: opts.api });
  } else {
    if (!isViewportReady(viewport)) {
      throw new Error(
        `viewport ${viewport.width}x${viewport.height} is too small (both sides must exceed ${VIEWPORT_MIN_SIZE}px)`,
      );
    }
    const layout = layoutModules(modules, viewport, padding);
    if (opts.verbose) {
      process.stderr.write(`Hex size: ${layout.hexSize}px for ${viewport.width}x${viewport.height}\n`);
    }
    output = opts.json ? JSON.stringify(renderJson(layout), null, 2) : renderSvg(layout);
  }

  if (opts.open) {
    const ext = opts.html ? ".html" : opts.json ? ".json" : ".svg";
    const tmpFile = path.join(os.tmpdir(), `hexdeck-${Date.now()}${ext}`);
    fs.writeFileSync(tmpFile, output);
    if (opts.verbose) {
      process.stderr.write(`Opening ${tmpFile}\n`);
    }
    execSync(`open ${JSON.stringify(tmpFile)}`);
  } else if (opts.output) {
    fs.writeFileSync(opts.output, output);
    if (opts.verbose) {
      process.stderr.write(`Output written to ${opts.output}\n`);
    }
  } else {
    process.stdout.write(output + "\n");
  }

  if (opts.verbose) {
    process.stderr.write(`Total time: ${Date.now() - startTime}ms\n`);
  }
}

const program = new Command();

program
  .name("hexdeck")
  .description("Lay out proxy modules on a hex grid")
  .argument("[modules]", "JSON file in the /api/config format")
  .option("--api <url>", "Fetch modules from the admin API instead of a file")
  .addOption(
    new Option("--api-key <key>", "Admin API key sent as X-API-Key").env("HEXDECK_API_KEY"),
  )
  .option("--width <px>", "Viewport width", "1200")
  .option("--height <px>", "Viewport height", "800")
  .option("--padding <px>", "Padding around the grid", "80")
  .option("-o, --output <file>", "Write output to file (default: stdout)")
  .option("--verbose", "Show progress on stderr", false)
  .option("--json", "Output the computed layout as JSON instead of SVG", false)
  .option("--html", "Output a self-contained interactive HTML page", false)
  .option("--open", "Write to a temp file and open it", false)
  .action(async (input: string | undefined, opts: CliOptions) => {
    try {
      await run(input, opts);
    } catch (e) {
      process.stderr.write(`Error: ${e instanceof Error ? e.message : String(e)}\n`);
      process.exit(1);
    }
  });

await program.parseAsync();
