import fs from "fs";
import path from "path";
import { pathToFileURL } from "url";
import { build, type Plugin } from "esbuild";
import { z } from "zod";
import type { KilnConfig } from "../../types/config";
import { logError, logInfo } from "./logger";

const CONFIG_BASENAMES = [
  "kiln.config.ts",
  "kiln.config.mts",
  "kiln.config.js",
  "kiln.config.mjs",
  "kiln.config.cjs",
];

export const kilnConfigSchema = z
  .object({
    target: z.string().min(1).optional(),
    dist: z.string().min(1).optional(),
    publicUrl: z.string().optional(),
    release: z.boolean().optional(),
    filehash: z.boolean().optional(),
    failurePolicy: z.enum(["fail-fast", "aggregate"]).optional(),
    tools: z
      .object({
        cargo: z.string().min(1).optional(),
        wasmBindgen: z.string().min(1).optional(),
      })
      .optional(),
  })
  .passthrough();

let cachedConfig: KilnConfig | null = null;
let configLoaded = false;

// Lets config files `import { defineConfig } from "kiln"` without kiln being resolvable from them.
const inlineKilnPlugin: Plugin = {
  name: "inline-kiln",
  setup(pluginBuild) {
    pluginBuild.onResolve({ filter: /^kiln$/ }, () => ({
      path: "kiln-virtual",
      namespace: "kiln-ns",
    }));
    pluginBuild.onLoad({ filter: /.*/, namespace: "kiln-ns" }, () => ({
      contents: `
        export function defineConfig(config) {
          return config;
        }
      `,
      loader: "js",
    }));
  },
};

// Bundle the config file into a single ESM string that can be `import()`ed.
async function bundleConfig(entry: string) {
  const absDir = path.dirname(entry);
  const result = await build({
    entryPoints: [entry],
    bundle: true,
    platform: "node",
    format: "esm",
    sourcemap: "inline",
    write: false,
    target: "node20",
    logLevel: "silent",
    absWorkingDir: absDir,
    plugins: [inlineKilnPlugin],
  });
  const output = result.outputFiles?.[0];
  if (!output) throw new Error("Failed to bundle kiln config");
  const dirnameLiteral = JSON.stringify(absDir);
  const filenameLiteral = JSON.stringify(entry);
  const importMetaLiteral = JSON.stringify(pathToFileURL(entry).href);

  let contents = output.text;
  if (contents.includes("import.meta.url")) {
    contents = contents.replace(/import\.meta\.url/g, "__KILN_IMPORT_META_URL");
    contents = `const __KILN_IMPORT_META_URL = ${importMetaLiteral};\n${contents}`;
  }
  const preamble =
    `const __dirname = ${dirnameLiteral};\n` +
    `const __filename = ${filenameLiteral};\n`;
  return preamble + contents;
}

export function findConfigFile(cwd: string): string | null {
  for (const name of CONFIG_BASENAMES) {
    const candidate = path.resolve(cwd, name);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }
  return null;
}

function pickExport(imported: unknown): unknown {
  if (imported && typeof imported === "object") {
    if ("default" in imported && imported.default !== undefined) return imported.default;
    if ("config" in imported && imported.config !== undefined) return imported.config;
  }
  return imported;
}

async function evaluateConfig(configPath: string): Promise<KilnConfig> {
  const bundled = await bundleConfig(configPath);
  const dataUrl = `data:text/javascript;base64,${Buffer.from(bundled).toString("base64")}`;
  let resolved: unknown = pickExport(await import(dataUrl));

  // Support `export default (env) => config` as well as plain objects.
  if (typeof resolved === "function") {
    resolved = await resolved({ mode: process.env.NODE_ENV || "production" });
  }

  const parsed = kilnConfigSchema.safeParse(await resolved);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid kiln config ${path.basename(configPath)}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Load `kiln.config.*` from `cwd`, once per process. A broken config file is
 * reported and then treated as absent.
 */
export async function loadKilnConfig(cwd = process.cwd()): Promise<KilnConfig | null> {
  if (configLoaded) return cachedConfig;
  configLoaded = true;

  const configPath = findConfigFile(cwd);
  if (!configPath) {
    cachedConfig = null;
    return cachedConfig;
  }

  try {
    cachedConfig = await evaluateConfig(configPath);
    logInfo(`Loaded kiln config from ${path.relative(cwd, configPath)}`);
  } catch (err) {
    logError("Failed to load kiln.config", err);
    cachedConfig = null;
  }
  return cachedConfig;
}

export function resetKilnConfigCache() {
  cachedConfig = null;
  configLoaded = false;
}
