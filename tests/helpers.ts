import fs from "fs";
import os from "os";
import path from "path";
import { JSDOM } from "jsdom";
import { resolveBuildConfig, type BuildCliOptions } from "../src/cli/utils/build-config";
import type { IgnoreChannel } from "../src/core/ignore-channel";
import type { PipelineContext } from "../src/core/pipelines/shared";
import type { ToolInvocation, ToolResult, ToolRunner } from "../src/core/tools";
import type { BuildConfig, KilnConfig } from "../src/types/config";

// Canonical, so paths compare equal to what AssetFile resolves.
export function makeTempProject(prefix = "kiln-test-"): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function removeTempProject(root: string) {
  fs.rmSync(root, { recursive: true, force: true });
}

export function writeFiles(root: string, files: Record<string, string | Uint8Array>) {
  for (const [relative, contents] of Object.entries(files)) {
    const filePath = path.join(root, relative);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, contents);
  }
}

export function projectConfig(
  root: string,
  cli: BuildCliOptions = {},
  config: KilnConfig | null = null,
): BuildConfig {
  return resolveBuildConfig(config, { cwd: root, env: {}, cli });
}

export const noTools: ToolRunner = {
  run: (command) => Promise.reject(new Error(`unexpected tool invocation: ${command}`)),
};

export function pipelineContext(
  config: BuildConfig,
  tools: ToolRunner = noTools,
  ignoreChannel: IgnoreChannel | null = null,
): PipelineContext {
  fs.mkdirSync(config.stagingDist, { recursive: true });
  return { config, tools, ignoreChannel };
}

export function parseDocument(html: string): JSDOM {
  return new JSDOM(html);
}

export interface RecordedCall {
  command: string;
  args: string[];
  cwd: string;
}

/**
 * Stands in for cargo and wasm-bindgen: records every invocation and writes
 * the files the real tools would leave behind.
 */
export class FakeRustToolchain implements ToolRunner {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly wasm: Uint8Array = Uint8Array.from([0, 97, 115, 109, 1, 0, 0, 0]),
    private readonly glue = "export default async function init(input) { return input; }\n",
  ) {}

  async run(command: string, args: string[], options: ToolInvocation): Promise<ToolResult> {
    this.calls.push({ command, args, cwd: options.cwd });
    if (command === "cargo") {
      const profile = args.includes("--release") ? "release" : "debug";
      const manifest = args[args.indexOf("--manifest-path") + 1];
      const binIndex = args.indexOf("--bin");
      const name = binIndex >= 0 ? args[binIndex + 1] : readCrateName(manifest);
      writeFiles(path.dirname(manifest), {
        [path.join("target", "wasm32-unknown-unknown", profile, `${name.replace(/-/g, "_")}.wasm`)]: this.wasm,
      });
    } else if (command === "wasm-bindgen") {
      const outDir = args[args.indexOf("--out-dir") + 1];
      const outName = args[args.indexOf("--out-name") + 1];
      writeFiles(outDir, {
        [`${outName}.js`]: this.glue,
        [`${outName}_bg.wasm`]: this.wasm,
      });
    }
    return { stdout: "", stderr: "" };
  }
}

function readCrateName(manifest: string): string {
  const match = /^name\s*=\s*"([^"]+)"/m.exec(fs.readFileSync(manifest, "utf8"));
  if (!match) throw new Error(`no crate name in ${manifest}`);
  return match[1];
}
