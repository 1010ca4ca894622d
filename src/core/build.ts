import fs from "fs/promises";
import path from "path";
import { logInfo, logSuccess } from "@cli/utils/logger";
import { AssetIoError } from "@core/errors";
import { HtmlPipeline, type HtmlBuildResult } from "@core/html";
import type { IgnoreChannel } from "@core/ignore-channel";
import type { ToolRunner } from "@core/tools";
import type { BuildConfig } from "../types/config";

export interface BuildSystemOptions {
  ignoreChannel?: IgnoreChannel | null;
  tools?: ToolRunner;
}

export interface BuildReport extends HtmlBuildResult {
  /** Final location of the built document. */
  htmlPath: string;
  durationMs: number;
}

async function io<T>(message: string, filePath: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    throw new AssetIoError(`${message} ${JSON.stringify(filePath)}`, filePath, { cause: err });
  }
}

/**
 * One build pass: builds into a fresh staging directory and only replaces
 * the contents of `dist` once every asset succeeded. A failed pass leaves
 * `dist` as it was; whatever finished pipelines wrote stays in staging until
 * the next pass clears it.
 */
export class BuildSystem {
  constructor(
    private readonly config: BuildConfig,
    private readonly options: BuildSystemOptions = {},
  ) {}

  async build(): Promise<BuildReport> {
    const started = Date.now();
    const { dist, stagingDist, target } = this.config;
    logInfo(`Building ${path.relative(process.cwd(), target) || target}`);

    await this.prepareStaging();
    this.options.ignoreChannel?.send(dist);

    const result = await new HtmlPipeline({
      config: this.config,
      ignoreChannel: this.options.ignoreChannel,
      tools: this.options.tools,
    }).run();

    await this.promoteStaging();
    const durationMs = Date.now() - started;
    logSuccess(`Built ${result.assets.length} asset${result.assets.length === 1 ? "" : "s"} into ${dist} in ${durationMs}ms`);
    return {
      ...result,
      htmlPath: path.join(dist, path.basename(result.outputPath)),
      durationMs,
    };
  }

  private async prepareStaging() {
    const { stagingDist } = this.config;
    await io("error clearing staging directory", stagingDist, () =>
      fs.rm(stagingDist, { recursive: true, force: true })
    );
    await io("error creating staging directory", stagingDist, () =>
      fs.mkdir(stagingDist, { recursive: true })
    );
  }

  private async promoteStaging() {
    const { dist, stagingDist } = this.config;
    const stagingName = path.basename(stagingDist);

    const previous = await io("error reading dist directory", dist, () => fs.readdir(dist));
    for (const entry of previous) {
      if (entry === stagingName) continue;
      const entryPath = path.join(dist, entry);
      await io("error removing stale output", entryPath, () =>
        fs.rm(entryPath, { recursive: true, force: true })
      );
    }

    const staged = await io("error reading staging directory", stagingDist, () => fs.readdir(stagingDist));
    for (const entry of staged) {
      const from = path.join(stagingDist, entry);
      await io("error moving staged output", from, () => fs.rename(from, path.join(dist, entry)));
    }
    await io("error removing staging directory", stagingDist, () =>
      fs.rm(stagingDist, { recursive: true, force: true })
    );
  }
}
