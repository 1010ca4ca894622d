import fs from "fs/promises";
import path from "path";
import { JSDOM } from "jsdom";
import { logInfo } from "@cli/utils/logger";
import { AssetIoError } from "@core/errors";
import { FinalizeQueue } from "@core/finalize-queue";
import type { IgnoreChannel } from "@core/ignore-channel";
import { AssetOrchestrator, type CompletedAsset } from "@core/orchestrator";
import { createAsset } from "@core/pipelines";
import {
  ATTR_KILN,
  ATTR_KILN_ID,
  ATTR_REL,
  type AssetId,
  type AssetReference,
  type PipelineContext,
} from "@core/pipelines/shared";
import { spawnToolRunner, type ToolRunner } from "@core/tools";
import type { BuildConfig } from "../types/config";

export interface ScannedAsset {
  id: AssetId;
  reference: AssetReference;
}

/**
 * Collect every kiln placeholder in document order, assign ids 0..N-1 and
 * stamp each id onto its element so finalizers can find it again no matter
 * what else has changed in the document. A `data-kiln-id` already present on
 * any other element is removed first, so only placeholders carry one.
 */
export function scanAssetReferences(dom: Document): ScannedAsset[] {
  for (const stray of Array.from(dom.querySelectorAll(`[${ATTR_KILN_ID}]:not([${ATTR_KILN}])`))) {
    stray.removeAttribute(ATTR_KILN_ID);
  }
  const elements = dom.querySelectorAll(`link[${ATTR_KILN}], script[${ATTR_KILN}]`);
  return Array.from(elements, (element, id) => {
    element.setAttribute(ATTR_KILN_ID, String(id));
    const attrs: Record<string, string> = {};
    for (const attr of Array.from(element.attributes)) {
      attrs[attr.name] = attr.value;
    }
    const reference: AssetReference =
      element.localName === "script"
        ? { element: "script", attrs }
        : { element: "link", attrs };
    return { id, reference };
  });
}

function describe(reference: AssetReference): string {
  return reference.element === "script" ? "script" : reference.attrs[ATTR_REL] ?? "link";
}

export interface HtmlPipelineOptions {
  config: BuildConfig;
  ignoreChannel?: IgnoreChannel | null;
  tools?: ToolRunner;
}

export interface HtmlBuildResult {
  /** Where the finalized document was written. */
  outputPath: string;
  assets: CompletedAsset[];
  /** Ids in the order their outputs were applied to the document. */
  finalizeOrder: AssetId[];
}

/**
 * Builds one HTML document: every placeholder's asset is built concurrently
 * and each result is written back into the document as soon as it arrives.
 */
export class HtmlPipeline {
  private readonly config: BuildConfig;
  private readonly ctx: PipelineContext;

  constructor(options: HtmlPipelineOptions) {
    this.config = options.config;
    this.ctx = {
      config: options.config,
      ignoreChannel: options.ignoreChannel ?? null,
      tools: options.tools ?? spawnToolRunner,
    };
  }

  async run(): Promise<HtmlBuildResult> {
    const { target } = this.config;
    let raw: string;
    try {
      raw = await fs.readFile(target, "utf8");
    } catch (err) {
      throw new AssetIoError(`error reading html file ${JSON.stringify(target)}`, target, { cause: err });
    }

    const jsdom = new JSDOM(raw);
    try {
      return await this.buildDocument(jsdom);
    } finally {
      jsdom.window.close();
    }
  }

  private async buildDocument(jsdom: JSDOM): Promise<HtmlBuildResult> {
    const { target, stagingDist, failurePolicy } = this.config;
    const dom = jsdom.window.document;
    const scanned = scanAssetReferences(dom);
    logInfo(`Found ${scanned.length} asset${scanned.length === 1 ? "" : "s"} in ${path.basename(target)}`);

    const queue = new FinalizeQueue(dom);
    const orchestrator = new AssetOrchestrator({
      failurePolicy,
      onComplete: ({ output }) => queue.push(output),
    });

    // Every declaration is validated before the first pipeline starts.
    const constructed = await Promise.allSettled(
      scanned.map(({ id, reference }) => createAsset(this.ctx, reference, id))
    );
    constructed.forEach((result, index) => {
      const { id, reference } = scanned[index];
      if (result.status === "rejected") {
        orchestrator.fail(id, result.reason, describe(reference));
      }
    });
    for (const result of constructed) {
      if (result.status === "fulfilled") orchestrator.spawn(result.value);
    }

    const assets = await orchestrator.join();
    const finalizeOrder = await queue.flush();

    const outputPath = path.join(stagingDist, path.basename(target));
    try {
      await fs.writeFile(outputPath, jsdom.serialize(), "utf8");
    } catch (err) {
      throw new AssetIoError(`error writing html file ${JSON.stringify(outputPath)}`, outputPath, { cause: err });
    }
    return { outputPath, assets, finalizeOrder };
  }
}
