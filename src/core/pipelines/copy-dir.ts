import fs from "fs/promises";
import path from "path";
import { AssetIoError, AssetResolutionError } from "@core/errors";
import { ensureDir, parseTargetPath } from "./copy-file";
import {
  ATTR_HREF,
  ATTR_TARGET_PATH,
  AssetPipeline,
  linkSelector,
  removePlaceholder,
  requireAttr,
  type AssetId,
  type Attrs,
  type PipelineContext,
  type PipelineOutput,
} from "./shared";

/** Recursively copies a directory into the output directory. */
export class CopyDir extends AssetPipeline<CopyDirOutput> {
  static readonly TYPE_COPY_DIR = "copy-dir";
  readonly kind = "copy-dir";

  private constructor(
    id: AssetId,
    ctx: PipelineContext,
    private readonly source: string,
    private readonly targetPath: string | null,
  ) {
    super(id, ctx);
  }

  static async create(ctx: PipelineContext, attrs: Attrs, id: AssetId): Promise<CopyDir> {
    const href = requireAttr(attrs, ATTR_HREF, `link rel="copy-dir"`);
    const targetPath = parseTargetPath(attrs[ATTR_TARGET_PATH]);
    const joined = path.isAbsolute(href) ? href : path.join(ctx.config.htmlDir, href);

    let source: string;
    try {
      source = await fs.realpath(joined);
    } catch (err) {
      throw new AssetResolutionError(`error getting canonical path for ${JSON.stringify(joined)}`, joined, { cause: err });
    }
    const stat = await fs.stat(source);
    if (!stat.isDirectory()) {
      throw new AssetResolutionError(`copy-dir target is not a directory ${JSON.stringify(source)}`, source);
    }
    if (!path.basename(source)) {
      throw new AssetResolutionError(`directory has no name ${JSON.stringify(source)}`, source);
    }
    return new CopyDir(id, ctx, source, targetPath);
  }

  protected async run(): Promise<CopyDirOutput> {
    const destination = path.join(
      this.ctx.config.stagingDist,
      this.targetPath ?? path.basename(this.source),
    );
    await ensureDir(path.dirname(destination));
    try {
      await fs.cp(this.source, destination, { recursive: true, force: true });
    } catch (err) {
      throw new AssetIoError(
        `error copying directory ${JSON.stringify(this.source)} to ${JSON.stringify(destination)}`,
        this.source,
        { cause: err }
      );
    }
    return new CopyDirOutput(this.id, destination);
  }
}

export class CopyDirOutput implements PipelineOutput {
  readonly kind = "copy-dir";

  constructor(
    readonly id: AssetId,
    readonly destination: string,
  ) {}

  finalize(dom: Document) {
    removePlaceholder(dom, linkSelector(this.id));
  }
}
