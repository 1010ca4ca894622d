import fs from "fs/promises";
import path from "path";
import { AssetFile } from "@core/asset-file";
import { AssetDeclarationError, AssetIoError } from "@core/errors";
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

/**
 * Validate a `data-target-path` value: relative, and never escaping the
 * output directory.
 */
export function parseTargetPath(value: string | undefined): string | null {
  if (value === undefined || value.trim() === "") return null;
  const normalized = path.normalize(value.trim());
  if (path.isAbsolute(normalized) || normalized === ".." || normalized.startsWith(`..${path.sep}`)) {
    throw new AssetDeclarationError(
      "invalid-attribute",
      `\`${ATTR_TARGET_PATH}\` must be a relative path inside the output directory, got ${JSON.stringify(value)}`
    );
  }
  return normalized === "." ? null : normalized;
}

export async function ensureDir(dir: string) {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (err) {
    throw new AssetIoError(`error creating directory ${JSON.stringify(dir)}`, dir, { cause: err });
  }
}

/** Copies one file into the output directory under its original name. */
export class CopyFile extends AssetPipeline<CopyFileOutput> {
  static readonly TYPE_COPY_FILE = "copy-file";
  readonly kind = "copy-file";

  private constructor(
    id: AssetId,
    ctx: PipelineContext,
    private readonly asset: AssetFile,
    private readonly targetPath: string | null,
  ) {
    super(id, ctx);
  }

  static async create(ctx: PipelineContext, attrs: Attrs, id: AssetId): Promise<CopyFile> {
    const href = requireAttr(attrs, ATTR_HREF, `link rel="copy-file"`);
    const targetPath = parseTargetPath(attrs[ATTR_TARGET_PATH]);
    const asset = await AssetFile.create(ctx.config.htmlDir, href);
    return new CopyFile(id, ctx, asset, targetPath);
  }

  protected async run(): Promise<CopyFileOutput> {
    const toDir = this.targetPath
      ? path.join(this.ctx.config.stagingDist, this.targetPath)
      : this.ctx.config.stagingDist;
    await ensureDir(toDir);
    const file = await this.asset.copy(toDir, false);
    return new CopyFileOutput(this.id, path.join(toDir, file));
  }
}

export class CopyFileOutput implements PipelineOutput {
  readonly kind = "copy-file";

  constructor(
    readonly id: AssetId,
    /** Absolute path of the copy. */
    readonly destination: string,
  ) {}

  finalize(dom: Document) {
    removePlaceholder(dom, linkSelector(this.id));
  }
}
