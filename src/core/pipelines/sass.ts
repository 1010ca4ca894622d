import * as sass from "sass";
import { AssetFile } from "@core/asset-file";
import { emitStylesheet, finalizeStyle, type StyleContent } from "./style";
import {
  ATTR_HREF,
  ATTR_INLINE,
  AssetPipeline,
  hasAttr,
  requireAttr,
  type AssetId,
  type Attrs,
  type PipelineContext,
  type PipelineOutput,
} from "./shared";

export class SassCompileError extends Error {
  readonly path: string;

  constructor(filePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`error compiling sass for ${JSON.stringify(filePath)}: ${detail}`, { cause });
    this.name = "SassCompileError";
    this.path = filePath;
  }
}

/** A `.sass` or `.scss` stylesheet compiled with dart-sass. */
export class Sass extends AssetPipeline<SassOutput> {
  static readonly TYPE_SASS = "sass";
  static readonly TYPE_SCSS = "scss";
  readonly kind = "sass";

  private constructor(
    id: AssetId,
    ctx: PipelineContext,
    private readonly asset: AssetFile,
    private readonly inline: boolean,
  ) {
    super(id, ctx);
  }

  static async create(ctx: PipelineContext, attrs: Attrs, id: AssetId): Promise<Sass> {
    const href = requireAttr(attrs, ATTR_HREF, `link rel="sass"`);
    const asset = await AssetFile.create(ctx.config.htmlDir, href, { requireExtension: true });
    return new Sass(id, ctx, asset, hasAttr(attrs, ATTR_INLINE));
  }

  protected async run(): Promise<SassOutput> {
    let css: string;
    try {
      const result = await sass.compileAsync(this.asset.path, {
        style: this.ctx.config.release ? "compressed" : "expanded",
      });
      css = result.css;
    } catch (err) {
      throw new SassCompileError(this.asset.path, err);
    }
    const content = await emitStylesheet(this.ctx.config, this.asset.fileStem, css, this.inline);
    return new SassOutput(this.id, content);
  }
}

export class SassOutput implements PipelineOutput {
  readonly kind = "sass";

  constructor(
    readonly id: AssetId,
    readonly content: StyleContent,
  ) {}

  finalize(dom: Document) {
    finalizeStyle(dom, this.id, this.content);
  }
}
