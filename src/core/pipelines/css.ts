import { AssetFile } from "@core/asset-file";
import { publicHref } from "@core/utils/cas";
import {
  ATTR_HREF,
  AssetPipeline,
  createElement,
  linkSelector,
  replacePlaceholder,
  requireAttr,
  type AssetId,
  type Attrs,
  type PipelineContext,
  type PipelineOutput,
} from "./shared";

/** A plain stylesheet, copied as-is under a content-addressed name. */
export class Css extends AssetPipeline<CssOutput> {
  static readonly TYPE_CSS = "css";
  readonly kind = "css";

  private constructor(id: AssetId, ctx: PipelineContext, private readonly asset: AssetFile) {
    super(id, ctx);
  }

  static async create(ctx: PipelineContext, attrs: Attrs, id: AssetId): Promise<Css> {
    const href = requireAttr(attrs, ATTR_HREF, `link rel="css"`);
    const asset = await AssetFile.create(ctx.config.htmlDir, href, { requireExtension: true });
    return new Css(id, ctx, asset);
  }

  protected async run(): Promise<CssOutput> {
    const { stagingDist, filehash } = this.ctx.config;
    const file = await this.asset.copy(stagingDist, filehash);
    return new CssOutput(this.id, publicHref(this.ctx.config.publicUrl, file), file);
  }
}

export class CssOutput implements PipelineOutput {
  readonly kind = "css";

  constructor(
    readonly id: AssetId,
    readonly href: string,
    /** Name of the file written to the output directory. */
    readonly file: string,
  ) {}

  finalize(dom: Document) {
    const link = createElement(dom, "link", { rel: "stylesheet", href: this.href });
    replacePlaceholder(dom, linkSelector(this.id), [link]);
  }
}
