import { AssetFile } from "@core/asset-file";
import { publicHref } from "@core/utils/cas";
import {
  ATTR_HREF,
  ATTR_TYPE,
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

const ATTR_SIZES = "sizes";

export class Icon extends AssetPipeline<IconOutput> {
  static readonly TYPE_ICON = "icon";
  readonly kind = "icon";

  private constructor(
    id: AssetId,
    ctx: PipelineContext,
    private readonly asset: AssetFile,
    private readonly extraAttrs: Record<string, string>,
  ) {
    super(id, ctx);
  }

  static async create(ctx: PipelineContext, attrs: Attrs, id: AssetId): Promise<Icon> {
    const href = requireAttr(attrs, ATTR_HREF, `link rel="icon"`);
    const asset = await AssetFile.create(ctx.config.htmlDir, href, { requireExtension: true });
    // type and sizes describe the icon itself, so they survive onto the real link.
    const extraAttrs: Record<string, string> = {};
    for (const name of [ATTR_TYPE, ATTR_SIZES]) {
      const value = attrs[name];
      if (value !== undefined) extraAttrs[name] = value;
    }
    return new Icon(id, ctx, asset, extraAttrs);
  }

  protected async run(): Promise<IconOutput> {
    const { stagingDist, filehash, publicUrl } = this.ctx.config;
    const file = await this.asset.copy(stagingDist, filehash);
    return new IconOutput(this.id, publicHref(publicUrl, file), file, this.extraAttrs);
  }
}

export class IconOutput implements PipelineOutput {
  readonly kind = "icon";

  constructor(
    readonly id: AssetId,
    readonly href: string,
    readonly file: string,
    readonly extraAttrs: Readonly<Record<string, string>>,
  ) {}

  finalize(dom: Document) {
    const link = createElement(dom, "link", { rel: "icon", href: this.href, ...this.extraAttrs });
    replacePlaceholder(dom, linkSelector(this.id), [link]);
  }
}
