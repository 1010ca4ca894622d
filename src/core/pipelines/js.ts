import { AssetFile } from "@core/asset-file";
import { publicHref } from "@core/utils/cas";
import {
  ATTR_KILN,
  ATTR_KILN_ID,
  ATTR_SRC,
  AssetPipeline,
  createElement,
  replacePlaceholder,
  requireAttr,
  scriptSelector,
  type AssetId,
  type Attrs,
  type PipelineContext,
  type PipelineOutput,
} from "./shared";

/**
 * A `<script data-kiln src="...">` placeholder. Every attribute other than the
 * kiln markers and `src` is carried over to the emitted script element.
 */
export class Js extends AssetPipeline<JsOutput> {
  readonly kind = "js";

  private constructor(
    id: AssetId,
    ctx: PipelineContext,
    private readonly asset: AssetFile,
    private readonly passthrough: Record<string, string>,
  ) {
    super(id, ctx);
  }

  static async create(ctx: PipelineContext, attrs: Attrs, id: AssetId): Promise<Js> {
    const src = requireAttr(attrs, ATTR_SRC, "script");
    const asset = await AssetFile.create(ctx.config.htmlDir, src, { requireExtension: true });
    const passthrough: Record<string, string> = {};
    for (const [name, value] of Object.entries(attrs)) {
      if (name === ATTR_KILN || name === ATTR_KILN_ID || name === ATTR_SRC) continue;
      passthrough[name] = value;
    }
    return new Js(id, ctx, asset, passthrough);
  }

  protected async run(): Promise<JsOutput> {
    const { stagingDist, filehash, publicUrl } = this.ctx.config;
    const file = await this.asset.copy(stagingDist, filehash);
    return new JsOutput(this.id, publicHref(publicUrl, file), file, this.passthrough);
  }
}

export class JsOutput implements PipelineOutput {
  readonly kind = "js";

  constructor(
    readonly id: AssetId,
    readonly src: string,
    readonly file: string,
    readonly attrs: Readonly<Record<string, string>>,
  ) {}

  finalize(dom: Document) {
    const script = createElement(dom, "script", { ...this.attrs, src: this.src });
    replacePlaceholder(dom, scriptSelector(this.id), [script]);
  }
}
