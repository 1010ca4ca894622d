import path from "path";
import { AssetFile } from "@core/asset-file";
import { AssetDeclarationError } from "@core/errors";
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

export type InlineContentType = "html" | "svg" | "css" | "js" | "mjs";

const CONTENT_TYPES: readonly InlineContentType[] = ["html", "svg", "css", "js", "mjs"];

function parseContentType(value: string): InlineContentType | null {
  const lower = value.toLowerCase();
  return CONTENT_TYPES.find((type) => type === lower) ?? null;
}

/** Inlines a file's content into the document in place of the placeholder. */
export class Inline extends AssetPipeline<InlineOutput> {
  static readonly TYPE_INLINE = "inline";
  readonly kind = "inline";

  private constructor(
    id: AssetId,
    ctx: PipelineContext,
    private readonly asset: AssetFile,
    private readonly contentType: InlineContentType,
  ) {
    super(id, ctx);
  }

  static async create(ctx: PipelineContext, attrs: Attrs, id: AssetId): Promise<Inline> {
    const href = requireAttr(attrs, ATTR_HREF, `link rel="inline"`);
    const asset = await AssetFile.create(ctx.config.htmlDir, href);
    // An explicit `type` wins over the file extension.
    const declared = attrs[ATTR_TYPE] ?? asset.ext ?? path.extname(href).slice(1);
    const contentType = parseContentType(declared);
    if (!contentType) {
      throw new AssetDeclarationError(
        "invalid-attribute",
        `unknown inline content type ${JSON.stringify(declared)} for ${JSON.stringify(href)}; expected one of ${CONTENT_TYPES.join(", ")}`
      );
    }
    return new Inline(id, ctx, asset, contentType);
  }

  protected async run(): Promise<InlineOutput> {
    const content = await this.asset.readText();
    return new InlineOutput(this.id, this.contentType, content);
  }
}

export class InlineOutput implements PipelineOutput {
  readonly kind = "inline";

  constructor(
    readonly id: AssetId,
    readonly contentType: InlineContentType,
    readonly content: string,
  ) {}

  finalize(dom: Document) {
    replacePlaceholder(dom, linkSelector(this.id), this.createNodes(dom));
  }

  private createNodes(dom: Document): Node[] {
    switch (this.contentType) {
      case "html":
      case "svg": {
        const template = dom.createElement("template");
        template.innerHTML = this.content;
        return Array.from(template.content.childNodes);
      }
      case "css": {
        const style = createElement(dom, "style", {});
        style.textContent = this.content;
        return [style];
      }
      case "js":
      case "mjs": {
        const script = createElement(dom, "script", this.contentType === "mjs" ? { type: "module" } : {});
        script.textContent = this.content;
        return [script];
      }
      default: {
        const exhaustive: never = this.contentType;
        throw new Error(`Unsupported inline content type: ${String(exhaustive)}`);
      }
    }
  }
}
