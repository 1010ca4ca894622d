import { logDebug } from "@cli/utils/logger";
import { AssetDeclarationError } from "@core/errors";
import type { IgnoreChannel } from "@core/ignore-channel";
import type { ToolRunner } from "@core/tools";
import type { BuildConfig } from "../../types/config";

/** Marks an element as a kiln placeholder. */
export const ATTR_KILN = "data-kiln";
/** Correlates a placeholder element with the pipeline building it. */
export const ATTR_KILN_ID = "data-kiln-id";
export const ATTR_INLINE = "data-inline";
export const ATTR_TARGET_PATH = "data-target-path";
export const ATTR_HREF = "href";
export const ATTR_SRC = "src";
export const ATTR_TYPE = "type";
export const ATTR_REL = "rel";

/** Unique per build pass; the only link between a result and its placeholder. */
export type AssetId = number;

/** Attributes of one placeholder element. */
export type Attrs = Readonly<Record<string, string>>;

export type AssetReference =
  | { readonly element: "link"; readonly attrs: Attrs }
  | { readonly element: "script"; readonly attrs: Attrs };

export type AssetKind =
  | "css"
  | "sass"
  | "tailwind-css"
  | "js"
  | "icon"
  | "inline"
  | "copy-file"
  | "copy-dir"
  | "rust-app";

/** Shared, read-only inputs of every pipeline constructor. */
export interface PipelineContext {
  readonly config: BuildConfig;
  readonly ignoreChannel?: IgnoreChannel | null;
  readonly tools: ToolRunner;
}

export interface PipelineOutput {
  readonly id: AssetId;
  readonly kind: AssetKind;
  /** Apply this result to the document. Must only touch the nodes of its own id. */
  finalize(dom: Document): void | Promise<void>;
}

/**
 * Base of every asset pipeline: holds the id and shared context, and makes
 * sure the build runs at most once.
 */
export abstract class AssetPipeline<TOutput extends PipelineOutput> {
  abstract readonly kind: AssetKind;
  private spawned = false;

  protected constructor(
    readonly id: AssetId,
    protected readonly ctx: PipelineContext,
  ) {}

  /** Start the build. The returned promise is already running. */
  spawn(): Promise<TOutput> {
    if (this.spawned) {
      return Promise.reject(new Error(`asset #${this.id} (${this.kind}) was already spawned`));
    }
    this.spawned = true;
    logDebug(`#${this.id} ${this.kind}: started`);
    return this.run().then((output) => {
      logDebug(`#${this.id} ${this.kind}: finished`);
      return output;
    });
  }

  protected abstract run(): Promise<TOutput>;
}

export function linkSelector(id: AssetId): string {
  return `link[${ATTR_KILN_ID}="${id}"]`;
}

export function scriptSelector(id: AssetId): string {
  return `script[${ATTR_KILN_ID}="${id}"]`;
}

export function requireAttr(attrs: Attrs, name: string, element: string): string {
  const value = attrs[name];
  if (value === undefined) {
    throw new AssetDeclarationError(
      "missing-attribute",
      `<${element} ${ATTR_KILN} .../> elements of this kind must have a \`${name}\` attribute`
    );
  }
  return value;
}

export function hasAttr(attrs: Attrs, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(attrs, name);
}

export function findPlaceholder(dom: Document, selector: string): Element {
  const element = dom.querySelector(selector);
  if (!element) {
    throw new Error(`placeholder ${selector} is missing from the document`);
  }
  return element;
}

export function createElement(dom: Document, tag: string, attrs: Record<string, string>): HTMLElement {
  const element = dom.createElement(tag);
  for (const [name, value] of Object.entries(attrs)) {
    element.setAttribute(name, value);
  }
  return element;
}

/** Swap the placeholder for `nodes`, in its place. */
export function replacePlaceholder(dom: Document, selector: string, nodes: Node[]) {
  findPlaceholder(dom, selector).replaceWith(...nodes);
}

export function removePlaceholder(dom: Document, selector: string) {
  findPlaceholder(dom, selector).remove();
}
