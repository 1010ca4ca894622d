import { AssetDeclarationError } from "@core/errors";
import { CopyDir, type CopyDirOutput } from "./copy-dir";
import { CopyFile, type CopyFileOutput } from "./copy-file";
import { Css, type CssOutput } from "./css";
import { Icon, type IconOutput } from "./icon";
import { Inline, type InlineOutput } from "./inline";
import { Js, type JsOutput } from "./js";
import { RustApp, type RustAppOutput } from "./rust-app";
import { Sass, type SassOutput } from "./sass";
import { TailwindCss, type TailwindCssOutput } from "./tailwind-css";
import { ATTR_KILN, ATTR_REL, type AssetId, type AssetReference, type Attrs, type PipelineContext } from "./shared";

/**
 * Every asset kind a placeholder can declare. Adding a kind means one class
 * here, one output below, and one entry in `LINK_KINDS`.
 */
export type Asset = Css | Sass | TailwindCss | Js | Icon | Inline | CopyFile | CopyDir | RustApp;

export type AssetOutput =
  | CssOutput
  | SassOutput
  | TailwindCssOutput
  | JsOutput
  | IconOutput
  | InlineOutput
  | CopyFileOutput
  | CopyDirOutput
  | RustAppOutput;

export type AssetConstructor = (ctx: PipelineContext, attrs: Attrs, id: AssetId) => Promise<Asset>;

/** `rel` value of a link placeholder → pipeline constructor. Keys are case-sensitive. */
export const LINK_KINDS: ReadonlyMap<string, AssetConstructor> = new Map<string, AssetConstructor>([
  [Css.TYPE_CSS, Css.create],
  [Sass.TYPE_SASS, Sass.create],
  [Sass.TYPE_SCSS, Sass.create],
  [Icon.TYPE_ICON, Icon.create],
  [Inline.TYPE_INLINE, Inline.create],
  [CopyFile.TYPE_COPY_FILE, CopyFile.create],
  [CopyDir.TYPE_COPY_DIR, CopyDir.create],
  [RustApp.TYPE_RUST_APP, RustApp.create],
  [TailwindCss.TYPE_TAILWIND_CSS, TailwindCss.create],
]);

/**
 * Turn one placeholder into its pipeline. Script placeholders are always
 * JS; link placeholders are looked up by their `rel` attribute.
 *
 * Constructors validate paths and read auxiliary files, so a failure here
 * concerns only this declaration and happens before anything is spawned.
 */
export async function createAsset(
  ctx: PipelineContext,
  reference: AssetReference,
  id: AssetId,
): Promise<Asset> {
  if (reference.element === "script") {
    return Js.create(ctx, reference.attrs, id);
  }

  const rel = reference.attrs[ATTR_REL];
  if (rel === undefined) {
    throw new AssetDeclarationError(
      "missing-attribute",
      `all <link ${ATTR_KILN} .../> elements must have a \`rel\` attribute indicating the asset type`
    );
  }
  const construct = LINK_KINDS.get(rel);
  if (!construct) {
    throw new AssetDeclarationError(
      "unknown-kind",
      `unknown <link ${ATTR_KILN} .../> attr value \`rel="${rel}"\`; please ensure the value is lowercase and is a supported asset type`
    );
  }
  return construct(ctx, reference.attrs, id);
}

export * from "./shared";
export * from "./stage";
export { Css, CssOutput } from "./css";
export { Sass, SassOutput, SassCompileError } from "./sass";
export { TailwindCss, TailwindCssOutput, resetPostcssConfigCache } from "./tailwind-css";
export { Js, JsOutput } from "./js";
export { Icon, IconOutput } from "./icon";
export { Inline, InlineOutput, type InlineContentType } from "./inline";
export { CopyFile, CopyFileOutput } from "./copy-file";
export { CopyDir, CopyDirOutput } from "./copy-dir";
export { RustApp, RustAppOutput } from "./rust-app";
export type { StyleContent } from "./style";
