import fs from "fs/promises";
import path from "path";
import { AssetIoError } from "@core/errors";
import { hashedFileName, publicHref } from "@core/utils/cas";
import { contentHash } from "@core/utils/hash";
import { createElement, linkSelector, replacePlaceholder, type AssetId } from "./shared";
import type { BuildConfig } from "../../types/config";

/** Compiled stylesheet, either linked from the output directory or inlined. */
export type StyleContent =
  | { readonly type: "inline"; readonly css: string }
  | { readonly type: "file"; readonly href: string; readonly file: string };

/** Write compiled CSS as `{stem}-{hash}.css` (or `{stem}.css` without file hashing). */
export async function emitStylesheet(
  config: BuildConfig,
  stem: string,
  css: string,
  inline: boolean,
): Promise<StyleContent> {
  if (inline) return { type: "inline", css };

  const file = config.filehash
    ? hashedFileName(stem, await contentHash(css), "css")
    : `${stem}.css`;
  const filePath = path.join(config.stagingDist, file);
  try {
    await fs.writeFile(filePath, css, "utf8");
  } catch (err) {
    throw new AssetIoError(`error writing compiled css to ${JSON.stringify(filePath)}`, filePath, { cause: err });
  }
  return { type: "file", href: publicHref(config.publicUrl, file), file };
}

export function finalizeStyle(dom: Document, id: AssetId, content: StyleContent) {
  const node =
    content.type === "inline"
      ? createElement(dom, "style", {})
      : createElement(dom, "link", { rel: "stylesheet", href: content.href });
  if (content.type === "inline") node.textContent = content.css;
  replacePlaceholder(dom, linkSelector(id), [node]);
}
