import path from "path";

/**
 * Content-addressed file name: `{stem}-{digest}.{ext}`. An empty extension
 * keeps the trailing dot so the name stays recognisably hashed.
 */
export function hashedFileName(stem: string, digest: string, ext: string | null): string {
  return `${stem}-${digest}.${ext ?? ""}`;
}

/** Join a file name onto the public URL the document is served from. */
export function publicHref(publicUrl: string, ...segments: string[]): string {
  const relative = segments
    .filter((segment) => segment.length > 0)
    .map((segment) => segment.split(path.sep).join("/").replace(/^\/+|\/+$/g, ""))
    .join("/");
  return `${publicUrl}${relative}`;
}
