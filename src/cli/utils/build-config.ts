import path from "path";
import type { BuildConfig, KilnConfig, KilnFailurePolicy } from "../../types/config";

export const STAGING_DIR_NAME = ".stage";

export interface BuildCliOptions {
  target?: string;
  dist?: string;
  publicUrl?: string;
  release?: boolean;
  filehash?: boolean;
  failurePolicy?: KilnFailurePolicy;
}

export interface ResolveBuildConfigOptions {
  cli?: BuildCliOptions;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function parseBoolean(value: string | undefined): boolean | null {
  if (typeof value !== "string") return null;
  const v = value.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return null;
}

function normalizeFailurePolicy(value: unknown): KilnFailurePolicy | null {
  if (value === "fail-fast" || value === "aggregate") return value;
  if (typeof value === "string") {
    const v = value.trim().toLowerCase();
    if (v === "fail-fast" || v === "aggregate") return v;
  }
  return null;
}

/**
 * Public URLs always end with "/" and, unless they are absolute URLs, start
 * with one: "assets" → "/assets/", "https://cdn.test/app" → "https://cdn.test/app/".
 */
export function normalizePublicUrl(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) return "/";
  const isAbsoluteUrl = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) || trimmed.startsWith("//");
  const withLead = isAbsoluteUrl || trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
  return withLead.endsWith("/") ? withLead : `${withLead}/`;
}

function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

/**
 * Precedence for every setting: CLI flag > KILN_* env var > kiln.config.* > default.
 * The result is frozen; pipelines share it read-only.
 */
export function resolveBuildConfig(
  config: KilnConfig | null | undefined,
  opts: ResolveBuildConfigOptions = {},
): BuildConfig {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const cli = opts.cli ?? {};

  const target = path.resolve(cwd, cli.target ?? env.KILN_TARGET ?? config?.target ?? "index.html");
  const htmlDir = path.dirname(target);
  const dist = path.resolve(cwd, cli.dist ?? env.KILN_DIST ?? config?.dist ?? "dist");

  // dist is emptied on every successful build.
  if (isWithin(dist, htmlDir)) {
    throw new Error(
      `dist directory ${JSON.stringify(dist)} must not contain the source directory ${JSON.stringify(htmlDir)}`
    );
  }

  return Object.freeze({
    target,
    htmlDir,
    dist,
    stagingDist: path.join(dist, STAGING_DIR_NAME),
    publicUrl: normalizePublicUrl(cli.publicUrl ?? env.KILN_PUBLIC_URL ?? config?.publicUrl ?? "/"),
    release: cli.release ?? parseBoolean(env.KILN_RELEASE) ?? config?.release ?? false,
    filehash: cli.filehash ?? parseBoolean(env.KILN_FILEHASH) ?? config?.filehash ?? true,
    failurePolicy:
      normalizeFailurePolicy(cli.failurePolicy) ??
      normalizeFailurePolicy(env.KILN_FAILURE_POLICY) ??
      normalizeFailurePolicy(config?.failurePolicy) ??
      "fail-fast",
    tools: Object.freeze({
      cargo: config?.tools?.cargo ?? "cargo",
      wasmBindgen: config?.tools?.wasmBindgen ?? "wasm-bindgen",
    }),
  });
}
