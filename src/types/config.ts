/**
 * How a build pass reacts to a failing asset.
 * - "fail-fast": reject with the first failure as soon as it is observed
 * - "aggregate": wait for every asset, then reject with all failures
 *
 * Neither policy terminates workers that are already running; files they
 * write land in the staging directory and are discarded with it.
 */
export type KilnFailurePolicy = "fail-fast" | "aggregate";

export interface KilnToolsConfig {
  /** Command used to build `rust-app` assets (default "cargo"). */
  cargo?: string;
  /** Command used to generate JS bindings for `rust-app` assets (default "wasm-bindgen"). */
  wasmBindgen?: string;
}

export interface KilnConfig {
  /** HTML file whose `data-kiln` placeholders are built. Defaults to "index.html". */
  target?: string;
  /** Output directory. Defaults to "dist". */
  dist?: string;
  /** URL the output directory is served from. Defaults to "/". */
  publicUrl?: string;
  release?: boolean;
  /** Content-hash output file names. Defaults to true. */
  filehash?: boolean;
  failurePolicy?: KilnFailurePolicy;
  tools?: KilnToolsConfig;
  [key: string]: unknown;
}

/**
 * Fully resolved, read-only configuration of one build pass. Shared by every
 * pipeline and never mutated once created.
 */
export interface BuildConfig {
  /** Absolute path of the source HTML file. */
  readonly target: string;
  /** Directory relative asset references resolve against. */
  readonly htmlDir: string;
  readonly dist: string;
  /** Directory pipelines write into; promoted to `dist` on success. */
  readonly stagingDist: string;
  /** Always starts and ends with "/". */
  readonly publicUrl: string;
  readonly release: boolean;
  readonly filehash: boolean;
  readonly failurePolicy: KilnFailurePolicy;
  readonly tools: Readonly<Required<KilnToolsConfig>>;
}
