import fs from "fs/promises";
import path from "path";
import { parse as parseToml } from "@iarna/toml";
import { AssetFile } from "@core/asset-file";
import { AssetDeclarationError, AssetIoError, AssetResolutionError } from "@core/errors";
import { publicHref } from "@core/utils/cas";
import { contentHash } from "@core/utils/hash";
import { ensureDir } from "./copy-file";
import {
  ATTR_HREF,
  AssetPipeline,
  createElement,
  linkSelector,
  replacePlaceholder,
  type AssetId,
  type Attrs,
  type PipelineContext,
  type PipelineOutput,
} from "./shared";

const ATTR_BIN = "data-bin";
const ATTR_CARGO_FEATURES = "data-cargo-features";
const ATTR_CARGO_NO_DEFAULT_FEATURES = "data-cargo-no-default-features";
const WASM_TARGET = "wasm32-unknown-unknown";

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

async function readPackageName(manifest: AssetFile): Promise<string> {
  let parsed: unknown;
  try {
    parsed = parseToml(await manifest.readText());
  } catch (err) {
    throw new AssetResolutionError(`error parsing cargo manifest ${JSON.stringify(manifest.path)}`, manifest.path, { cause: err });
  }
  const pkg = isTable(parsed) ? parsed.package : undefined;
  const name = isTable(pkg) ? pkg.name : undefined;
  if (typeof name !== "string" || name.length === 0) {
    throw new AssetResolutionError(`cargo manifest has no [package] name ${JSON.stringify(manifest.path)}`, manifest.path);
  }
  return name;
}

/**
 * A Rust crate compiled to WebAssembly with cargo, then wrapped for the
 * browser by wasm-bindgen.
 */
export class RustApp extends AssetPipeline<RustAppOutput> {
  static readonly TYPE_RUST_APP = "rust-app";
  readonly kind = "rust-app";

  private constructor(
    id: AssetId,
    ctx: PipelineContext,
    private readonly manifest: AssetFile,
    readonly name: string,
    private readonly useBin: boolean,
    private readonly features: string | null,
    private readonly noDefaultFeatures: boolean,
  ) {
    super(id, ctx);
  }

  static async create(ctx: PipelineContext, attrs: Attrs, id: AssetId): Promise<RustApp> {
    const { htmlDir } = ctx.config;
    const href = attrs[ATTR_HREF] ?? "Cargo.toml";
    const joined = path.isAbsolute(href) ? href : path.join(htmlDir, href);
    // href may name the crate directory instead of its manifest.
    const isDir = await fs
      .stat(joined)
      .then((stat) => stat.isDirectory())
      .catch(() => false);
    const manifest = await AssetFile.create(htmlDir, isDir ? path.join(joined, "Cargo.toml") : joined);
    if (manifest.fileName !== "Cargo.toml") {
      throw new AssetDeclarationError(
        "invalid-attribute",
        `rust-app href must point at a Cargo.toml or a crate directory, got ${JSON.stringify(href)}`
      );
    }

    const bin = attrs[ATTR_BIN];
    const name = bin ?? (await readPackageName(manifest));
    const features = attrs[ATTR_CARGO_FEATURES]?.trim() || null;
    const noDefaultFeatures = attrs[ATTR_CARGO_NO_DEFAULT_FEATURES] !== undefined;
    return new RustApp(id, ctx, manifest, name, bin !== undefined, features, noDefaultFeatures);
  }

  get crateDir(): string {
    return path.dirname(this.manifest.path);
  }

  get targetDir(): string {
    return path.join(this.crateDir, "target");
  }

  protected async run(): Promise<RustAppOutput> {
    const { config, tools, ignoreChannel } = this.ctx;
    const profile = config.release ? "release" : "debug";
    // cargo's target dir churns during the build; a watcher must not treat it as a source change.
    ignoreChannel?.send(this.targetDir);

    await tools.run(config.tools.cargo, this.cargoArgs(), { cwd: this.crateDir });

    const wasmPath = path.join(this.targetDir, WASM_TARGET, profile, `${this.name.replace(/-/g, "_")}.wasm`);
    await fs.access(wasmPath).catch((err: unknown) => {
      throw new AssetResolutionError(`cargo did not produce ${JSON.stringify(wasmPath)}`, wasmPath, { cause: err });
    });

    const bindgenDir = path.join(this.targetDir, "wasm-bindgen", profile);
    await ensureDir(bindgenDir);
    await tools.run(
      config.tools.wasmBindgen,
      ["--target", "web", "--out-dir", bindgenDir, "--out-name", this.name, wasmPath],
      { cwd: this.crateDir }
    );

    const [jsBytes, wasmBytes] = await Promise.all([
      this.readGenerated(path.join(bindgenDir, `${this.name}.js`)),
      this.readGenerated(path.join(bindgenDir, `${this.name}_bg.wasm`)),
    ]);

    const base = config.filehash ? `${this.name}-${await contentHash(wasmBytes)}` : this.name;
    const jsFile = `${base}.js`;
    const wasmFile = `${base}_bg.wasm`;
    await Promise.all([
      this.writeOutput(jsFile, jsBytes),
      this.writeOutput(wasmFile, wasmBytes),
    ]);

    return new RustAppOutput(
      this.id,
      publicHref(config.publicUrl, jsFile),
      publicHref(config.publicUrl, wasmFile),
      jsFile,
      wasmFile,
    );
  }

  cargoArgs(): string[] {
    const args = ["build", "--target", WASM_TARGET, "--manifest-path", this.manifest.path];
    if (this.ctx.config.release) args.push("--release");
    if (this.useBin) args.push("--bin", this.name);
    if (this.features) args.push("--features", this.features);
    if (this.noDefaultFeatures) args.push("--no-default-features");
    return args;
  }

  private async readGenerated(filePath: string): Promise<Buffer> {
    try {
      return await fs.readFile(filePath);
    } catch (err) {
      throw new AssetIoError(`error reading wasm-bindgen output ${JSON.stringify(filePath)}`, filePath, { cause: err });
    }
  }

  private async writeOutput(file: string, bytes: Buffer) {
    const filePath = path.join(this.ctx.config.stagingDist, file);
    try {
      await fs.writeFile(filePath, bytes);
    } catch (err) {
      throw new AssetIoError(`error writing ${JSON.stringify(filePath)}`, filePath, { cause: err });
    }
  }
}

export class RustAppOutput implements PipelineOutput {
  readonly kind = "rust-app";

  constructor(
    readonly id: AssetId,
    readonly jsHref: string,
    readonly wasmHref: string,
    readonly jsFile: string,
    readonly wasmFile: string,
  ) {}

  finalize(dom: Document) {
    const preloadWasm = createElement(dom, "link", {
      rel: "preload",
      href: this.wasmHref,
      as: "fetch",
      type: "application/wasm",
      crossorigin: "",
    });
    const preloadJs = createElement(dom, "link", { rel: "modulepreload", href: this.jsHref });
    const init = createElement(dom, "script", { type: "module" });
    init.textContent = `import init from ${JSON.stringify(this.jsHref)};init(${JSON.stringify(this.wasmHref)});`;
    replacePlaceholder(dom, linkSelector(this.id), [preloadWasm, preloadJs, init]);
  }
}
